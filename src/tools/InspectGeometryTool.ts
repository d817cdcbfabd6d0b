/**
 * InspectGeometryTool Class
 * MCP tool returning the boot sector geometry of a FAT32 image
 */

import { z } from 'zod';
import { McpContent } from '../types/index';
import { InspectorTool, ToolJsonSchema } from '../types/tools';
import { PathValidator } from '../security/PathValidator';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { Fat32Session } from '../session/Fat32Session';
import { Logger } from '../logging/Logger';
import { geometryDocument } from '../output/RecordFormatter';
import { handleError, resolveImagePath } from './responses';

const inspectGeometrySchema = z.object({
  imagePath: z.string().min(1, 'Image path is required').describe('Path to the FAT32 image')
});

const ACTION = 'inspecting geometry';

export class InspectGeometryTool implements InspectorTool<typeof inspectGeometrySchema> {
  public readonly name = 'inspect_geometry';
  public readonly description = 'Decode the boot sector of a FAT32 volume image and report its layout';

  public readonly inputSchema = inspectGeometrySchema;

  public readonly jsonSchema: ToolJsonSchema = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      imagePath: {
        type: 'string',
        minLength: 1,
        description: 'Path to the FAT32 image'
      }
    },
    required: ['imagePath'],
    additionalProperties: false
  };

  private pathValidator: PathValidator;
  private configManager: ConfigurationManager;

  constructor(pathValidator: PathValidator, configManager?: ConfigurationManager) {
    this.pathValidator = pathValidator;
    this.configManager = configManager || ConfigurationManager.getInstance();
  }

  public async handler(args: z.output<typeof inspectGeometrySchema>): Promise<McpContent[]> {
    const resolution = resolveImagePath(ACTION, this.pathValidator, args.imagePath);
    if (!resolution.ok) {
      return resolution.response;
    }

    try {
      const config = this.configManager.getConfiguration();
      const geometry = Fat32Session.using(
        resolution.resolvedPath,
        session => session.geometry,
        { logger: new Logger(config.logLevel) }
      );
      return [{ type: 'text', text: JSON.stringify(geometryDocument(geometry), null, config.outputIndent) }];
    } catch (error) {
      return handleError(ACTION, error, args.imagePath);
    }
  }
}
