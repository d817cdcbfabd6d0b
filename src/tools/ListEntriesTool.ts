/**
 * ListEntriesTool Class
 * MCP tool enumerating every directory entry of a FAT32 image, deleted
 * entries, content previews and slack space included
 */

import { z } from 'zod';
import { McpContent } from '../types/index';
import { InspectorTool, ToolJsonSchema } from '../types/tools';
import { EntryRecord } from '../types/entries';
import { PathValidator } from '../security/PathValidator';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { Fat32Session } from '../session/Fat32Session';
import { Logger } from '../logging/Logger';
import { entryDocument } from '../output/RecordFormatter';
import { handleError, resolveImagePath } from './responses';

const ENTRY_TYPES = ['vol', 'lfn', 'dir', 'other'] as const;

const listEntriesSchema = z.object({
  imagePath: z.string().min(1, 'Image path is required'),
  includeDeleted: z.boolean().optional().default(true),
  entryTypes: z.array(z.enum(ENTRY_TYPES)).min(1).optional()
});

const ACTION = 'listing entries';

export class ListEntriesTool implements InspectorTool<typeof listEntriesSchema> {
  public readonly name = 'list_entries';
  public readonly description = 'Walk the directory tree of a FAT32 volume image and list every entry with content previews and slack space';

  public readonly inputSchema = listEntriesSchema;

  public readonly jsonSchema: ToolJsonSchema = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      imagePath: {
        type: 'string',
        minLength: 1
      },
      includeDeleted: {
        type: 'boolean',
        default: true
      },
      entryTypes: {
        type: 'array',
        items: {
          type: 'string',
          enum: [...ENTRY_TYPES]
        },
        minItems: 1
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

  public async handler(args: z.output<typeof listEntriesSchema>): Promise<McpContent[]> {
    const resolution = resolveImagePath(ACTION, this.pathValidator, args.imagePath);
    if (!resolution.ok) {
      return resolution.response;
    }

    try {
      const config = this.configManager.getConfiguration();
      const entries = Fat32Session.using(
        resolution.resolvedPath,
        session => session.inspect().entries,
        {
          previewLength: config.previewLength,
          slackLength: config.slackLength,
          logger: new Logger(config.logLevel)
        }
      );

      const selected = this.filterEntries(entries, args.includeDeleted, args.entryTypes);
      const lines = selected.map(record => JSON.stringify(entryDocument(record)));
      const summary = `${selected.length} of ${entries.length} entries in ${args.imagePath}`;

      return [{ type: 'text', text: [summary, ...lines].join('\n') }];
    } catch (error) {
      return handleError(ACTION, error, args.imagePath);
    }
  }

  private filterEntries(
    entries: EntryRecord[],
    includeDeleted: boolean,
    entryTypes: readonly EntryRecord['entryType'][] | undefined
  ): EntryRecord[] {
    return entries.filter(record =>
      (includeDeleted || !record.deleted) &&
      (entryTypes === undefined || entryTypes.includes(record.entryType))
    );
  }
}
