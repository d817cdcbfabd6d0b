/**
 * Fat32InspectorServer Class
 * MCP server exposing FAT32 image inspection tools over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { InspectGeometryTool } from '../tools/InspectGeometryTool';
import { ListEntriesTool } from '../tools/ListEntriesTool';
import { createErrorResponse } from '../tools/responses';
import { PathValidator } from '../security/PathValidator';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { Logger } from '../logging/Logger';
import { McpContent } from '../types/index';

export const SERVER_NAME = 'fat32-inspect';
export const SERVER_VERSION = '1.0.0';

export class Fat32InspectorServer {
  private server: Server;
  private configManager: ConfigurationManager;
  private pathValidator: PathValidator;
  private logger: Logger;
  private inspectGeometryTool: InspectGeometryTool;
  private listEntriesTool: ListEntriesTool;

  constructor(configManager?: ConfigurationManager) {
    this.configManager = configManager || ConfigurationManager.getInstance();
    this.logger = new Logger(this.configManager.getConfiguration().logLevel).child('server');

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.pathValidator = PathValidator.createFromConfiguration(this.configManager);
    this.inspectGeometryTool = new InspectGeometryTool(this.pathValidator, this.configManager);
    this.listEntriesTool = new ListEntriesTool(this.pathValidator, this.configManager);

    this.setupHandlers();
  }

  /**
   * Set up MCP request handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [this.inspectGeometryTool, this.listEntriesTool].map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.jsonSchema,
      })),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return { content: await this.callTool(name, args ?? {}) };
    });
  }

  /**
   * Validate arguments against the tool's schema and run it
   */
  public async callTool(name: string, args: Record<string, unknown>): Promise<McpContent[]> {
    try {
      switch (name) {
        case this.inspectGeometryTool.name:
          return await this.inspectGeometryTool.handler(this.inspectGeometryTool.inputSchema.parse(args));

        case this.listEntriesTool.name:
          return await this.listEntriesTool.handler(this.listEntriesTool.inputSchema.parse(args));

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        return createErrorResponse(
          `calling ${name}`,
          error.errors.map(e => `${e.path.join('.') || 'arguments'}: ${e.message}`).join(', '),
          'VALIDATION_ERROR'
        );
      }
      throw error;
    } finally {
      const securityEvents = this.pathValidator.getSecurityEvents();
      if (securityEvents.length > 0) {
        this.logger.warn('Security events detected:', securityEvents);
        this.pathValidator.clearSecurityEvents();
      }
    }
  }

  /**
   * Start the MCP server with stdio transport
   */
  public async start(): Promise<void> {
    const configWithMetadata = this.configManager.getConfigurationWithMetadata();

    configWithMetadata.errors.forEach(error => this.logger.error(`Configuration error: ${error}`));
    configWithMetadata.warnings.forEach(warning => this.logger.warn(`Configuration warning: ${warning}`));

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    this.logger.info('FAT32 inspector MCP server started');
    this.logger.info('Allowed directories:', this.pathValidator.getAllowedPrefixes());
    this.logger.info('Registered tools:', [this.inspectGeometryTool.name, this.listEntriesTool.name]);
    if (configWithMetadata.configFile) {
      this.logger.info(`Configuration loaded from: ${configWithMetadata.configFile}`);
    }
  }

  public async stop(): Promise<void> {
    await this.server.close();
  }

  /**
   * Get server instance for testing
   */
  public getServer(): Server {
    return this.server;
  }

  /**
   * Get registered tools for testing
   */
  public getTools() {
    return {
      inspectGeometry: this.inspectGeometryTool,
      listEntries: this.listEntriesTool,
    };
  }
}
