/**
 * MCP Tool Interface Types
 */

import { ZodTypeAny, z } from 'zod';
import { McpContent } from './mcp';

/**
 * JSON Schema advertised to MCP clients in tools/list
 */
export interface ToolJsonSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface InspectorTool<Schema extends ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Schema;
  readonly jsonSchema: ToolJsonSchema;
  handler(args: z.output<Schema>): Promise<McpContent[]>;
}

export type ToolErrorType =
  | 'IO_ERROR'
  | 'FORMAT_ERROR'
  | 'RANGE_ERROR'
  | 'CORRUPT_CHAIN'
  | 'VALIDATION_ERROR'
  | 'SECURITY_ERROR'
  | 'FILE_NOT_FOUND'
  | 'UNKNOWN_ERROR';
