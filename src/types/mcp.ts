/**
 * MCP Content Response Types
 * Based on Model Context Protocol specification
 */

export interface McpTextContent {
  type: 'text';
  text: string;
}

export type McpContent = McpTextContent;

