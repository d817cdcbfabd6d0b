/**
 * Type Definitions Index
 */

// Volume layout
export * from './geometry';

// Directory entries
export * from './entries';

// MCP Protocol Types
export * from './mcp';

// Security Types
export * from './security';

// Tool Types
export * from './tools';
