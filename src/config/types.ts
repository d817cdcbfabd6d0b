/**
 * Configuration Types
 * Type definitions for inspector configuration
 */

import { z } from 'zod';

// Log levels enum
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

// Configuration schema using Zod
export const ConfigurationSchema = z.object({
  // Forensic output
  previewLength: z.number().int().positive().default(128)
    .describe('Maximum number of content bytes shown per file'),

  slackLength: z.number().int().nonnegative().default(32)
    .describe('Number of bytes read past the declared file size'),

  // Output formatting
  outputIndent: z.number().int().min(0).max(10).default(4)
    .describe('Indentation of the geometry document'),

  // Logging Configuration
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.WARN)
    .describe('Logging level'),

  // MCP server options
  allowedDirectories: z.array(z.string()).default(['.'])
    .describe('Directories the MCP tools may open images from')
});

export type Configuration = z.infer<typeof ConfigurationSchema>;

// Configuration source priority
export enum ConfigSource {
  DEFAULT = 'default',
  CONFIG_FILE = 'config_file',
  OVERRIDE = 'override'
}

// Configuration with metadata
export interface ConfigurationWithMetadata {
  config: Configuration;
  sources: Record<keyof Configuration, ConfigSource>;
  configFile?: string | undefined;
  errors: string[];
  warnings: string[];
}
