/**
 * ConfigurationManager Class
 * Centralized configuration management with file and programmatic sources
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import {
  Configuration,
  ConfigurationSchema,
  ConfigSource,
  ConfigurationWithMetadata
} from './types';

const PartialConfigurationSchema = ConfigurationSchema.partial().strict();

export type ConfigurationOverrides = z.input<typeof PartialConfigurationSchema>;

const CONFIG_KEYS = ConfigurationSchema.keyof().options;

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;
  private configuration: ConfigurationWithMetadata;
  private overrides: ConfigurationOverrides;

  private constructor(overrides: ConfigurationOverrides = {}) {
    this.overrides = overrides;
    this.configuration = this.loadConfiguration();
  }

  /**
   * Get singleton instance
   */
  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Standalone manager that skips the singleton, for embedding and tests
   */
  public static create(overrides: ConfigurationOverrides = {}): ConfigurationManager {
    return new ConfigurationManager(overrides);
  }

  /**
   * Drop the singleton so the next getInstance() reloads from disk
   */
  public static resetInstance(): void {
    ConfigurationManager.instance = undefined;
  }

  public getConfiguration(): Configuration {
    return this.configuration.config;
  }

  public getConfigurationWithMetadata(): ConfigurationWithMetadata {
    return this.configuration;
  }

  /**
   * Reload configuration from all sources
   */
  public reloadConfiguration(): ConfigurationWithMetadata {
    this.configuration = this.loadConfiguration();
    return this.configuration;
  }

  /**
   * Apply programmatic overrides on top of the loaded sources
   */
  public applyOverrides(overrides: ConfigurationOverrides): ConfigurationWithMetadata {
    this.overrides = { ...this.overrides, ...overrides };
    return this.reloadConfiguration();
  }

  /**
   * Load configuration from all sources with priority
   */
  private loadConfiguration(): ConfigurationWithMetadata {
    const errors: string[] = [];
    const warnings: string[] = [];

    let config = ConfigurationSchema.parse({});
    const sources = this.defaultSources();

    // 1. Configuration file
    const fileResult = this.loadFromConfigFile();
    if (fileResult.config) {
      config = this.mergeConfigurations(config, fileResult.config, sources, ConfigSource.CONFIG_FILE, errors);
    }
    errors.push(...fileResult.errors);
    warnings.push(...fileResult.warnings);

    // 2. Programmatic overrides
    const overrideResult = PartialConfigurationSchema.safeParse(this.overrides);
    if (overrideResult.success) {
      config = this.mergeConfigurations(config, overrideResult.data, sources, ConfigSource.OVERRIDE, errors);
    } else {
      errors.push(`Invalid configuration overrides: ${this.describeZodError(overrideResult.error)}`);
    }

    // 3. Post-process
    const processed = this.postProcessConfiguration(config);
    warnings.push(...processed.warnings);

    return {
      config: processed.config,
      sources,
      configFile: fileResult.configFile,
      errors,
      warnings
    };
  }

  private defaultSources(): Record<keyof Configuration, ConfigSource> {
    return {
      previewLength: ConfigSource.DEFAULT,
      slackLength: ConfigSource.DEFAULT,
      outputIndent: ConfigSource.DEFAULT,
      logLevel: ConfigSource.DEFAULT,
      allowedDirectories: ConfigSource.DEFAULT
    };
  }

  /**
   * Load configuration from the first JSON file found
   */
  private loadFromConfigFile(): {
    config: Partial<Configuration> | null;
    configFile?: string;
    errors: string[];
    warnings: string[];
  } {
    const errors: string[] = [];
    const warnings: string[] = [];

    const configPaths = [
      'fat32-inspect.json',
      '.fat32-inspect.json',
      path.join(os.homedir(), '.fat32-inspect.json'),
      path.join(os.homedir(), '.config', 'fat32-inspect.json')
    ];

    for (const configPath of configPaths) {
      try {
        if (!fs.existsSync(configPath)) {
          continue;
        }
        const content = fs.readFileSync(configPath, 'utf8');
        const parsed = PartialConfigurationSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
          errors.push(`Invalid config file ${configPath}: ${this.describeZodError(parsed.error)}`);
          return { config: null, configFile: configPath, errors, warnings };
        }
        return { config: parsed.data, configFile: configPath, errors, warnings };
      } catch (error) {
        errors.push(`Failed to load config file ${configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
    }

    return { config: null, errors, warnings };
  }

  /**
   * Merge configurations with source tracking
   */
  private mergeConfigurations(
    base: Configuration,
    override: Partial<Configuration>,
    sources: Record<keyof Configuration, ConfigSource>,
    source: ConfigSource,
    errors: string[]
  ): Configuration {
    const merged = ConfigurationSchema.safeParse({ ...base, ...override });
    if (!merged.success) {
      errors.push(`Configuration validation failed: ${this.describeZodError(merged.error)}`);
      return base;
    }

    for (const key of CONFIG_KEYS) {
      if (override[key] !== undefined) {
        sources[key] = source;
      }
    }
    return merged.data;
  }

  /**
   * Expand paths and flag unusual combinations
   */
  private postProcessConfiguration(config: Configuration): {
    config: Configuration;
    warnings: string[];
  } {
    const warnings: string[] = [];

    const allowedDirectories = config.allowedDirectories.map(dir => {
      if (dir.startsWith('~/')) {
        return path.join(os.homedir(), dir.slice(2));
      }
      return path.resolve(dir);
    });

    if (config.slackLength === 0) {
      warnings.push('slackLength is 0: slack space will always be reported empty');
    }

    return {
      config: { ...config, allowedDirectories },
      warnings
    };
  }

  private describeZodError(error: z.ZodError): string {
    return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
  }
}
