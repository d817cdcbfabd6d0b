/**
 * Logger
 * Level-gated console logging. Everything goes to stderr so that stdout
 * stays reserved for inspection output and the MCP stdio transport.
 */

import { LogLevel } from '../config/types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3
};

export class Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.WARN,
    private readonly scope: string = 'fat32-inspect'
  ) {}

  public child(scope: string): Logger {
    return new Logger(this.level, `${this.scope}:${scope}`);
  }

  public isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  public error(message: string, ...details: unknown[]): void {
    this.write(LogLevel.ERROR, message, details);
  }

  public warn(message: string, ...details: unknown[]): void {
    this.write(LogLevel.WARN, message, details);
  }

  public info(message: string, ...details: unknown[]): void {
    this.write(LogLevel.INFO, message, details);
  }

  public debug(message: string, ...details: unknown[]): void {
    this.write(LogLevel.DEBUG, message, details);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const line = `[${this.scope}] ${level.toUpperCase()}: ${message}`;
    if (level === LogLevel.WARN) {
      console.warn(line, ...details);
    } else {
      console.error(line, ...details);
    }
  }
}
