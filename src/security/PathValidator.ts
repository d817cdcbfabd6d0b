/**
 * PathValidator Class
 * Confines image paths handed to the MCP tools to the configured directories
 */

import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { PathValidationResult, SecurityEvent, ValidationOptions } from '../types/index';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { Logger } from '../logging/Logger';

const TRAVERSAL_PATTERNS = [
  /\.\.\//,           // ../
  /\.\.\\/,           // ..\
  /\/\.\./,           // /..
  /\\\.\./,           // \..
  /^\.\.$/,           // exactly ..
];

const ENCODED_PATTERNS = [
  /%2e%2e/i,          // ..
  /%00/i,             // null byte
];

export class PathValidator {
  private allowedPrefixes: string[];
  private enableAuditLogging: boolean;
  private securityEvents: SecurityEvent[] = [];
  private logger: Logger;

  constructor(options: ValidationOptions, logger: Logger = new Logger()) {
    this.allowedPrefixes = options.allowedPrefixes.map(prefix => this.resolveAbsolutePath(prefix));
    this.enableAuditLogging = options.enableAuditLogging;
    this.logger = logger.child('security');
  }

  /**
   * Validate an image path supplied by a client
   */
  public validatePath(inputPath: string): PathValidationResult {
    if (inputPath.trim().length === 0) {
      return this.createValidationResult(false, '', 'Empty path not allowed', false);
    }

    if (TRAVERSAL_PATTERNS.some(pattern => pattern.test(inputPath))) {
      this.logSecurityEvent('path_traversal', inputPath);
      return this.createValidationResult(false, '', 'Path traversal attempt detected', true);
    }

    if (ENCODED_PATTERNS.some(pattern => pattern.test(inputPath))) {
      this.logSecurityEvent('path_traversal', inputPath);
      return this.createValidationResult(false, '', 'Encoded path traversal attempt detected', true);
    }

    const resolvedPath = this.resolveAbsolutePath(inputPath);
    if (!this.isWithinAllowedDirectories(resolvedPath)) {
      this.logSecurityEvent('unauthorized_access', inputPath, resolvedPath);
      return this.createValidationResult(false, resolvedPath, 'Path outside allowed directories', true);
    }

    // Symlinks must not lead out of the allowed directories
    if (fs.existsSync(resolvedPath)) {
      const realPath = fs.realpathSync(resolvedPath);
      if (realPath !== resolvedPath && !this.isWithinAllowedDirectories(realPath)) {
        this.logSecurityEvent('unauthorized_access', inputPath, realPath);
        return this.createValidationResult(false, resolvedPath, 'Symlink points outside allowed directories', true);
      }
    }

    return this.createValidationResult(true, resolvedPath);
  }

  /**
   * Resolves input path to absolute path, handling ~ expansion
   */
  private resolveAbsolutePath(inputPath: string): string {
    if (inputPath === '~') {
      return os.homedir();
    }
    if (inputPath.startsWith('~/')) {
      return path.resolve(os.homedir(), inputPath.slice(2));
    }
    return path.resolve(inputPath);
  }

  private isWithinAllowedDirectories(resolvedPath: string): boolean {
    const normalizedPath = path.normalize(resolvedPath);
    return this.allowedPrefixes.some(prefix => {
      const normalizedPrefix = path.normalize(prefix);
      return normalizedPath.startsWith(normalizedPrefix + path.sep) ||
             normalizedPath === normalizedPrefix;
    });
  }

  /**
   * Logs security events for audit purposes
   */
  private logSecurityEvent(
    type: SecurityEvent['type'],
    attemptedPath: string,
    resolvedPath?: string
  ): void {
    if (!this.enableAuditLogging) {
      return;
    }

    this.securityEvents.push({ timestamp: new Date(), type, attemptedPath, resolvedPath });
    this.logger.warn(`${type}: ${attemptedPath}${resolvedPath ? ` -> ${resolvedPath}` : ''}`);
  }

  private createValidationResult(
    isValid: boolean,
    resolvedPath: string,
    error?: string,
    securityViolation?: boolean
  ): PathValidationResult {
    return { isValid, resolvedPath, error, securityViolation };
  }

  public getSecurityEvents(): SecurityEvent[] {
    return [...this.securityEvents];
  }

  public clearSecurityEvents(): void {
    this.securityEvents = [];
  }

  public getAllowedPrefixes(): string[] {
    return [...this.allowedPrefixes];
  }

  /**
   * Build a validator from the configured allowed directories
   */
  public static createFromConfiguration(configManager?: ConfigurationManager, logger?: Logger): PathValidator {
    const config = (configManager || ConfigurationManager.getInstance()).getConfiguration();
    return new PathValidator(
      { allowedPrefixes: config.allowedDirectories, enableAuditLogging: true },
      logger ?? new Logger(config.logLevel)
    );
  }
}
