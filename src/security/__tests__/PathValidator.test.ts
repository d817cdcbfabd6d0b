/**
 * PathValidator Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PathValidator } from '../PathValidator';
import { ConfigurationManager } from '../../config/ConfigurationManager';
import { Logger } from '../../logging/Logger';
import { LogLevel } from '../../config/types';

describe('PathValidator', () => {
  let tempDir: string;
  let allowedDir: string;
  let outsideDir: string;
  let validator: PathValidator;
  let warnSpy: jest.SpyInstance;

  beforeAll(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fat32-paths-')));
    allowedDir = path.join(tempDir, 'evidence');
    outsideDir = path.join(tempDir, 'elsewhere');
    fs.mkdirSync(allowedDir);
    fs.mkdirSync(outsideDir);
    fs.writeFileSync(path.join(allowedDir, 'disk.img'), Buffer.alloc(16));
    fs.writeFileSync(path.join(outsideDir, 'other.img'), Buffer.alloc(16));
    fs.symlinkSync(path.join(outsideDir, 'other.img'), path.join(allowedDir, 'escape.img'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    validator = new PathValidator({ allowedPrefixes: [allowedDir], enableAuditLogging: true });
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('Allowed paths', () => {
    test('should accept images inside an allowed directory', () => {
      const result = validator.validatePath(path.join(allowedDir, 'disk.img'));

      expect(result).toEqual({
        isValid: true,
        resolvedPath: path.join(allowedDir, 'disk.img'),
        error: undefined,
        securityViolation: undefined
      });
    });

    test('should accept the allowed directory itself', () => {
      expect(validator.validatePath(allowedDir).isValid).toBe(true);
    });

    test('should accept paths that do not exist yet', () => {
      expect(validator.validatePath(path.join(allowedDir, 'later.img')).isValid).toBe(true);
    });
  });

  describe('Rejected paths', () => {
    test('should reject empty paths without flagging a violation', () => {
      const result = validator.validatePath('   ');

      expect(result.isValid).toBe(false);
      expect(result.error).toBe('Empty path not allowed');
      expect(result.securityViolation).toBe(false);
    });

    test('should reject paths outside the allowed directories', () => {
      const result = validator.validatePath(path.join(outsideDir, 'other.img'));

      expect(result.isValid).toBe(false);
      expect(result.error).toBe('Path outside allowed directories');
      expect(result.securityViolation).toBe(true);
    });

    test('should not treat a sibling with a shared prefix as inside', () => {
      expect(validator.validatePath(`${allowedDir}-copy/disk.img`).isValid).toBe(false);
    });

    test.each([
      '../disk.img',
      'evidence/../../etc/passwd',
      '..'
    ])('should reject traversal in %s', input => {
      const result = validator.validatePath(input);

      expect(result.error).toBe('Path traversal attempt detected');
      expect(result.securityViolation).toBe(true);
    });

    test('should reject encoded traversal', () => {
      const result = validator.validatePath(path.join(allowedDir, '%2E%2E', 'disk.img'));

      expect(result.error).toBe('Encoded path traversal attempt detected');
    });

    test('should reject symlinks that lead out of the allowed directories', () => {
      const result = validator.validatePath(path.join(allowedDir, 'escape.img'));

      expect(result.isValid).toBe(false);
      expect(result.error).toBe('Symlink points outside allowed directories');
    });
  });

  describe('Audit logging', () => {
    test('should record and log security events', () => {
      validator.validatePath('../disk.img');

      const events = validator.getSecurityEvents();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'path_traversal', attemptedPath: '../disk.img' });
      expect(warnSpy).toHaveBeenCalledWith('[fat32-inspect:security] WARN: path_traversal: ../disk.img');
    });

    test('should clear recorded events', () => {
      validator.validatePath(path.join(outsideDir, 'other.img'));
      validator.clearSecurityEvents();

      expect(validator.getSecurityEvents()).toEqual([]);
    });

    test('should record nothing when auditing is disabled', () => {
      const quiet = new PathValidator({ allowedPrefixes: [allowedDir], enableAuditLogging: false });

      quiet.validatePath('../disk.img');

      expect(quiet.getSecurityEvents()).toEqual([]);
      expect(warnSpy).not.toHaveBeenCalled();
    });
  });

  describe('Configuration', () => {
    test('should take its prefixes from the configured allowed directories', () => {
      const configManager = ConfigurationManager.create({ allowedDirectories: [allowedDir] });

      const configured = PathValidator.createFromConfiguration(configManager, new Logger(LogLevel.ERROR));

      expect(configured.getAllowedPrefixes()).toEqual([allowedDir]);
      expect(configured.validatePath(path.join(allowedDir, 'disk.img')).isValid).toBe(true);
    });
  });
});
