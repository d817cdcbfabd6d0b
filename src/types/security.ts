/**
 * Security and Path Validation Types
 */

export interface PathValidationResult {
  isValid: boolean;
  resolvedPath: string;
  error?: string | undefined;
  securityViolation?: boolean | undefined;
}

export interface SecurityEvent {
  timestamp: Date;
  type: 'path_traversal' | 'unauthorized_access';
  attemptedPath: string;
  resolvedPath?: string | undefined;
}

/**
 * Security validation options
 */
export interface ValidationOptions {
  allowedPrefixes: string[];
  enableAuditLogging: boolean;
}
