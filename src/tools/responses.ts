/**
 * Shared MCP response helpers for the inspector tools
 */

import * as fs from 'fs';
import { McpContent, McpTextContent } from '../types/index';
import { ToolErrorType } from '../types/tools';
import { PathValidator } from '../security/PathValidator';
import { isFat32Error } from '../errors/Fat32Error';

export type ImagePathResolution =
  | { ok: true; resolvedPath: string }
  | { ok: false; response: McpContent[] };

/**
 * Creates an error response in MCP format
 */
export function createErrorResponse(action: string, message: string, errorType: ToolErrorType): McpContent[] {
  const errorContent: McpTextContent = {
    type: 'text',
    text: `Error ${action}: ${message}\nError Type: ${errorType}`
  };
  return [errorContent];
}

/**
 * Maps parse failures and unexpected errors onto an error response
 */
export function handleError(action: string, error: unknown, imagePath: string): McpContent[] {
  if (isFat32Error(error)) {
    return createErrorResponse(action, `${error.describe()} (${imagePath})`, error.errorType);
  }
  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  return createErrorResponse(action, `${message} (${imagePath})`, 'UNKNOWN_ERROR');
}

/**
 * Validate a client-supplied image path and check that it names a regular file
 */
export function resolveImagePath(action: string, pathValidator: PathValidator, imagePath: string): ImagePathResolution {
  const validationResult = pathValidator.validatePath(imagePath);
  if (!validationResult.isValid) {
    return {
      ok: false,
      response: createErrorResponse(
        action,
        validationResult.error || 'Invalid path',
        validationResult.securityViolation ? 'SECURITY_ERROR' : 'VALIDATION_ERROR'
      )
    };
  }

  const resolvedPath = validationResult.resolvedPath;
  if (!fs.existsSync(resolvedPath)) {
    return { ok: false, response: createErrorResponse(action, `Image not found: ${imagePath}`, 'FILE_NOT_FOUND') };
  }
  if (!fs.statSync(resolvedPath).isFile()) {
    return { ok: false, response: createErrorResponse(action, `Image is not a regular file: ${imagePath}`, 'VALIDATION_ERROR') };
  }

  return { ok: true, resolvedPath };
}
