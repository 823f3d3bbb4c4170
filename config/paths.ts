/**
 * Centralized Path Configuration
 * Single source of truth for the file system locations used by the service
 */

import { resolve, isAbsolute } from 'path';

/**
 * Path configuration with environment variable overrides
 */
export const PATHS = {
  ROOT_DIR: process.cwd(),

  // Persisted lessons, requests and the fingerprint index
  DATA_DIR: process.env.LESSON_DATA_DIR || 'data',

  // JSON schemas for model payloads and stored records
  SCHEMAS_DIR: process.env.SCHEMAS_DIR || 'lesson-engine/schemas-shared'
} as const;

/**
 * Resolve path relative to project root
 */
export function resolvePath(...segments: string[]): string {
  return resolve(PATHS.ROOT_DIR, ...segments);
}

/**
 * Absolute location of a schema file
 */
export function schemaPath(fileName: string): string {
  return resolvePath(PATHS.SCHEMAS_DIR, fileName);
}

/**
 * Configuration validation
 */
export function validatePathConfiguration(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (isAbsolute(PATHS.SCHEMAS_DIR)) {
    errors.push(`Path SCHEMAS_DIR should be relative, got: ${PATHS.SCHEMAS_DIR}`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
