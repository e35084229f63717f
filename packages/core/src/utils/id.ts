/**
 * Upload request IDs
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate an upload request ID, used in logs and temporary file names.
 *
 * @example
 * generateUploadId() // "up_a1b2c3d4e5f6a7b8"
 */
export function generateUploadId(): string {
  return `up_${randomBytes(8).toString('hex')}`;
}
