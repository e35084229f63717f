/**
 * Temporary file naming and cleanup
 *
 * In-flight files live next to the artifacts so the final rename never
 * crosses a filesystem boundary. They always end in `.tmp` and are never
 * renamed to anything but a final `.gz` name.
 */

import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { generateUploadId, isNotFound } from '@netdepot/core';

export const TEMP_SUFFIX = '.tmp';
export const SPOOL_SUFFIX = `.raw${TEMP_SUFFIX}`;

export function isTempFile(name: string): boolean {
  return name.endsWith(TEMP_SUFFIX);
}

/**
 * Temp path for the compressed artifact, e.g. `nn-….nnue.gz.up_1a2b….tmp`
 */
export function compressedTempPath(dir: string, artifactName: string, uploadId = generateUploadId()): string {
  return join(dir, `${artifactName}.${uploadId}${TEMP_SUFFIX}`);
}

/**
 * Temp path for the raw spool, e.g. `nn-….nnue.up_1a2b….raw.tmp`
 */
export function spoolTempPath(dir: string, fileName: string, uploadId = generateUploadId()): string {
  return join(dir, `${fileName}.${uploadId}${SPOOL_SUFFIX}`);
}

/**
 * Remove a temp file, tolerating only its absence.
 */
export async function removeTempFile(filePath: string): Promise<void> {
  try {
    await rm(filePath);
  } catch (err) {
    if (!isNotFound(err)) {
      throw err;
    }
  }
}

/**
 * Removes temp files left behind by a previous run.
 *
 * Temp files are never renamed into place after a crash, so any of them
 * found at startup can be deleted.
 *
 * @returns Number of files removed
 */
export async function cleanupStaleTempFiles(dir: string): Promise<number> {
  // The directory may not exist yet on first run
  const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    if (isNotFound(err)) {
      return [];
    }
    throw err;
  });

  let cleaned = 0;
  for (const entry of entries) {
    if (entry.isFile() && isTempFile(entry.name)) {
      await removeTempFile(join(dir, entry.name));
      cleaned++;
    }
  }
  return cleaned;
}
