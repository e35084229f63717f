/**
 * Compressor
 *
 * Turns a verified spool into a gzip stream. Every failure on the way out
 * surfaces as CompressionIOError.
 */

import * as fs from 'node:fs';
import { Readable } from 'node:stream';
import { createGzip, gunzip } from 'node:zlib';
import { promisify } from 'node:util';
import { CompressionIOError, type VerifiedContent } from '@netdepot/core';

const gunzipAsync = promisify(gunzip);

export interface CompressOptions {
  level: number;
}

async function* gzipChunks(spoolPath: string, level: number): AsyncGenerator<Buffer> {
  const source = fs.createReadStream(spoolPath);
  const gzip = createGzip({ level });
  source.on('error', (err) => gzip.destroy(err));
  source.pipe(gzip);

  try {
    for await (const chunk of gzip) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  } catch (err) {
    throw new CompressionIOError(err instanceof Error ? err.message : String(err), { cause: err });
  } finally {
    source.destroy();
    gzip.destroy();
  }
}

/**
 * Gzip the verified bytes at a fixed level.
 */
export function createCompressedStream(content: VerifiedContent, options: CompressOptions): Readable {
  return Readable.from(gzipChunks(content.spoolPath, options.level), { objectMode: false });
}

/**
 * Decompress a whole gzip buffer. Used for diagnostics and tests.
 */
export async function gunzipToBuffer(data: Buffer): Promise<Buffer> {
  return gunzipAsync(data);
}
