/**
 * Hash Verifier
 *
 * Hashes an upload in a single streaming pass while copying it to a spool,
 * then checks the digest against the token embedded in the filename.
 */

import { createHash, type Hash } from 'node:crypto';
import { Transform, type Readable, type Writable, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  EmptyContentError,
  HashMismatchError,
  NetDepotError,
  PayloadTooLargeError,
  UploadAbortedError,
  fromFsError,
} from '../errors/index.js';
import { DEFAULT_NAMING } from '../naming/filename-parser.js';
import type { DigestAlgorithm, ParsedName } from '../types/upload.js';

export interface VerifyOptions {
  algorithm?: DigestAlgorithm;
  /** Fail with PayloadTooLargeError once more bytes than this arrive */
  maxBytes?: number;
  /** Used in error messages for spool failures */
  spoolPath?: string;
}

export interface VerificationResult {
  size: number;
  digest: string;
  fullDigest: string;
}

/**
 * Pass-through stream that feeds every chunk to a hash and counts bytes.
 */
export class DigestMeter extends Transform {
  private readonly hash: Hash;
  private bytes = 0;

  constructor(
    algorithm: DigestAlgorithm = DEFAULT_NAMING.algorithm,
    private readonly maxBytes = Number.POSITIVE_INFINITY,
  ) {
    super();
    this.hash = createHash(algorithm);
  }

  get size(): number {
    return this.bytes;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.bytes > this.maxBytes) {
      callback(new PayloadTooLargeError(this.maxBytes));
      return;
    }
    this.hash.update(chunk);
    callback(null, chunk);
  }

  /** Only valid once the stream has finished */
  hexDigest(): string {
    return this.hash.digest('hex');
  }
}

function whenClosed(stream: Writable): Promise<void> {
  if (stream.closed) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    stream.once('close', () => resolve());
  });
}

export function digestMatches(expected: string, actual: string): boolean {
  return expected.toLowerCase() === actual.slice(0, expected.length).toLowerCase();
}

/**
 * Verify `source` against `parsed.digest`, writing every byte to `spool`.
 *
 * Errors raised by the source propagate unchanged; spool failures are mapped
 * to storage errors.
 */
export async function verifyContent(
  source: Readable,
  parsed: ParsedName,
  spool: Writable,
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  const meter = new DigestMeter(options.algorithm, options.maxBytes);

  // pipeline() destroys every stream with the first error, so only the
  // stream that failed first tells where the failure came from
  let sourceFailed = false;
  let spoolError: unknown;
  source.once('error', () => {
    sourceFailed = spoolError === undefined;
  });
  spool.once('error', (err) => {
    if (!sourceFailed) {
      spoolError = err;
    }
  });

  try {
    await pipeline(source, meter, spool);
  } catch (err) {
    // The spool may still be opening; its file must exist before callers remove it
    await whenClosed(spool);
    if (err instanceof NetDepotError) {
      throw err;
    }
    if (spoolError !== undefined) {
      throw fromFsError(spoolError, options.spoolPath ?? 'upload spool');
    }
    throw new UploadAbortedError(
      `Upload stream failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (meter.size === 0) {
    throw new EmptyContentError(parsed.fileName);
  }

  const fullDigest = meter.hexDigest();
  const digest = fullDigest.slice(0, parsed.digest.length);
  if (!digestMatches(parsed.digest, fullDigest)) {
    throw new HashMismatchError(parsed.fileName, parsed.digest, digest);
  }

  return { size: meter.size, digest, fullDigest };
}
