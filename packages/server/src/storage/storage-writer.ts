/**
 * Storage Writer
 *
 * Publishes compressed artifacts into the storage directory with
 * write-temp, fsync, atomic rename. An existing final name is never
 * overwritten: it is verified instead, and either satisfies the request or
 * is reported as a conflict.
 */

import * as fs from 'node:fs';
import { mkdir, open, rename, stat, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { Writable, type Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import {
  AlreadyUploadedError,
  ArtifactConflictError,
  DigestMeter,
  artifactFileName,
  digestMatches,
  fromFsError,
  isNotFound,
  type ParsedName,
  type StoredArtifact,
} from '@netdepot/core';
import type { ResolvedServerConfig } from '../config.js';
import { NameLock } from './name-lock.js';
import {
  cleanupStaleTempFiles,
  compressedTempPath,
  removeTempFile,
  spoolTempPath,
} from './temp-files.js';

export type ArtifactInspection =
  | { state: 'missing' }
  | { state: 'valid'; artifact: StoredArtifact }
  | { state: 'corrupt'; reason: string };

export interface CommitMeta {
  originalSize: number;
  uploadId?: string;
}

export class StorageWriter {
  private readonly lock = new NameLock();

  constructor(private readonly config: ResolvedServerConfig) {}

  get storageDir(): string {
    return this.config.storageDir;
  }

  /**
   * Create the storage directory and drop temp files left by a crash.
   *
   * @returns Number of stale temp files removed
   */
  async initialize(): Promise<number> {
    try {
      await mkdir(this.storageDir, { recursive: true });
    } catch (err) {
      throw fromFsError(err, this.storageDir);
    }

    if (!this.config.cleanupOnInitialize) {
      return 0;
    }

    const cleaned = await cleanupStaleTempFiles(this.storageDir);
    if (cleaned > 0) {
      console.log(`[NetDepot:Storage] Removed ${cleaned} stale temp file(s) from ${this.storageDir}`);
    }
    return cleaned;
  }

  artifactPath(parsed: ParsedName): string {
    return path.join(this.storageDir, artifactFileName(parsed));
  }

  spoolPath(parsed: ParsedName, uploadId?: string): string {
    return spoolTempPath(this.storageDir, parsed.fileName, uploadId);
  }

  /**
   * Exclusive-create writable for the raw upload bytes. Open failures are
   * emitted as stream errors.
   */
  createSpool(spoolPath: string): fs.WriteStream {
    return fs.createWriteStream(spoolPath, { flags: 'wx' });
  }

  async removeTemp(filePath: string): Promise<void> {
    try {
      await removeTempFile(filePath);
    } catch (err) {
      throw fromFsError(err, filePath);
    }
  }

  /**
   * Check whatever is stored under the final name for `parsed`.
   */
  async inspect(parsed: ParsedName): Promise<ArtifactInspection> {
    const fileName = artifactFileName(parsed);
    const finalPath = this.artifactPath(parsed);

    let stats: fs.Stats;
    try {
      stats = await stat(finalPath);
    } catch (err) {
      if (isNotFound(err)) {
        return { state: 'missing' };
      }
      throw fromFsError(err, finalPath);
    }

    const source = fs.createReadStream(finalPath);
    const gunzip = createGunzip();
    let decodeFailed = false;
    let readError: unknown;
    gunzip.once('error', () => {
      decodeFailed = readError === undefined;
    });
    source.once('error', (err) => {
      if (!decodeFailed) {
        readError = err;
      }
    });

    const meter = new DigestMeter(this.config.naming.algorithm);
    const discard = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });

    try {
      await pipeline(source, gunzip, meter, discard);
    } catch (err) {
      if (readError !== undefined) {
        throw fromFsError(readError, finalPath);
      }
      return {
        state: 'corrupt',
        reason: `not a readable gzip file (${err instanceof Error ? err.message : String(err)})`,
      };
    }

    const fullDigest = meter.hexDigest();
    if (!digestMatches(parsed.digest, fullDigest)) {
      return {
        state: 'corrupt',
        reason: `content hashes to ${fullDigest.slice(0, parsed.digest.length)}`,
      };
    }

    return {
      state: 'valid',
      artifact: {
        fileName,
        path: finalPath,
        digest: parsed.digest,
        originalSize: meter.size,
        compressedSize: stats.size,
        createdAt: stats.mtime.toISOString(),
        duplicate: true,
      },
    };
  }

  /**
   * Store `compressed` under the final name for `parsed`.
   *
   * The compressed stream is only consumed when nothing is stored under that
   * name yet; otherwise it is destroyed.
   */
  async commit(parsed: ParsedName, compressed: Readable, meta: CommitMeta): Promise<StoredArtifact> {
    const fileName = artifactFileName(parsed);

    return this.lock.run(fileName, async () => {
      const existing = await this.inspect(parsed);

      if (existing.state !== 'missing') {
        compressed.destroy();
        return this.resolveExisting(parsed, existing);
      }

      return this.writeAtomically(parsed, compressed, meta);
    });
  }

  private resolveExisting(
    parsed: ParsedName,
    existing: Exclude<ArtifactInspection, { state: 'missing' }>,
  ): StoredArtifact {
    const fileName = artifactFileName(parsed);

    if (existing.state === 'corrupt') {
      console.error(`[NetDepot:Storage] Corrupt artifact ${fileName}: ${existing.reason}`);
      throw new ArtifactConflictError(fileName, existing.reason);
    }

    if (this.config.duplicatePolicy === 'reject') {
      throw new AlreadyUploadedError(parsed.fileName);
    }

    return existing.artifact;
  }

  private async writeAtomically(
    parsed: ParsedName,
    compressed: Readable,
    meta: CommitMeta,
  ): Promise<StoredArtifact> {
    const fileName = artifactFileName(parsed);
    const finalPath = this.artifactPath(parsed);
    const tempPath = compressedTempPath(this.storageDir, fileName, meta.uploadId);

    let handle: FileHandle;
    try {
      handle = await open(tempPath, 'wx');
    } catch (err) {
      compressed.destroy();
      throw fromFsError(err, tempPath);
    }

    let renamed = false;
    try {
      let compressedSize = 0;
      try {
        for await (const chunk of compressed) {
          const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
          let offset = 0;
          while (offset < buffer.length) {
            const { bytesWritten } = await handle.write(buffer, offset, buffer.length - offset);
            offset += bytesWritten;
          }
          compressedSize += buffer.length;
        }
        await handle.sync();
      } finally {
        await handle.close();
      }

      await rename(tempPath, finalPath);
      renamed = true;
      await this.syncDirectory();

      return {
        fileName,
        path: finalPath,
        digest: parsed.digest,
        originalSize: meta.originalSize,
        compressedSize,
        createdAt: new Date().toISOString(),
        duplicate: false,
      };
    } catch (err) {
      throw fromFsError(err, tempPath);
    } finally {
      if (!renamed) {
        await removeTempFile(tempPath).catch((cleanupErr: unknown) => {
          console.error(`[NetDepot:Storage] Failed to remove temp file ${tempPath}:`, cleanupErr);
        });
      }
    }
  }

  /**
   * fsync the directory so the rename itself is durable. The artifact is
   * already complete and visible at this point, so failure only warns.
   */
  private async syncDirectory(): Promise<void> {
    try {
      const dirHandle = await open(this.storageDir, 'r');
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (err) {
      console.warn(`[NetDepot:Storage] Directory fsync failed for ${this.storageDir}:`, err);
    }
  }
}
