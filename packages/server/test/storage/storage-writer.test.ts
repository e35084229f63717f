/**
 * Storage Writer Tests
 *
 * Tests for atomic publication, duplicate handling and corruption detection.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { gzipSync, gunzipSync } from 'node:zlib';
import {
  AlreadyUploadedError,
  ArtifactConflictError,
  CompressionIOError,
  parseNetFilename,
  type ParsedName,
} from '@netdepot/core';
import { createCompressedStream } from '../../src/storage/compressor.js';
import { StorageWriter } from '../../src/storage/storage-writer.js';
import { NET_DATA, listDir, makeTempDir, netName, sha256, testConfig } from '../helpers.js';

describe('StorageWriter', () => {
  let testDir: string;
  let parsed: ParsedName;
  let artifactName: string;

  beforeEach(async () => {
    testDir = await makeTempDir();
    parsed = parseNetFilename(netName(NET_DATA));
    artifactName = `${netName(NET_DATA)}.gz`;
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('should create a missing storage directory', async () => {
      const storageDir = join(testDir, 'a', 'b');
      const writer = new StorageWriter(testConfig(storageDir));

      await writer.initialize();

      expect((await stat(storageDir)).isDirectory()).toBe(true);
    });

    it('should remove stale temp files and keep artifacts', async () => {
      await writeFile(join(testDir, artifactName), gzipSync(NET_DATA));
      await writeFile(join(testDir, `${artifactName}.up_dead.tmp`), 'partial');

      const removed = await new StorageWriter(testConfig(testDir)).initialize();

      expect(removed).toBe(1);
      expect(await listDir(testDir)).toEqual([artifactName]);
    });

    it('should leave temp files alone when cleanup is disabled', async () => {
      await writeFile(join(testDir, `${artifactName}.up_dead.tmp`), 'partial');

      const removed = await new StorageWriter(testConfig(testDir, { cleanupOnInitialize: false })).initialize();

      expect(removed).toBe(0);
      expect(await listDir(testDir)).toEqual([`${artifactName}.up_dead.tmp`]);
    });
  });

  describe('inspect', () => {
    it('should report a missing artifact', async () => {
      const writer = new StorageWriter(testConfig(testDir));
      expect(await writer.inspect(parsed)).toEqual({ state: 'missing' });
    });

    it('should accept an artifact whose content matches its name', async () => {
      const compressed = gzipSync(NET_DATA);
      await writeFile(join(testDir, artifactName), compressed);

      const result = await new StorageWriter(testConfig(testDir)).inspect(parsed);

      expect(result).toMatchObject({
        state: 'valid',
        artifact: {
          fileName: artifactName,
          path: join(testDir, artifactName),
          digest: parsed.digest,
          originalSize: NET_DATA.length,
          compressedSize: compressed.length,
          duplicate: true,
        },
      });
    });

    it('should flag content that hashes to a different digest', async () => {
      const other = Buffer.from('some other content');
      await writeFile(join(testDir, artifactName), gzipSync(other));

      const result = await new StorageWriter(testConfig(testDir)).inspect(parsed);

      expect(result).toEqual({
        state: 'corrupt',
        reason: `content hashes to ${sha256(other).slice(0, 12)}`,
      });
    });

    it('should flag a file that is not gzip', async () => {
      await writeFile(join(testDir, artifactName), 'not compressed at all');

      const result = await new StorageWriter(testConfig(testDir)).inspect(parsed);

      expect(result.state).toBe('corrupt');
      expect(result).toMatchObject({ reason: expect.stringMatching(/^not a readable gzip file/) });
    });
  });

  describe('commit', () => {
    it('should publish the compressed bytes under the final name', async () => {
      const writer = new StorageWriter(testConfig(testDir));
      const compressed = gzipSync(NET_DATA);

      const artifact = await writer.commit(parsed, Readable.from([compressed]), {
        originalSize: NET_DATA.length,
      });

      expect(artifact).toMatchObject({
        fileName: artifactName,
        path: join(testDir, artifactName),
        digest: parsed.digest,
        originalSize: NET_DATA.length,
        compressedSize: compressed.length,
        duplicate: false,
      });
      expect(gunzipSync(await readFile(artifact.path)).equals(NET_DATA)).toBe(true);
      expect(await listDir(testDir)).toEqual([artifactName]);
    });

    it('should return the existing artifact for a duplicate upload', async () => {
      const writer = new StorageWriter(testConfig(testDir));
      const original = gzipSync(NET_DATA);
      await writer.commit(parsed, Readable.from([original]), { originalSize: NET_DATA.length });

      const second = Readable.from([gzipSync(NET_DATA, { level: 1 })]);
      const artifact = await writer.commit(parsed, second, { originalSize: NET_DATA.length });

      expect(artifact.duplicate).toBe(true);
      expect(artifact.compressedSize).toBe(original.length);
      expect(artifact.originalSize).toBe(NET_DATA.length);
      expect(second.destroyed).toBe(true);
      expect((await readFile(join(testDir, artifactName))).equals(original)).toBe(true);
    });

    it('should refuse a duplicate under the reject policy', async () => {
      const writer = new StorageWriter(testConfig(testDir, { duplicatePolicy: 'reject' }));
      const original = gzipSync(NET_DATA);
      await writer.commit(parsed, Readable.from([original]), { originalSize: NET_DATA.length });

      const error = await writer
        .commit(parsed, Readable.from([gzipSync(NET_DATA)]), { originalSize: NET_DATA.length })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AlreadyUploadedError);
      expect(error).toMatchObject({ message: `File ${netName(NET_DATA)} already uploaded` });
      expect((await readFile(join(testDir, artifactName))).equals(original)).toBe(true);
    });

    it('should report a corrupt artifact and leave it untouched', async () => {
      const corrupt = gzipSync(Buffer.from('tampered'));
      await writeFile(join(testDir, artifactName), corrupt);
      const writer = new StorageWriter(testConfig(testDir));

      const error = await writer
        .commit(parsed, Readable.from([gzipSync(NET_DATA)]), { originalSize: NET_DATA.length })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ArtifactConflictError);
      expect(error).toMatchObject({ code: 'ARTIFACT_CONFLICT', fileName: artifactName });
      expect((await readFile(join(testDir, artifactName))).equals(corrupt)).toBe(true);
      expect(await listDir(testDir)).toEqual([artifactName]);
    });

    it('should leave nothing behind when the compressed stream fails', async () => {
      const writer = new StorageWriter(testConfig(testDir));
      const failing = createCompressedStream(
        { spoolPath: join(testDir, 'missing.raw.tmp'), size: 1, digest: parsed.digest, fullDigest: parsed.digest },
        { level: 9 },
      );

      const error = await writer
        .commit(parsed, failing, { originalSize: NET_DATA.length })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CompressionIOError);
      expect(await listDir(testDir)).toEqual([]);
    });

    it('should store one artifact for concurrent commits of the same name', async () => {
      const writer = new StorageWriter(testConfig(testDir));

      const results = await Promise.all([
        writer.commit(parsed, Readable.from([gzipSync(NET_DATA)]), { originalSize: NET_DATA.length }),
        writer.commit(parsed, Readable.from([gzipSync(NET_DATA)]), { originalSize: NET_DATA.length }),
      ]);

      expect(results.map((artifact) => artifact.duplicate).sort()).toEqual([false, true]);
      expect(await listDir(testDir)).toEqual([artifactName]);
    });
  });
});
