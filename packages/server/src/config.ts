/**
 * NetDepot Server Configuration
 */

import * as path from 'node:path';
import {
  DEFAULT_NAMING,
  type NamingConvention,
  type NetDepotError,
  type StoredArtifact,
} from '@netdepot/core';

export type DuplicatePolicy = 'idempotent' | 'reject';

// ========== Hooks ==========

export interface UploadHooks {
  onStored?: (artifact: StoredArtifact) => void;
  onRejected?: (filename: string, error: NetDepotError) => void;
}

// ========== Config ==========

export interface ServerConfig {
  /** Directory holding the compressed artifacts and in-flight temp files */
  storageDir: string;
  maxUploadBytes?: number;
  /** gzip level, 0-9 */
  compressionLevel?: number;
  /** Idle timeout on the inbound upload stream */
  readTimeoutMs?: number;
  duplicatePolicy?: DuplicatePolicy;
  /** Multipart field carrying the file */
  fieldName?: string;
  naming?: Partial<NamingConvention>;
  cleanupOnInitialize?: boolean;
  hooks?: UploadHooks;
}

// ========== Defaults ==========

export const DEFAULT_SERVER = {
  maxUploadBytes: 256 * 1024 * 1024,  // 256MB
  compressionLevel: 9,
  readTimeoutMs: 30_000,
  duplicatePolicy: 'idempotent',
  fieldName: 'upload',
} as const;

// ========== Resolved ==========

export interface ResolvedServerConfig {
  readonly storageDir: string;
  readonly maxUploadBytes: number;
  readonly compressionLevel: number;
  readonly readTimeoutMs: number;
  readonly duplicatePolicy: DuplicatePolicy;
  readonly fieldName: string;
  readonly naming: Readonly<NamingConvention>;
  readonly cleanupOnInitialize: boolean;
  readonly hooks: UploadHooks;
}

function assertRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

export function resolveServerConfig(config: ServerConfig): ResolvedServerConfig {
  if (!config.storageDir) {
    throw new Error('storageDir is required');
  }

  const resolved: ResolvedServerConfig = {
    storageDir: path.resolve(config.storageDir),
    maxUploadBytes: config.maxUploadBytes ?? DEFAULT_SERVER.maxUploadBytes,
    compressionLevel: config.compressionLevel ?? DEFAULT_SERVER.compressionLevel,
    readTimeoutMs: config.readTimeoutMs ?? DEFAULT_SERVER.readTimeoutMs,
    duplicatePolicy: config.duplicatePolicy ?? DEFAULT_SERVER.duplicatePolicy,
    fieldName: config.fieldName ?? DEFAULT_SERVER.fieldName,
    naming: Object.freeze({
      prefix: config.naming?.prefix ?? DEFAULT_NAMING.prefix,
      extension: config.naming?.extension ?? DEFAULT_NAMING.extension,
      digestLength: config.naming?.digestLength ?? DEFAULT_NAMING.digestLength,
      algorithm: config.naming?.algorithm ?? DEFAULT_NAMING.algorithm,
    }),
    cleanupOnInitialize: config.cleanupOnInitialize ?? true,
    hooks: config.hooks ?? {},
  };

  assertRange('maxUploadBytes', resolved.maxUploadBytes, 1, Number.MAX_SAFE_INTEGER);
  assertRange('compressionLevel', resolved.compressionLevel, 0, 9);
  assertRange('readTimeoutMs', resolved.readTimeoutMs, 1, 24 * 60 * 60 * 1000);
  assertRange('naming.digestLength', resolved.naming.digestLength, 1, 128);

  return Object.freeze(resolved);
}
