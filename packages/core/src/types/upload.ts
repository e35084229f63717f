/**
 * NetDepot Upload Types
 */

import type { Readable } from 'node:stream';
import type { NetDepotError } from '../errors/index.js';

// ========== Naming ==========

export type DigestAlgorithm = 'sha256' | 'sha512' | 'sha1';

/**
 * Naming convention for network files: `<prefix>-<hex-digest>.<extension>`
 */
export interface NamingConvention {
  prefix: string;
  extension: string;
  /** Number of hexadecimal digest characters embedded in the name */
  digestLength: number;
  algorithm: DigestAlgorithm;
}

// ========== Request ==========

export interface UploadRequest {
  /** Untrusted filename as sent by the client */
  filename: string;
  content: Readable;
  /** Content length announced by the client, if any */
  declaredLength?: number;
}

// ========== Pipeline values ==========

export interface ParsedName {
  /** Normalized name, digest in lower case */
  fileName: string;
  base: string;
  /** Expected digest token, lower case */
  digest: string;
  extension: string;
}

export interface VerifiedContent {
  /** Temporary spool file holding exactly the verified bytes */
  spoolPath: string;
  size: number;
  /** Digest truncated to the naming convention's token length */
  digest: string;
  fullDigest: string;
}

export interface StoredArtifact {
  /** Final name in the storage directory, e.g. `nn-0123456789ab.nnue.gz` */
  fileName: string;
  path: string;
  digest: string;
  originalSize: number;
  compressedSize: number;
  createdAt: string;
  /** True when an identical artifact was already stored */
  duplicate: boolean;
}

export type PipelineResult =
  | { status: 'stored'; artifact: StoredArtifact }
  | { status: 'rejected'; error: NetDepotError };

// ========== State ==========

export type UploadState =
  | 'received'
  | 'parsed'
  | 'verified'
  | 'compressed'
  | 'stored'
  | 'rejected';
