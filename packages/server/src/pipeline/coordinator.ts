/**
 * Upload Coordinator
 *
 * Runs one upload through parse → verify → compress → store and maps the
 * outcome to a PipelineResult. Holds no state across requests.
 */

import {
  UploadStateMachine,
  generateUploadId,
  parseNetFilename,
  PayloadTooLargeError,
  toNetDepotError,
  verifyContent,
  type NetDepotError,
  type PipelineResult,
  type UploadEvent,
  type UploadRequest,
  type VerifiedContent,
} from '@netdepot/core';
import type { ResolvedServerConfig } from '../config.js';
import { createCompressedStream } from '../storage/compressor.js';
import type { StorageWriter } from '../storage/storage-writer.js';

export interface PipelineContext {
  config: ResolvedServerConfig;
  storage: StorageWriter;
}

function advance(stateMachine: UploadStateMachine, event: UploadEvent): void {
  const result = stateMachine.transition(event);
  if (!result.success) {
    throw new Error(`Upload state transition failed: ${result.error}`);
  }
}

/**
 * Handle a single upload request.
 *
 * Never throws for pipeline failures; they are returned as rejected results.
 */
export async function handleUpload(
  request: UploadRequest,
  context: PipelineContext,
): Promise<PipelineResult> {
  const { config, storage } = context;
  const uploadId = generateUploadId();
  const stateMachine = new UploadStateMachine();

  let spoolPath: string | undefined;
  let result: PipelineResult;

  try {
    // Step 1: Filename
    const parsed = parseNetFilename(request.filename, config.naming);
    advance(stateMachine, { type: 'NAME_PARSED' });

    if (request.declaredLength !== undefined && request.declaredLength > config.maxUploadBytes) {
      throw new PayloadTooLargeError(config.maxUploadBytes);
    }

    // Step 2: Digest, spooling the bytes next to the final location
    spoolPath = storage.spoolPath(parsed, uploadId);
    const verification = await verifyContent(
      request.content,
      parsed,
      storage.createSpool(spoolPath),
      { algorithm: config.naming.algorithm, maxBytes: config.maxUploadBytes, spoolPath },
    );
    const verified: VerifiedContent = { spoolPath, ...verification };
    advance(stateMachine, { type: 'CONTENT_VERIFIED' });

    // Step 3: Compression (lazy, consumed by the writer). The stage only
    // counts as done once the writer has read the whole gzip stream.
    const compressed = createCompressedStream(verified, { level: config.compressionLevel });
    compressed.once('end', () => {
      stateMachine.transition({ type: 'CONTENT_COMPRESSED' });
    });

    // Step 4: Atomic store
    const artifact = await storage.commit(parsed, compressed, {
      originalSize: verified.size,
      uploadId,
    });
    if (stateMachine.getState() === 'verified') {
      // Duplicate: the stored artifact stands in for this upload's gzip output
      advance(stateMachine, { type: 'CONTENT_COMPRESSED' });
    }
    advance(stateMachine, { type: 'ARTIFACT_STORED' });

    console.log(
      `[NetDepot:Upload] ${uploadId} stored ${artifact.fileName}` +
      ` (${artifact.originalSize} -> ${artifact.compressedSize} bytes${artifact.duplicate ? ', duplicate' : ''})`,
    );
    result = { status: 'stored', artifact };
  } catch (err) {
    const error = toNetDepotError(err);
    stateMachine.transition({ type: 'REJECT', error });
    logRejection(uploadId, request.filename, stateMachine, error);
    // Drain whatever the pipeline did not read so the request can finish
    if (!request.content.destroyed) {
      request.content.resume();
    }
    result = { status: 'rejected', error };
  } finally {
    if (spoolPath) {
      const leftover = spoolPath;
      await storage.removeTemp(leftover).catch((cleanupErr: unknown) => {
        console.error(`[NetDepot:Upload] ${uploadId} failed to remove spool ${leftover}:`, cleanupErr);
      });
    }
  }

  notifyHooks(config, request.filename, result);
  return result;
}

function notifyHooks(config: ResolvedServerConfig, filename: string, result: PipelineResult): void {
  try {
    if (result.status === 'stored') {
      config.hooks.onStored?.(result.artifact);
    } else {
      config.hooks.onRejected?.(filename, result.error);
    }
  } catch (hookErr) {
    console.error('[NetDepot:Upload] Hook failed:', hookErr);
  }
}

function logRejection(
  uploadId: string,
  filename: string,
  stateMachine: UploadStateMachine,
  error: NetDepotError,
): void {
  const stage = stateMachine.getRejectedAt() ?? 'received';
  const line = `[NetDepot:Upload] ${uploadId} rejected ${filename || '<no filename>'} at ${stage}: ${error.code} ${error.message}`;
  if (error.category === 'client') {
    console.warn(line);
  } else {
    console.error(line, error.cause ?? '');
  }
}
