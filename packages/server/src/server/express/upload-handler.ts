/**
 * NetDepot Express Upload Handler
 *
 * Accepts multipart uploads of network files and feeds the file part
 * straight into the upload pipeline without buffering it.
 */

import type { Readable } from 'node:stream';
import busboy from 'busboy';
import { Router, type Request, type Response } from 'express';
import {
  ErrorCodes,
  InvalidUploadError,
  PayloadTooLargeError,
  ReadTimeoutError,
  UploadAbortedError,
  toNetDepotError,
  type NetDepotError,
  type PipelineResult,
} from '@netdepot/core';
import { resolveServerConfig, type ResolvedServerConfig, type ServerConfig } from '../../config.js';
import { handleUpload, type PipelineContext } from '../../pipeline/coordinator.js';
import { StorageWriter } from '../../storage/storage-writer.js';

export const UPLOAD_PATH = '/upload_net/';

/** Headroom for boundaries and part headers in the early Content-Length check */
export const MULTIPART_ALLOWANCE = 64 * 1024;

/**
 * Options for the upload handler
 */
export interface UploadHandlerOptions {
  config: ServerConfig;
  /** Reuse an existing writer instead of creating one from `config` */
  storage?: StorageWriter;
}

/**
 * Result of creating the handler
 */
export interface UploadHandlerResult {
  /** Express router to mount */
  router: Router;
  /** Writer backing the router; call `initialize()` before serving */
  storage: StorageWriter;
  config: ResolvedServerConfig;
}

export interface UploadResponseBody {
  detail: string;
  file: string;
  digest: string;
  originalSize: number;
  compressedSize: number;
  duplicate: boolean;
}

function rejected(error: NetDepotError): PipelineResult {
  return { status: 'rejected', error };
}

/**
 * Parse the multipart request and run its file part through the pipeline.
 *
 * Resolves once the pipeline has finished with the file part, which may be
 * before the rest of the request body has been read.
 */
function receiveUpload(req: Request, context: PipelineContext): Promise<PipelineResult> {
  const { config } = context;

  const declaredLength = Number(req.headers['content-length']);
  if (Number.isFinite(declaredLength) && declaredLength > config.maxUploadBytes + MULTIPART_ALLOWANCE) {
    return Promise.resolve(rejected(new PayloadTooLargeError(config.maxUploadBytes)));
  }

  const contentType = req.headers['content-type'];
  if (!contentType) {
    return Promise.resolve(rejected(
      new InvalidUploadError('Missing Content-Type', 'Send the file as multipart/form-data'),
    ));
  }

  let parser: busboy.Busboy;
  try {
    parser = busboy({
      headers: { ...req.headers, 'content-type': contentType },
      // One byte of slack so the pipeline, not the parser, sees the overflow
      limits: { fileSize: config.maxUploadBytes + 1 },
    });
  } catch (err) {
    return Promise.resolve(rejected(new InvalidUploadError(
      `Expected a multipart/form-data upload: ${err instanceof Error ? err.message : String(err)}`,
      'Send the file as multipart/form-data',
    )));
  }

  return new Promise<PipelineResult>((resolve) => {
    let settled = false;
    let upload: Readable | undefined;

    const settle = (result: PipelineResult): void => {
      if (settled) return;
      settled = true;
      req.setTimeout(0);
      resolve(result);
    };

    // Before the file part arrives there is no pipeline to fail, so the
    // request is rejected directly; afterwards the pipeline reports it.
    const abort = (error: NetDepotError): void => {
      if (!upload) {
        settle(rejected(error));
      } else if (!upload.destroyed && !upload.readableEnded) {
        upload.destroy(error);
      }
    };

    parser.on('file', (fieldName, stream, info) => {
      stream.on('error', (err) => {
        if (settled) {
          console.warn(`[NetDepot:Upload] Upload stream failed after response: ${err.message}`);
        }
      });

      if (fieldName !== config.fieldName || upload) {
        stream.resume();
        return;
      }

      upload = stream;
      handleUpload({ filename: info.filename, content: stream }, context).then(
        settle,
        (err: unknown) => settle(rejected(toNetDepotError(err))),
      );
    });

    parser.on('close', () => {
      if (!upload) {
        settle(rejected(new InvalidUploadError(
          `No file in form field "${config.fieldName}"`,
          `Attach the network file as the "${config.fieldName}" field`,
        )));
      }
    });

    parser.on('error', (err: unknown) => {
      abort(new InvalidUploadError(
        `Malformed multipart body: ${err instanceof Error ? err.message : String(err)}`,
      ));
    });

    req.setTimeout(config.readTimeoutMs, () => {
      abort(new ReadTimeoutError(config.readTimeoutMs));
    });

    req.on('error', (err) => {
      abort(new UploadAbortedError(`Request stream failed: ${err.message}`));
    });

    req.on('close', () => {
      if (!req.complete) {
        abort(new UploadAbortedError());
      }
    });

    req.pipe(parser);
  });
}

function sendResult(req: Request, res: Response, result: PipelineResult): void {
  if (result.status === 'stored') {
    const { artifact } = result;
    const body: UploadResponseBody = {
      detail: 'File uploaded successfully',
      file: artifact.fileName,
      digest: artifact.digest,
      originalSize: artifact.originalSize,
      compressedSize: artifact.compressedSize,
      duplicate: artifact.duplicate,
    };
    res.json(body);
    return;
  }

  const { error } = result;
  if (error.code === ErrorCodes.READ_TIMEOUT || error.code === ErrorCodes.UPLOAD_ABORTED) {
    res.setHeader('Connection', 'close');
  } else if (!req.complete) {
    // Discard the rest of the body so the connection can be reused
    req.unpipe();
    req.resume();
  }

  if (!res.headersSent && !res.destroyed) {
    res.status(error.httpStatus).json(error.toErrorBody());
  }
}

/**
 * Create an Express router that accepts network uploads
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { uploadHandler } from '@netdepot/server/server/express';
 *
 * const app = express();
 * const { router, storage } = uploadHandler({
 *   config: { storageDir: './nn' },
 * });
 *
 * await storage.initialize();
 * app.use(router);
 * ```
 */
export function uploadHandler(options: UploadHandlerOptions): UploadHandlerResult {
  const config = resolveServerConfig(options.config);
  const storage = options.storage ?? new StorageWriter(config);
  const context: PipelineContext = { config, storage };
  const router = Router();

  /**
   * POST /upload_net/ - Upload a network file
   */
  router.post(UPLOAD_PATH, async (req, res) => {
    let result: PipelineResult;
    try {
      result = await receiveUpload(req, context);
    } catch (error) {
      console.error('[NetDepot:Upload] Error handling upload:', error);
      result = rejected(toNetDepotError(error));
    }
    sendResult(req, res, result);
  });

  /**
   * GET /health - Health check
   */
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return { router, storage, config };
}
