/**
 * NetDepot Upload Client
 *
 * HTTP client for pushing network files to a running NetDepot server.
 * Used by release pipelines and in tests.
 *
 * @example
 * ```typescript
 * import { NetDepotClient } from '@netdepot/server';
 *
 * const client = new NetDepotClient('http://localhost:8000');
 * const stored = await client.uploadFile('./nn-0123456789ab.nnue');
 * console.log(stored.file, stored.duplicate);
 * ```
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { ErrorCodes, NetDepotError } from '@netdepot/core';
import { UPLOAD_PATH, type UploadResponseBody } from '../server/express/upload-handler.js';

const uploadResponseSchema = z.object({
  detail: z.string(),
  file: z.string(),
  digest: z.string(),
  originalSize: z.number(),
  compressedSize: z.number(),
  duplicate: z.boolean(),
});

const errorResponseSchema = z.object({
  code: z.nativeEnum(ErrorCodes),
  error: z.string(),
  hint: z.string().optional(),
});

export interface NetDepotClientOptions {
  /** Request timeout in ms (default 30000) */
  timeout?: number;
  /** Multipart field carrying the file (default "upload") */
  fieldName?: string;
}

/**
 * HTTP client for a NetDepot server
 */
export class NetDepotClient {
  private baseUrl: string;
  private timeout: number;
  private fieldName: string;

  constructor(serverUrl: string, options?: NetDepotClientOptions) {
    this.baseUrl = serverUrl.replace(/\/$/, '');
    this.timeout = options?.timeout ?? 30000;
    this.fieldName = options?.fieldName ?? 'upload';
  }

  /**
   * Upload a file from disk under its own basename
   */
  async uploadFile(filePath: string): Promise<UploadResponseBody> {
    const data = await readFile(filePath);
    return this.upload(basename(filePath), data);
  }

  /**
   * Upload `data` under `filename`
   *
   * @throws NetDepotError carrying the server's code and hint when the upload is rejected
   */
  async upload(filename: string, data: Uint8Array): Promise<UploadResponseBody> {
    const form = new FormData();
    form.append(this.fieldName, new Blob([data]), filename);

    const response = await this.request(UPLOAD_PATH, { method: 'POST', body: form });
    return uploadResponseSchema.parse(await response.json());
  }

  /**
   * Health check
   */
  async health(): Promise<boolean> {
    try {
      await this.request('/health');
      return true;
    } catch {
      return false;
    }
  }

  private async request(path: string, options?: {
    method?: string;
    body?: FormData;
  }): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: options?.method ?? 'GET',
        body: options?.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = errorResponseSchema.safeParse(await response.json().catch(() => ({})));
        if (errorBody.success) {
          throw new NetDepotError(errorBody.data.code, errorBody.data.error, errorBody.data.hint);
        }
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      return response;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
