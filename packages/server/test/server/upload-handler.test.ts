/**
 * Upload Handler Tests
 *
 * Runs the real Express app on an ephemeral port and talks to it with fetch,
 * or with raw requests where the body has to stall or break off.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { request, type ClientRequest } from 'node:http';
import { join } from 'node:path';
import { gunzipSync } from 'node:zlib';
import { startServer, type ServerInstance } from '../../src/bin/server.js';
import type { NetDepotError } from '@netdepot/core';
import type { ServerConfig } from '../../src/config.js';
import { NET_DATA, OTHER_NET_DATA, listDir, makeTempDir, netName, sha256 } from '../helpers.js';

function formWith(field: string, data: Buffer, filename: string): FormData {
  const form = new FormData();
  form.append(field, new Blob([data]), filename);
  return form;
}

const BOUNDARY = 'netdepot-test-boundary';

interface RawUpload {
  request: ClientRequest;
  response: Promise<{ status: number; body: unknown }>;
}

/**
 * Start a chunked multipart upload and leave the body open for the caller.
 */
function openRawUpload(url: string, filename: string): RawUpload {
  const req = request(`${url}/upload_net/`, {
    method: 'POST',
    agent: false,
    headers: {
      'Content-Type': `multipart/form-data; boundary=${BOUNDARY}`,
      'Transfer-Encoding': 'chunked',
    },
  });

  const response = new Promise<{ status: number; body: unknown }>((resolve, reject) => {
    req.on('error', reject);
    req.on('response', (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('error', reject);
      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, body: JSON.parse(Buffer.concat(chunks).toString('utf8')) });
      });
    });
  });

  req.write(
    `--${BOUNDARY}\r\n` +
    `Content-Disposition: form-data; name="upload"; filename="${filename}"\r\n` +
    'Content-Type: application/octet-stream\r\n\r\n',
  );
  return { request: req, response };
}

async function waitForSpool(dir: string): Promise<void> {
  for (let i = 0; i < 500; i++) {
    if ((await listDir(dir)).some((entry) => entry.endsWith('.raw.tmp'))) return;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(`No spool file appeared in ${dir}`);
}

describe('upload handler', () => {
  let testDir: string;
  let server: ServerInstance | undefined;

  beforeEach(async () => {
    testDir = await makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await server?.shutdown();
    server = undefined;
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  async function start(overrides: Omit<Partial<ServerConfig>, 'storageDir'> = {}): Promise<string> {
    server = await startServer({ port: 0, host: '127.0.0.1', config: { storageDir: testDir, ...overrides } });
    return server.url;
  }

  async function post(url: string, form: FormData): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${url}/upload_net/`, { method: 'POST', body: form });
    return { status: response.status, body: await response.json() };
  }

  it('should answer health checks', async () => {
    const url = await start();

    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('should store a valid upload and describe it', async () => {
    const url = await start();
    const filename = netName(NET_DATA);

    const { status, body } = await post(url, formWith('upload', NET_DATA, filename));

    expect(status).toBe(200);
    expect(body).toMatchObject({
      detail: 'File uploaded successfully',
      file: `${filename}.gz`,
      digest: sha256(NET_DATA).slice(0, 12),
      originalSize: NET_DATA.length,
      duplicate: false,
    });
    const stored = await readFile(join(testDir, `${filename}.gz`));
    expect(body).toMatchObject({ compressedSize: stored.length });
    expect(gunzipSync(stored).equals(NET_DATA)).toBe(true);
    expect(await listDir(testDir)).toEqual([`${filename}.gz`]);
  });

  it('should answer a repeated upload with the existing artifact', async () => {
    const url = await start();
    const filename = netName(NET_DATA);

    await post(url, formWith('upload', NET_DATA, filename));
    const { status, body } = await post(url, formWith('upload', NET_DATA, filename));

    expect(status).toBe(200);
    expect(body).toMatchObject({ file: `${filename}.gz`, duplicate: true });
  });

  it('should reject a repeated upload with 409 under the reject policy', async () => {
    const url = await start({ duplicatePolicy: 'reject' });
    const filename = netName(NET_DATA);

    await post(url, formWith('upload', NET_DATA, filename));
    const { status, body } = await post(url, formWith('upload', NET_DATA, filename));

    expect(status).toBe(409);
    expect(body).toEqual({ code: 'ALREADY_UPLOADED', error: `File ${filename} already uploaded` });
  });

  it('should reject content that does not match its name', async () => {
    const url = await start();
    const filename = netName(NET_DATA);

    const { status, body } = await post(url, formWith('upload', OTHER_NET_DATA, filename));

    expect(status).toBe(400);
    expect(body).toEqual({
      code: 'HASH_MISMATCH',
      error: `Invalid hash for uploaded file ${filename}`,
      hint: `Expected digest ${sha256(NET_DATA).slice(0, 12)}, content hashes to ${sha256(OTHER_NET_DATA).slice(0, 12)}`,
    });
    expect(await listDir(testDir)).toEqual([]);
  });

  it('should reject a malformed filename', async () => {
    const url = await start();

    const { status, body } = await post(url, formWith('upload', NET_DATA, 'network.bin'));

    expect(status).toBe(400);
    expect(body).toMatchObject({
      code: 'MALFORMED_FILENAME',
      error: 'Filename network.bin does not match expected pattern (nn-[0-9a-f]{12}.nnue)',
    });
  });

  it('should reject a form without the file field', async () => {
    const url = await start();

    const { status, body } = await post(url, formWith('other', NET_DATA, netName(NET_DATA)));

    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'INVALID_UPLOAD', error: 'No file in form field "upload"' });
    expect(await listDir(testDir)).toEqual([]);
  });

  it('should read the file from a configured field name', async () => {
    const url = await start({ fieldName: 'net' });

    const { status } = await post(url, formWith('net', NET_DATA, netName(NET_DATA)));

    expect(status).toBe(200);
  });

  it('should reject a request that is not multipart', async () => {
    const url = await start();

    const response = await fetch(`${url}/upload_net/`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ upload: 'nn-0123456789ab.nnue' }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      code: 'INVALID_UPLOAD',
      error: expect.stringMatching(/^Expected a multipart\/form-data upload/),
    });
  });

  it('should reject a file over the size limit with 413', async () => {
    const url = await start({ maxUploadBytes: 8 });

    const { status, body } = await post(url, formWith('upload', NET_DATA, netName(NET_DATA)));

    expect(status).toBe(413);
    expect(body).toEqual({ code: 'PAYLOAD_TOO_LARGE', error: 'Upload exceeds the maximum size of 8 bytes' });
    expect(await listDir(testDir)).toEqual([]);
  });

  it('should reject an oversized request body before reading it', async () => {
    const url = await start({ maxUploadBytes: 8 });
    const large = Buffer.alloc(128 * 1024, 1);

    const { status, body } = await post(url, formWith('upload', large, netName(large)));

    expect(status).toBe(413);
    expect(body).toMatchObject({ code: 'PAYLOAD_TOO_LARGE' });
    expect(await listDir(testDir)).toEqual([]);
  });

  describe('interrupted uploads', () => {
    it('should answer a stalled upload with 408 and leave nothing behind', async () => {
      const url = await start({ readTimeoutMs: 200 });
      const upload = openRawUpload(url, netName(NET_DATA));
      upload.request.write(NET_DATA.subarray(0, 5));

      const { status, body } = await upload.response;
      upload.request.destroy();

      expect(status).toBe(408);
      expect(body).toMatchObject({ code: 'READ_TIMEOUT', error: 'No upload data received for 200ms' });
      expect(await listDir(testDir)).toEqual([]);
    });

    it('should discard the spool when the client disconnects mid-upload', async () => {
      let reportRejection: (error: NetDepotError) => void = () => {};
      const rejection = new Promise<NetDepotError>((resolve) => {
        reportRejection = resolve;
      });
      const url = await start({ hooks: { onRejected: (_filename, error) => reportRejection(error) } });
      const upload = openRawUpload(url, netName(NET_DATA));
      const outcome = upload.response.catch((err: unknown) => err);
      upload.request.write(NET_DATA.subarray(0, 5));
      await waitForSpool(testDir);

      upload.request.destroy();
      const error = await rejection;
      await outcome;

      expect(error.code).toBe('UPLOAD_ABORTED');
      expect(await listDir(testDir)).toEqual([]);
    });

    it('should reject a chunked upload over the size limit with 413', async () => {
      const url = await start({ maxUploadBytes: 1000 });
      const upload = openRawUpload(url, netName(NET_DATA));
      upload.request.write(Buffer.alloc(500 * 1024, 1));
      upload.request.end(`\r\n--${BOUNDARY}--\r\n`);

      const { status, body } = await upload.response;

      expect(status).toBe(413);
      expect(body).toMatchObject({ code: 'PAYLOAD_TOO_LARGE' });
      expect(await listDir(testDir)).toEqual([]);
    });
  });
});
