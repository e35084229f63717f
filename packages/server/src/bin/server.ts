/**
 * NetDepot Server Process
 *
 * Runs the upload endpoint as a standalone HTTP server.
 */

import { createServer } from 'node:http';
import express from 'express';
import type { ServerConfig } from '../config.js';
import { loadConfigFromEnv } from '../env.js';
import { uploadHandler } from '../server/express/upload-handler.js';
import type { StorageWriter } from '../storage/storage-writer.js';

/**
 * Server configuration
 */
export interface StartServerOptions {
  port?: number;
  host?: string;
  config: ServerConfig;
}

/**
 * Running server instance
 */
export interface ServerInstance {
  shutdown: () => Promise<void>;
  storage: StorageWriter;
  url: string;
}

/**
 * Start the NetDepot server
 */
export async function startServer(options: StartServerOptions): Promise<ServerInstance> {
  const port = options.port ?? 8000;
  const host = options.host ?? '127.0.0.1';

  const { router, storage } = uploadHandler({ config: options.config });
  await storage.initialize();

  const app = express();
  app.disable('x-powered-by');
  app.use(router);

  const server = createServer(app);
  // Uploads are bounded by the idle read timeout, not by total duration
  server.requestTimeout = 0;

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  const url = `http://${host}:${boundPort}`;
  console.log(`[NetDepot:Server] Listening on ${url}, storing into ${storage.storageDir}`);

  return {
    shutdown: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server.closeIdleConnections();
      });
      console.log('[NetDepot:Server] Stopped');
    },
    storage,
    url,
  };
}

/**
 * CLI entry point
 */
export async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let envFile: string | undefined = '.env';

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--env-file' && next) {
      envFile = next;
      i++;
    } else if (args[i] === '--no-env-file') {
      envFile = undefined;
    } else {
      console.error('Usage: netdepot-server [--env-file <path> | --no-env-file]');
      process.exit(1);
    }
  }

  const { port, host, server: config } = loadConfigFromEnv(process.env, { envFile });
  const instance = await startServer({ port, host, config });

  const stop = (signal: string): void => {
    console.log(`\n[NetDepot:Server] ${signal} received, shutting down...`);
    instance.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[NetDepot:Server] Shutdown failed:', err);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  console.log(`[NetDepot:Server] Ready. Upload endpoint at ${instance.url}/upload_net/`);
}
