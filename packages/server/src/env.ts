/**
 * Configuration loader for the NetDepot server process
 *
 * Reads NETDEPOT_* environment variables, optionally seeded from a .env file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import type { ServerConfig } from './config.js';

const optionalInt = (min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).optional();

const envSchema = z.object({
  NETDEPOT_STORAGE_DIR: z.string().min(1).default('./nn'),
  NETDEPOT_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  NETDEPOT_HOST: z.string().min(1).default('127.0.0.1'),
  NETDEPOT_MAX_UPLOAD_BYTES: optionalInt(1, Number.MAX_SAFE_INTEGER),
  NETDEPOT_COMPRESSION_LEVEL: optionalInt(0, 9),
  NETDEPOT_READ_TIMEOUT_MS: optionalInt(1, 24 * 60 * 60 * 1000),
  NETDEPOT_DUPLICATE_POLICY: z.enum(['idempotent', 'reject']).optional(),
  NETDEPOT_FIELD_NAME: z.string().min(1).optional(),
});

export interface EnvConfig {
  port: number;
  host: string;
  server: ServerConfig;
}

export interface LoadEnvOptions {
  /** Path of a .env file to load before reading the environment */
  envFile?: string;
}

/**
 * Load configuration from environment and an optional .env file
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadEnvOptions = {},
): EnvConfig {
  let source: NodeJS.ProcessEnv = env;
  if (options.envFile) {
    const envPath = resolve(options.envFile);
    if (existsSync(envPath)) {
      // Variables already set in the environment win over the file
      source = { ...parseDotenv(readFileSync(envPath)), ...env };
      console.log(`[NetDepot:Config] Loaded from ${envPath}`);
    } else {
      console.log(`[NetDepot:Config] Config file not found: ${envPath}, using environment variables`);
    }
  }

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid NetDepot configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.NETDEPOT_PORT,
    host: vars.NETDEPOT_HOST,
    server: {
      storageDir: vars.NETDEPOT_STORAGE_DIR,
      maxUploadBytes: vars.NETDEPOT_MAX_UPLOAD_BYTES,
      compressionLevel: vars.NETDEPOT_COMPRESSION_LEVEL,
      readTimeoutMs: vars.NETDEPOT_READ_TIMEOUT_MS,
      duplicatePolicy: vars.NETDEPOT_DUPLICATE_POLICY,
      fieldName: vars.NETDEPOT_FIELD_NAME,
    },
  };
}
