/**
 * Shared fixtures for server tests
 */

import { createHash } from 'node:crypto';
import { mkdtemp, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveServerConfig, type ResolvedServerConfig, type ServerConfig } from '../src/config.js';

export const NET_DATA = Buffer.from('test network weights, layer stack A');
export const OTHER_NET_DATA = Buffer.from('test network weights, layer stack B');

export function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Filename whose digest token matches `data` */
export function netName(data: Buffer): string {
  return `nn-${sha256(data).slice(0, 12)}.nnue`;
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'netdepot-test-'));
}

export async function listDir(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

export function testConfig(
  storageDir: string,
  overrides: Omit<Partial<ServerConfig>, 'storageDir'> = {},
): ResolvedServerConfig {
  return resolveServerConfig({ storageDir, ...overrides });
}
