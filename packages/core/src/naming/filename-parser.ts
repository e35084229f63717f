/**
 * Network filename parsing
 *
 * Network files are named `<prefix>-<hex-digest>.<extension>`, where the digest
 * token is the leading part of the hex digest of the file's own bytes.
 */

import { MalformedFilenameError } from '../errors/index.js';
import type { NamingConvention, ParsedName } from '../types/upload.js';

export const DEFAULT_NAMING: NamingConvention = {
  prefix: 'nn',
  extension: 'nnue',
  digestLength: 12,
  algorithm: 'sha256',
};

export const ARTIFACT_SUFFIX = '.gz';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Human-readable pattern, e.g. `nn-[0-9a-f]{12}.nnue`
 */
export function describePattern(naming: NamingConvention = DEFAULT_NAMING): string {
  return `${naming.prefix}-[0-9a-f]{${naming.digestLength}}.${naming.extension}`;
}

/**
 * Parse and validate a claimed filename.
 *
 * @throws MalformedFilenameError when the name is empty or does not follow the convention
 */
export function parseNetFilename(
  filename: string,
  naming: NamingConvention = DEFAULT_NAMING,
): ParsedName {
  if (!filename) {
    throw new MalformedFilenameError(filename, 'No filename provided in the upload');
  }

  const malformed = (hint: string) =>
    new MalformedFilenameError(
      filename,
      `Filename ${filename} does not match expected pattern (${describePattern(naming)})`,
      hint,
    );

  const shape = new RegExp(
    `^${escapeRegExp(naming.prefix)}-([^./\\\\]+)\\.${escapeRegExp(naming.extension)}$`,
  );
  const match = shape.exec(filename);
  if (!match) {
    throw malformed(`Expected ${naming.prefix}-<digest>.${naming.extension}`);
  }

  const token = match[1] ?? '';
  if (token.length !== naming.digestLength) {
    throw malformed(
      `Digest token must be ${naming.digestLength} characters, got ${token.length}`,
    );
  }
  if (!/^[0-9a-fA-F]+$/.test(token)) {
    throw malformed('Digest token must be hexadecimal');
  }

  const digest = token.toLowerCase();
  return {
    fileName: `${naming.prefix}-${digest}.${naming.extension}`,
    base: naming.prefix,
    digest,
    extension: naming.extension,
  };
}

/**
 * Final stored name for a parsed network file.
 */
export function artifactFileName(parsed: ParsedName): string {
  return `${parsed.fileName}${ARTIFACT_SUFFIX}`;
}
