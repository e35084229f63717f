/**
 * @netdepot/server
 *
 * NetDepot Server - compression, atomic storage, the upload pipeline and
 * its HTTP endpoint
 */

// Config
export {
  DEFAULT_SERVER,
  resolveServerConfig,
  type DuplicatePolicy,
  type UploadHooks,
  type ServerConfig,
  type ResolvedServerConfig,
} from './config.js';
export { loadConfigFromEnv, type EnvConfig, type LoadEnvOptions } from './env.js';

// Storage
export { createCompressedStream, gunzipToBuffer, type CompressOptions } from './storage/compressor.js';
export {
  StorageWriter,
  type ArtifactInspection,
  type CommitMeta,
} from './storage/storage-writer.js';
export { NameLock } from './storage/name-lock.js';
export { cleanupStaleTempFiles, isTempFile } from './storage/temp-files.js';

// Pipeline
export { handleUpload, type PipelineContext } from './pipeline/coordinator.js';

// HTTP
export {
  uploadHandler,
  UPLOAD_PATH,
  type UploadHandlerOptions,
  type UploadHandlerResult,
  type UploadResponseBody,
} from './server/express/upload-handler.js';
export { startServer, main, type StartServerOptions, type ServerInstance } from './bin/server.js';
export { NetDepotClient, type NetDepotClientOptions } from './bin/client.js';

// Re-export core for convenience
export * from '@netdepot/core';
