export type {
  DigestAlgorithm,
  NamingConvention,
  UploadRequest,
  ParsedName,
  VerifiedContent,
  StoredArtifact,
  PipelineResult,
  UploadState,
} from './upload.js';
