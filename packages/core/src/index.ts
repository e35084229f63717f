/**
 * @netdepot/core
 *
 * NetDepot Core - Naming convention, integrity verification, upload state
 * machine and error definitions
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// Naming
export {
  DEFAULT_NAMING,
  ARTIFACT_SUFFIX,
  parseNetFilename,
  artifactFileName,
  describePattern,
} from './naming/filename-parser.js';

// Integrity
export {
  DigestMeter,
  verifyContent,
  digestMatches,
  type VerifyOptions,
  type VerificationResult,
} from './integrity/hash-verifier.js';

// State Machine
export {
  UploadStateMachine,
  isTerminalUploadState,
  isValidUploadTransition,
  type UploadEvent,
  type UploadTransitionResult,
} from './state-machine/index.js';

// Errors
export * from './errors/index.js';
