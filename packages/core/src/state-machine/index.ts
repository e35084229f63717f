export {
  UploadStateMachine,
  isTerminalUploadState,
  isValidUploadTransition,
  type UploadEvent,
  type UploadTransitionResult,
} from './upload.js';
