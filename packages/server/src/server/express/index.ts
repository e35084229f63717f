/**
 * Express integration for NetDepot
 */

export {
  uploadHandler,
  UPLOAD_PATH,
  MULTIPART_ALLOWANCE,
  type UploadHandlerOptions,
  type UploadHandlerResult,
  type UploadResponseBody,
} from './upload-handler.js';
