export { generateUploadId } from './id.js';
