export { EdgeError, isEdgeError } from './edge-error.js';
export type { EdgeErrorCode } from './edge-error.js';
