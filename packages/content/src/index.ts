/**
 * SnowWeb Content Package
 *
 * Serves one immutable content root over HTTP.
 */

export { ContentServer, CACHE_CONTROL, type ContentServerOptions } from './content-server.js';
export {
  defaultErrorHandler,
  statusForFailure,
  type ErrorHandler,
  type RequestFailure,
  type RequestFailureKind,
} from './errors.js';
export { normalizeRequestPath, isValidPath, INDEX_FILE } from './paths.js';
