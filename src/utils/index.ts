/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */
export { logger, Logger, type LogLevel } from './internal/logger.js';
export {
  requestContextService,
  type RequestContext,
} from './internal/requestContext.js';
export {
  fetchWithTimeout,
  DEFAULT_FETCH_TIMEOUT,
  type FetchWithTimeoutOptions,
} from './network/fetchWithTimeout.js';
export { parseJsonResponse, validateWith } from './network/parseJsonResponse.js';
