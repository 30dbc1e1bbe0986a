/**
 * Resource store API module
 *
 * Provides:
 * - StoreClient with resource handles and discovery
 * - Discovery cache and scope resolver
 * - Status error decoding
 * - JSON logging with secret redaction
 */

// Main client
export {
  createStoreClient,
  parseGroupVersion,
  groupVersionPath,
  resourcePath,
  parseResourceList,
  DEFAULT_TIMEOUT_MS,
  APPLY_PATCH_CONTENT_TYPE,
} from './client.js';

export type { StoreClient } from './client.js';

// Discovery
export { DiscoveryCache, DiscoveryScopeResolver, groupVersionKey } from './discovery.js';

// Errors
export {
  StoreApiError,
  isNotFound,
  parseStatus,
  NOT_FOUND_STATUS,
} from './errors.js';

// Logger utilities
export {
  logger,
  createLogger,
  parseLogLevel,
  Logger,
  redactString,
  redactPatterns,
  redactContext,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  StatusCause,
  StatusDetails,
  StoreStatus,
  APIResource,
  GroupVersionResource,
  GroupVersionKind,
  HttpMethod,
  StoreClientConfig,
  RequestOptions,
  ResourceHandle,
} from './types.js';
