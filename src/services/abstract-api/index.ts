// ═══════════════════════════════════════════════════════════════════════════════
// ABSTRACT API MODULE — Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AbstractClient,
  TIMEZONE_QUERY_ERROR,
  type AbstractClientOptions,
  type TimezoneQuery,
} from './client.js';

export {
  AbstractApiError,
  ResponseDecodeError,
  ValidationError,
  isAbstractApiError,
  isValidationError,
} from './errors.js';

export { ENDPOINTS, type EndpointName } from './endpoints.js';

export {
  HttpSession,
  buildUrl,
  type HttpSessionOptions,
  type GetOptions,
  type QueryParams,
  type QueryValue,
} from './http-session.js';

export {
  normalizeResponse,
  readBody,
  extractErrorMessage,
  isBinaryContentType,
  UNKNOWN_ERROR,
  type NormalizedBody,
  type DecodedBody,
  type TextResult,
} from './normalize.js';

export * from './schemas.js';
