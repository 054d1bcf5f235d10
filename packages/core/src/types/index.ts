/**
 * Shared types: results, errors, JSON values
 * @packageDocumentation
 */

// Result pattern
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  unwrap,
  unwrapOr,
  mapResult,
  mapError,
  isOk,
  isErr,
} from './result.js';

// Error classes
export {
  AppError,
  ValidationError,
  TransportError,
  TimeoutError,
  HttpStatusError,
  ServerError,
  ParseError,
  type OllamaClientError,
  isAppError,
  isTransportFailure,
} from './errors.js';

// JSON values
export {
  type JsonValue,
  type JsonObject,
  isJsonObject,
  isJsonArray,
  getPath,
  toPrettyJson,
} from './json.js';
