/**
 * Structured error classes for the Ollama client
 * Every failure a request can produce maps to exactly one of these.
 */

/**
 * Base error with a stable code and serializable metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Invalid configuration or input data
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly field?: string;

  constructor(message: string, options?: { field?: string; cause?: unknown }) {
    super(message, options);
    this.field = options?.field;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * The request never produced a response: connection refused,
 * DNS failure, malformed host, socket reset.
 */
export class TransportError extends AppError {
  readonly code = 'TRANSPORT_ERROR' as const;
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`Request to ${url} failed: ${message}`, options);
    this.url = url;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
    };
  }
}

/**
 * The configured timeout elapsed before the round trip completed
 */
export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT' as const;
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, options);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      timeoutMs: this.timeoutMs,
    };
  }
}

/**
 * The server answered with a status other than 200
 */
export class HttpStatusError extends AppError {
  readonly code = 'HTTP_STATUS' as const;
  readonly status: number;
  readonly statusText: string;
  readonly serverMessage?: string;

  constructor(
    status: number,
    statusText: string,
    options?: { serverMessage?: string; cause?: unknown }
  ) {
    const suffix = options?.serverMessage ? `: ${options.serverMessage}` : '';
    super(`HTTP request failed: ${statusText} (${status})${suffix}`, options);
    this.status = status;
    this.statusText = statusText;
    this.serverMessage = options?.serverMessage;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      statusText: this.statusText,
      serverMessage: this.serverMessage,
    };
  }
}

/**
 * Status 200, but the body carries an `error` field
 */
export class ServerError extends AppError {
  readonly code = 'SERVER_ERROR' as const;
  readonly serverMessage: string;

  constructor(serverMessage: string = 'unknown error', options?: { cause?: unknown }) {
    super(`Server error: ${serverMessage}`, options);
    this.serverMessage = serverMessage;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      serverMessage: this.serverMessage,
    };
  }
}

/**
 * The response body is not valid JSON
 */
export class ParseError extends AppError {
  readonly code = 'PARSE_ERROR' as const;
  readonly body: string;

  constructor(body: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to parse response as JSON${detail}`, options);
    this.body = body;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      body: this.body,
    };
  }
}

/**
 * Every way a single client call can fail
 */
export type OllamaClientError =
  | TransportError
  | TimeoutError
  | HttpStatusError
  | ServerError
  | ParseError;

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * True for failures where no HTTP response was received
 */
export function isTransportFailure(error: unknown): error is TransportError | TimeoutError {
  return error instanceof TransportError || error instanceof TimeoutError;
}
