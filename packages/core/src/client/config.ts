/**
 * Client configuration: base URL and request timeout
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ValidationError } from '../types/errors.js';
import type { ILogService } from '../services/log-service.js';

/** Default base URL of a local Ollama server */
export const DEFAULT_HOST = 'http://127.0.0.1:11434';

/** Default timeout for connect plus read, in milliseconds */
export const DEFAULT_TIMEOUT_MS = 60_000;

/** Largest delay a Node.js timer holds; longer ones fire at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface ClientConfig {
  host: string;
  timeoutMs: number;
}

export interface ClientOptions extends Partial<ClientConfig> {
  /** Logger for request tracing. Defaults to `getLog('OllamaClient')`. */
  logger?: ILogService;
}

/**
 * Parse a timeout given as text. Only positive integers up to
 * {@link MAX_TIMEOUT_MS} are accepted.
 */
export function parseTimeout(raw: string, field: string): Result<number, ValidationError> {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(value) || value <= 0) {
    return err(
      new ValidationError(`${field} must be a positive integer (milliseconds), got "${raw}"`, { field })
    );
  }
  if (value > MAX_TIMEOUT_MS) {
    return err(
      new ValidationError(`${field} must be at most ${MAX_TIMEOUT_MS} milliseconds, got "${raw}"`, { field })
    );
  }
  return ok(value);
}

/**
 * Read client configuration from environment variables.
 *
 * - `OLLAMA_HOST`: base URL, used as given
 * - `OLLAMA_TIMEOUT_MS`: request timeout in milliseconds
 */
export function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<ClientConfig, ValidationError> {
  const host = env.OLLAMA_HOST || DEFAULT_HOST;

  const rawTimeout = env.OLLAMA_TIMEOUT_MS;
  if (rawTimeout === undefined || rawTimeout === '') {
    return ok({ host, timeoutMs: DEFAULT_TIMEOUT_MS });
  }

  const timeout = parseTimeout(rawTimeout, 'OLLAMA_TIMEOUT_MS');
  if (!timeout.ok) {
    return timeout;
  }
  return ok({ host, timeoutMs: timeout.value });
}
