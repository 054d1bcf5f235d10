/**
 * Client and logger setup shared by every command
 */

import {
  OllamaClient,
  loadClientConfig,
  parseTimeout,
  createLogService,
  setLogService,
  isLogLevel,
  ok,
  type Result,
  type ValidationError,
} from '@ollama-rest/core';

/** Options every command accepts (strings as commander hands them over) */
export interface ConnectionOptions {
  host?: string;
  timeout?: string;
}

/**
 * Build a client from flags and environment.
 *
 * Precedence: `--host`/`--timeout`, then `OLLAMA_HOST`/`OLLAMA_TIMEOUT_MS`,
 * then the command's own default timeout, then the library defaults.
 */
export function createClient(
  options: ConnectionOptions,
  commandTimeoutMs?: number,
  env: NodeJS.ProcessEnv = process.env
): Result<OllamaClient, ValidationError> {
  const config = loadClientConfig(env);
  if (!config.ok) {
    return config;
  }

  let timeoutMs = env.OLLAMA_TIMEOUT_MS ? config.value.timeoutMs : (commandTimeoutMs ?? config.value.timeoutMs);
  if (options.timeout !== undefined) {
    const parsed = parseTimeout(options.timeout, '--timeout');
    if (!parsed.ok) {
      return parsed;
    }
    timeoutMs = parsed.value;
  }

  return ok(new OllamaClient({ host: options.host ?? config.value.host, timeoutMs }));
}

/**
 * Install the root logger at LOG_LEVEL (default `warn`, keeping command output clean)
 */
export function initLogging(env: NodeJS.ProcessEnv = process.env): void {
  const requested = env.LOG_LEVEL;
  const level = isLogLevel(requested) ? requested : 'warn';
  setLogService(createLogService({ level }));
}

/**
 * Print an error and exit with status 1
 */
export function fail(message: string): void {
  console.error(`Error: ${message}`);
  process.exit(1);
}
