/**
 * Logging Utility
 *
 * Scoped loggers derived from one root LogService.
 * The root starts at `info` in dev format until an application installs its own.
 *
 * Usage:
 *   import { getLog } from '@ollama-rest/core';
 *   const log = getLog('Chat');
 *   log.info('Sending turn', { model: 'llama3.2' });
 */

import { createLogService, type ILogService } from './log-service.js';

let rootLog: ILogService | null = null;

/**
 * Replace the root logger. Loggers handed out earlier keep their old root.
 */
export function setLogService(log: ILogService): void {
  rootLog = log;
}

export function getRootLog(): ILogService {
  if (!rootLog) {
    rootLog = createLogService();
  }
  return rootLog;
}

/**
 * Get a logger scoped to a module
 */
export function getLog(module: string): ILogService {
  return getRootLog().child(module);
}

/**
 * Drop the installed root logger (tests)
 */
export function resetLogService(): void {
  rootLog = null;
}
