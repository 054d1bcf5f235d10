/**
 * getLog() Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { getLog, getRootLog, setLogService, resetLogService } from './get-log.js';
import type { ILogService } from './log-service.js';

function createMockLog() {
  const scoped: ILogService = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  const child = vi.fn((_module: string) => scoped);
  const root: ILogService = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child,
  };
  return { root, child, scoped };
}

afterEach(() => {
  resetLogService();
});

describe('getLog', () => {
  it('derives a child of the installed root', () => {
    const { root, child, scoped } = createMockLog();
    setLogService(root);

    const log = getLog('OllamaClient');

    expect(child).toHaveBeenCalledWith('OllamaClient');
    expect(log).toBe(scoped);
  });

  it('creates a default root lazily', () => {
    const first = getRootLog();
    expect(getRootLog()).toBe(first);
    expect(typeof getLog('Any').info).toBe('function');
  });

  it('resetLogService discards the installed root', () => {
    const { root } = createMockLog();
    setLogService(root);
    resetLogService();

    expect(getRootLog()).not.toBe(root);
  });
});
