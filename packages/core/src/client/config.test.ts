import { describe, it, expect } from 'vitest';
import { loadClientConfig, parseTimeout, DEFAULT_HOST, DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './config.js';

describe('loadClientConfig', () => {
  it('falls back to the defaults on an empty environment', () => {
    expect(loadClientConfig({})).toEqual({
      ok: true,
      value: { host: 'http://127.0.0.1:11434', timeoutMs: 60000 },
    });
  });

  it('reads OLLAMA_HOST verbatim', () => {
    const result = loadClientConfig({ OLLAMA_HOST: 'http://gpu-box:11434' });
    expect(result).toEqual({ ok: true, value: { host: 'http://gpu-box:11434', timeoutMs: DEFAULT_TIMEOUT_MS } });
  });

  it('treats an empty OLLAMA_HOST as unset', () => {
    const result = loadClientConfig({ OLLAMA_HOST: '' });
    expect(result.ok && result.value.host).toBe(DEFAULT_HOST);
  });

  it('reads OLLAMA_TIMEOUT_MS', () => {
    const result = loadClientConfig({ OLLAMA_TIMEOUT_MS: '15000' });
    expect(result.ok && result.value.timeoutMs).toBe(15000);
  });

  it('rejects a non-numeric timeout', () => {
    const result = loadClientConfig({ OLLAMA_TIMEOUT_MS: 'soon' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('OLLAMA_TIMEOUT_MS');
      expect(result.error.message).toBe('OLLAMA_TIMEOUT_MS must be a positive integer (milliseconds), got "soon"');
    }
  });

  it('rejects a timeout longer than a timer can hold', () => {
    const result = loadClientConfig({ OLLAMA_TIMEOUT_MS: '3000000000' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.field).toBe('OLLAMA_TIMEOUT_MS');
      expect(result.error.message).toBe('OLLAMA_TIMEOUT_MS must be at most 2147483647 milliseconds, got "3000000000"');
    }
  });
});

describe('parseTimeout', () => {
  it('accepts positive integers with surrounding whitespace', () => {
    expect(parseTimeout(' 30000 ', '--timeout')).toEqual({ ok: true, value: 30000 });
  });

  it('accepts the largest timer delay', () => {
    expect(parseTimeout('2147483647', '--timeout')).toEqual({ ok: true, value: MAX_TIMEOUT_MS });
  });

  it.each(['0', '-5', '1.5', '', '   ', '10s', '2147483648', '3000000000'])('rejects %j', (raw) => {
    const result = parseTimeout(raw, '--timeout');
    expect(!result.ok && result.error.field).toBe('--timeout');
  });
});
