/**
 * Code command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';

// ============================================================================
// Hoisted mocks
// ============================================================================

const mockWriteFile = vi.hoisted(() => vi.fn());

vi.mock('node:fs/promises', () => ({
  writeFile: mockWriteFile,
}));

import { generateCode } from './code.js';

const mockFetch = vi.fn<typeof fetch>();

function jsonResponse(data: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(data), { status, statusText });
}

describe('generateCode', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockFetch.mockReset();
    mockWriteFile.mockResolvedValue(undefined);
    vi.stubGlobal('fetch', mockFetch);
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('OLLAMA_TIMEOUT_MS', '');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('sends one prefixed user message and writes the reply', async () => {
    mockFetch.mockResolvedValue(
      jsonResponse({ message: { role: 'assistant', content: 'int add(int a, int b) { return a + b; }' }, done: true })
    );

    await generateCode({ prompt: 'Create a C add function', model: 'qwen2.5-coder', output: 'add.c' });

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(String(url)).toBe('http://127.0.0.1:11434/api/chat');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'qwen2.5-coder',
      messages: [{ role: 'user', content: 'Generate code: Create a C add function' }],
      options: {},
      stream: false,
    });
    expect(mockWriteFile).toHaveBeenCalledWith('add.c', 'int add(int a, int b) { return a + b; }', 'utf-8');
    expect(logSpy).toHaveBeenCalledWith('Code successfully generated and saved to add.c');
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('writes to generated.md by default', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: { role: 'assistant', content: 'x' } }));

    await generateCode({ prompt: 'p', model: 'm' });

    expect(mockWriteFile).toHaveBeenCalledWith('generated.md', 'x', 'utf-8');
  });

  it('uses the --host flag', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: { role: 'assistant', content: 'x' } }));

    await generateCode({ prompt: 'p', model: 'm', host: 'http://localhost:11434' });

    expect(String(mockFetch.mock.calls[0]?.[0])).toBe('http://localhost:11434/api/chat');
  });

  it('prints the full response with --verbose', async () => {
    const response = { message: { role: 'assistant', content: 'x' }, done: true };
    mockFetch.mockResolvedValue(jsonResponse(response));

    await generateCode({ prompt: 'p', model: 'm', verbose: true });

    expect(logSpy).toHaveBeenCalledWith('\nFull API Response:');
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(response, null, 2));
  });

  it('reports a failed request and exits', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: "model 'm' not found" }, 404, 'Not Found'));

    await generateCode({ prompt: 'p', model: 'm' });

    expect(errorSpy).toHaveBeenCalledWith("Error: HTTP request failed: Not Found (404): model 'm' not found");
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mockWriteFile).not.toHaveBeenCalled();
  });

  it('reports a response without message content', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ done: true }));

    await generateCode({ prompt: 'p', model: 'm' });

    expect(errorSpy).toHaveBeenCalledWith('Error: Response did not contain message.content');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('reports a write failure', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: { role: 'assistant', content: 'x' } }));
    mockWriteFile.mockRejectedValue(new Error('EACCES: permission denied'));

    await generateCode({ prompt: 'p', model: 'm', output: '/root/out.c' });

    expect(errorSpy).toHaveBeenCalledWith('Error: Could not write /root/out.c: EACCES: permission denied');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('rejects an invalid --timeout before sending anything', async () => {
    await generateCode({ prompt: 'p', model: 'm', timeout: 'abc' });

    expect(errorSpy).toHaveBeenCalledWith(
      'Error: --timeout must be a positive integer (milliseconds), got "abc"'
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
