/**
 * Ollama REST client
 *
 * Native endpoints (`/api/*`) and the OpenAI-compatible ones (`/v1/*`).
 * Each method assembles its payload, performs one request and returns the
 * parsed body untouched. Failures come back as values; nothing is retried.
 *
 * Streaming is not delivered: `stream: true` is sent to the server as asked,
 * the streamed body is discarded and the call resolves to `{}`.
 *
 * @example
 *   const client = new OllamaClient();
 *   const result = await client.chat('llama3.2', [Message.user('Hello')]);
 *   if (result.ok) console.log(getMessageContent(result.value));
 */

import type { Result } from '../types/result.js';
import type { OllamaClientError } from '../types/errors.js';
import type { JsonValue } from '../types/json.js';
import { getLog } from '../services/get-log.js';
import type { ILogService } from '../services/log-service.js';
import { DEFAULT_HOST, DEFAULT_TIMEOUT_MS, type ClientOptions } from './config.js';
import { executeRequest } from './http.js';
import type { Message } from './message.js';
import type {
  RequestBody,
  GenerateRequest,
  ChatRequest,
  ShowModelRequest,
  CreateModelRequest,
  ChatCompletionsRequest,
  CompletionsRequest,
  NativeCallOptions,
  CompatCallOptions,
} from './types.js';

export type ClientResult = Result<JsonValue, OllamaClientError>;

export class OllamaClient {
  private readonly host: string;
  private timeoutMs: number;
  private readonly log: ILogService;

  constructor(options: string | ClientOptions = {}) {
    const opts: ClientOptions = typeof options === 'string' ? { host: options } : options;
    this.host = opts.host ?? DEFAULT_HOST;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts.logger ?? getLog('OllamaClient');
  }

  getHost(): string {
    return this.host;
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  /**
   * Replace the timeout (milliseconds) for requests issued from now on
   */
  setTimeout(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  // ---------------------------------------------------------------------------
  // Native endpoints
  // ---------------------------------------------------------------------------

  /**
   * Generate a completion for a prompt (POST /api/generate)
   */
  async generate(model: string, prompt: string, callOptions: NativeCallOptions = {}): Promise<ClientResult> {
    const stream = callOptions.stream ?? false;
    const body: GenerateRequest = {
      model,
      prompt,
      options: callOptions.options ?? {},
      stream,
    };
    return this.post('/api/generate', body, stream);
  }

  /**
   * Send a conversation and get the next assistant turn (POST /api/chat)
   */
  async chat(model: string, messages: readonly Message[], callOptions: NativeCallOptions = {}): Promise<ClientResult> {
    const stream = callOptions.stream ?? false;
    const body: ChatRequest = {
      model,
      messages: messages.map((m) => m.toJSON()),
      options: callOptions.options ?? {},
      stream,
    };
    return this.post('/api/chat', body, stream);
  }

  /**
   * Locally installed models (GET /api/tags)
   */
  async listModels(): Promise<ClientResult> {
    return this.get('/api/tags');
  }

  /**
   * Modelfile, parameters, template and details of a model (POST /api/show)
   */
  async showModel(model: string): Promise<ClientResult> {
    const body: ShowModelRequest = { name: model };
    return this.post('/api/show', body, false);
  }

  /**
   * Create a model from Modelfile text (POST /api/create)
   */
  async createModel(name: string, modelfile: string): Promise<ClientResult> {
    const body: CreateModelRequest = { name, modelfile };
    return this.post('/api/create', body, false);
  }

  // ---------------------------------------------------------------------------
  // OpenAI-compatible endpoints
  // ---------------------------------------------------------------------------

  async chatCompletions(
    model: string,
    messages: readonly Message[],
    callOptions: CompatCallOptions = {}
  ): Promise<ClientResult> {
    const { maxTokens = 0, temperature = 1.0, stream = false } = callOptions;
    const body: ChatCompletionsRequest = {
      model,
      messages: messages.map((m) => m.toJSON()),
      ...(maxTokens > 0 ? { max_tokens: maxTokens } : {}),
      temperature,
      stream,
    };
    return this.post('/v1/chat/completions', body, stream);
  }

  async completions(model: string, prompt: string, callOptions: CompatCallOptions = {}): Promise<ClientResult> {
    const { maxTokens = 0, temperature = 1.0, stream = false } = callOptions;
    const body: CompletionsRequest = {
      model,
      prompt,
      ...(maxTokens > 0 ? { max_tokens: maxTokens } : {}),
      temperature,
      stream,
    };
    return this.post('/v1/completions', body, stream);
  }

  async getModels(): Promise<ClientResult> {
    return this.get('/v1/models');
  }

  // ---------------------------------------------------------------------------
  // Request helpers
  // ---------------------------------------------------------------------------

  private post(path: string, body: RequestBody, stream: boolean): Promise<ClientResult> {
    return executeRequest({
      method: 'POST',
      url: this.host + path,
      body,
      stream,
      timeoutMs: this.timeoutMs,
      log: this.log,
    });
  }

  private get(path: string): Promise<ClientResult> {
    return executeRequest({
      method: 'GET',
      url: this.host + path,
      timeoutMs: this.timeoutMs,
      log: this.log,
    });
  }
}
