/**
 * Request payloads, one per endpoint
 *
 * Field names follow the server's wire format. Response bodies are not typed
 * here: the server owns their shape and the client returns them as parsed.
 */

import type { JsonObject } from '../types/json.js';
import type { MessageJson } from './message.js';

/** Model options forwarded verbatim (`temperature`, `num_ctx`, `seed`, ...) */
export type ModelOptions = JsonObject;

/** POST /api/generate */
export type GenerateRequest = {
  model: string;
  prompt: string;
  options: ModelOptions;
  stream: boolean;
};

/** POST /api/chat */
export type ChatRequest = {
  model: string;
  messages: MessageJson[];
  options: ModelOptions;
  stream: boolean;
};

/** POST /api/show */
export type ShowModelRequest = {
  name: string;
};

/** POST /api/create */
export type CreateModelRequest = {
  name: string;
  modelfile: string;
};

/** POST /v1/chat/completions */
export type ChatCompletionsRequest = {
  model: string;
  messages: MessageJson[];
  max_tokens?: number;
  temperature: number;
  stream: boolean;
};

/** POST /v1/completions */
export type CompletionsRequest = {
  model: string;
  prompt: string;
  max_tokens?: number;
  temperature: number;
  stream: boolean;
};

export type RequestBody =
  | GenerateRequest
  | ChatRequest
  | ShowModelRequest
  | CreateModelRequest
  | ChatCompletionsRequest
  | CompletionsRequest;

/** Optional arguments of `generate` and `chat` */
export interface NativeCallOptions {
  /** Model options, sent as `options`. Defaults to `{}`. */
  options?: ModelOptions;
  /**
   * Sent as `stream`. The client does not deliver streamed output:
   * with `true` the body is discarded and `{}` is returned.
   */
  stream?: boolean;
}

/** Optional arguments of the OpenAI-compatible `chatCompletions` and `completions` */
export interface CompatCallOptions {
  /** Token cap; zero or negative leaves `max_tokens` out of the payload */
  maxTokens?: number;
  /** Defaults to 1.0 */
  temperature?: number;
  /** Same limitation as {@link NativeCallOptions.stream} */
  stream?: boolean;
}
