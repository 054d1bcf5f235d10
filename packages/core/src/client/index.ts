export { OllamaClient, type ClientResult } from './ollama-client.js';
export { Message, type MessageRole, type MessageJson } from './message.js';
export {
  DEFAULT_HOST,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  type ClientConfig,
  type ClientOptions,
  loadClientConfig,
  parseTimeout,
} from './config.js';
export type {
  ModelOptions,
  GenerateRequest,
  ChatRequest,
  ShowModelRequest,
  CreateModelRequest,
  ChatCompletionsRequest,
  CompletionsRequest,
  NativeCallOptions,
  CompatCallOptions,
} from './types.js';
export {
  getResponseText,
  getMessageContent,
  getChoiceContent,
  getChoiceText,
  getModelNames,
  isDone,
} from './responses.js';
