/**
 * @ollama-rest/core
 *
 * Typed client for the Ollama REST API and its OpenAI-compatible routes.
 * Uses only Node.js built-ins (global fetch).
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Logging and error helpers
export * from './services/index.js';

// Client
export * from './client/index.js';
