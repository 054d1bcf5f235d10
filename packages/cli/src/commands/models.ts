/**
 * Model management commands
 */

import { readFile } from 'node:fs/promises';
import { getModelNames, getErrorMessage, getPath, toPrettyJson } from '@ollama-rest/core';
import { createClient, fail, type ConnectionOptions } from '../client.js';

export interface ModelsListOptions extends ConnectionOptions {
  /** Use the OpenAI-compatible /v1/models route */
  openai?: boolean;
}

export interface ModelCreateOptions extends ConnectionOptions {
  file: string;
}

/**
 * List installed models
 */
export async function modelsList(options: ModelsListOptions): Promise<void> {
  const created = createClient(options);
  if (!created.ok) {
    fail(created.error.message);
    return;
  }

  const result = options.openai ? await created.value.getModels() : await created.value.listModels();
  if (!result.ok) {
    fail(result.error.message);
    return;
  }

  const names = getModelNames(result.value);
  console.log('\nInstalled models:');
  console.log('─'.repeat(40));
  if (names.length === 0) {
    console.log('  No models installed.');
    console.log('  Pull one with "ollama pull <model>".\n');
    return;
  }
  for (const name of names) {
    console.log(`  ${name}`);
  }
  console.log();
}

/**
 * Print a model's metadata
 */
export async function modelShow(model: string, options: ConnectionOptions): Promise<void> {
  const created = createClient(options);
  if (!created.ok) {
    fail(created.error.message);
    return;
  }

  const result = await created.value.showModel(model);
  if (!result.ok) {
    fail(result.error.message);
    return;
  }

  console.log(toPrettyJson(result.value));
}

/**
 * Create a model from a Modelfile on disk
 */
export async function modelCreate(name: string, options: ModelCreateOptions): Promise<void> {
  let modelfile: string;
  try {
    modelfile = await readFile(options.file, 'utf-8');
  } catch (error) {
    fail(`Could not read ${options.file}: ${getErrorMessage(error)}`);
    return;
  }

  const created = createClient(options);
  if (!created.ok) {
    fail(created.error.message);
    return;
  }

  const result = await created.value.createModel(name, modelfile);
  if (!result.ok) {
    fail(result.error.message);
    return;
  }

  const status = getPath(result.value, 'status');
  console.log(`Model ${name} created${typeof status === 'string' ? ` (${status})` : ''}`);
}
