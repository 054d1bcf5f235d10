/**
 * Demo command - walks through every endpoint once
 *
 * A failing step is reported and the run moves on to the next one.
 */

import {
  Message,
  getResponseText,
  getMessageContent,
  getChoiceContent,
  getChoiceText,
  getPath,
  isDone,
  toPrettyJson,
  type ClientResult,
  type JsonValue,
  type OllamaClient,
} from '@ollama-rest/core';
import { createClient, fail, type ConnectionOptions } from '../client.js';

export const DEMO_MODEL = 'llama3.1:8b';
export const DEMO_TIMEOUT_MS = 30_000;

export interface DemoOptions extends ConnectionOptions {
  model?: string;
}

interface DemoStep {
  /** Method name, used in failure lines */
  name: string;
  title: string;
  run: (client: OllamaClient, model: string) => Promise<ClientResult>;
  report: (value: JsonValue) => void;
}

const greeting = [Message.user('Hello, how are you?')];

function show(label: string, value: JsonValue | undefined): void {
  console.log(`${label}: ${typeof value === 'string' ? value : JSON.stringify(value ?? null)}`);
}

const steps: readonly DemoStep[] = [
  {
    name: 'generate',
    title: 'Generate Text (Non-Streaming)',
    run: (client, model) => client.generate(model, 'Why is the sky blue?'),
    report: (value) => {
      show('Response', getResponseText(value));
      show('Done', isDone(value));
    },
  },
  {
    name: 'chat',
    title: 'Chat Interaction (Non-Streaming)',
    run: (client, model) => client.chat(model, greeting),
    report: (value) => {
      show('Response', getMessageContent(value));
      show('Done', isDone(value));
    },
  },
  {
    name: 'listModels',
    title: 'List Models',
    run: (client) => client.listModels(),
    report: (value) => console.log(`Models: ${toPrettyJson(value)}`),
  },
  {
    name: 'showModel',
    title: 'Show Model Info',
    run: (client, model) => client.showModel(model),
    report: (value) => console.log(`Model Info: ${toPrettyJson(value)}`),
  },
  {
    name: 'chatCompletions',
    title: 'OpenAI Chat Completions (Non-Streaming)',
    run: (client, model) => client.chatCompletions(model, greeting, { maxTokens: 50, temperature: 0.7 }),
    report: (value) => {
      show('Choice', getChoiceContent(value));
      show('Model', getPath(value, 'model'));
    },
  },
  {
    name: 'completions',
    title: 'OpenAI Text Completions (Non-Streaming)',
    run: (client, model) => client.completions(model, 'Once upon a time', { maxTokens: 100, temperature: 0.9 }),
    report: (value) => {
      show('Text', getChoiceText(value));
      show('Model', getPath(value, 'model'));
    },
  },
  {
    name: 'getModels',
    title: 'OpenAI List Models',
    run: (client) => client.getModels(),
    report: (value) => console.log(`Models: ${toPrettyJson(value)}`),
  },
];

/**
 * Run every step; resolves to the number of failed steps
 */
export async function runDemo(options: DemoOptions): Promise<number> {
  const created = createClient(options, DEMO_TIMEOUT_MS);
  if (!created.ok) {
    fail(created.error.message);
    return steps.length;
  }
  const client = created.value;
  const model = options.model ?? DEMO_MODEL;

  console.log(`Ollama client initialized with host: ${client.getHost()}`);

  let failures = 0;
  for (const step of steps) {
    console.log(`\n=== ${step.title} ===`);
    const result = await step.run(client, model);
    if (!result.ok) {
      failures++;
      console.log(`Exception in ${step.name}: ${result.error.message}`);
      continue;
    }
    step.report(result.value);
  }

  console.log(`\n${steps.length - failures}/${steps.length} steps succeeded`);
  return failures;
}
