#!/usr/bin/env node
/**
 * ollama-rest CLI
 */

import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { DEFAULT_HOST } from '@ollama-rest/core';
import { initLogging, type ConnectionOptions } from './client.js';
import { generateCode, DEFAULT_OUTPUT, type CodeOptions } from './commands/code.js';
import { runDemo, DEMO_MODEL, type DemoOptions } from './commands/demo.js';
import { chatLoop, type ChatOptions } from './commands/chat.js';
import {
  modelsList,
  modelShow,
  modelCreate,
  type ModelsListOptions,
  type ModelCreateOptions,
} from './commands/models.js';

// OLLAMA_HOST, OLLAMA_TIMEOUT_MS and LOG_LEVEL may come from .env
loadEnv();
initLogging();

const program = new Command();

program
  .name('ollama-rest')
  .description('Command-line client for the Ollama REST API')
  .version('0.1.0')
  .option('--host <url>', `Server base URL (default: OLLAMA_HOST or ${DEFAULT_HOST})`)
  .option('--timeout <ms>', 'Request timeout in milliseconds (default: OLLAMA_TIMEOUT_MS or 60000)');

// Code command - generate code with one chat request and save it
program
  .command('code')
  .description('Generate code from a prompt and save it to a file')
  .requiredOption('--prompt <text>', 'What to generate')
  .requiredOption('--model <name>', 'Model to use')
  .option('--output <file>', 'Output file', DEFAULT_OUTPUT)
  .option('--verbose', 'Print the full API response')
  .action(async (_options, command: Command) => {
    await generateCode(command.optsWithGlobals<CodeOptions>());
  });

// Demo command - one call to every endpoint
program
  .command('demo')
  .description('Call every endpoint once and print the results')
  .option('-m, --model <name>', 'Model to use', DEMO_MODEL)
  .action(async (_options, command: Command) => {
    await runDemo(command.optsWithGlobals<DemoOptions>());
  });

// Chat command - interactive loop
program
  .command('chat')
  .description('Start an interactive chat')
  .requiredOption('-m, --model <name>', 'Model to chat with')
  .option('-s, --system <prompt>', 'System prompt')
  .action(async (_options, command: Command) => {
    await chatLoop(command.optsWithGlobals<ChatOptions>());
  });

// Model management
program
  .command('models')
  .description('List installed models')
  .option('--openai', 'Use the OpenAI-compatible /v1/models route')
  .action(async (_options, command: Command) => {
    await modelsList(command.optsWithGlobals<ModelsListOptions>());
  });

program
  .command('show <model>')
  .description('Show model metadata')
  .action(async (model: string, _options, command: Command) => {
    await modelShow(model, command.optsWithGlobals<ConnectionOptions>());
  });

program
  .command('create <name>')
  .description('Create a model from a Modelfile')
  .requiredOption('-f, --file <path>', 'Path to the Modelfile')
  .action(async (name: string, _options, command: Command) => {
    await modelCreate(name, command.optsWithGlobals<ModelCreateOptions>());
  });

await program.parseAsync();
