/**
 * Code command - one chat request, reply written to a file
 */

import { writeFile } from 'node:fs/promises';
import { Message, getMessageContent, getErrorMessage, getLog, toPrettyJson } from '@ollama-rest/core';
import { createClient, fail, type ConnectionOptions } from '../client.js';

export const CODE_TIMEOUT_MS = 30_000;
export const DEFAULT_OUTPUT = 'generated.md';

export interface CodeOptions extends ConnectionOptions {
  prompt: string;
  model: string;
  output?: string;
  verbose?: boolean;
}

export async function generateCode(options: CodeOptions): Promise<void> {
  const log = getLog('Code');
  const output = options.output ?? DEFAULT_OUTPUT;

  const created = createClient(options, CODE_TIMEOUT_MS);
  if (!created.ok) {
    fail(created.error.message);
    return;
  }
  const client = created.value;

  log.debug('Requesting code', { model: options.model, host: client.getHost(), output });
  const result = await client.chat(options.model, [Message.user(`Generate code: ${options.prompt}`)]);
  if (!result.ok) {
    fail(result.error.message);
    return;
  }

  const code = getMessageContent(result.value);
  if (code === undefined) {
    fail('Response did not contain message.content');
    return;
  }

  try {
    await writeFile(output, code, 'utf-8');
  } catch (error) {
    fail(`Could not write ${output}: ${getErrorMessage(error)}`);
    return;
  }

  console.log(`Code successfully generated and saved to ${output}`);

  if (options.verbose) {
    console.log('\nFull API Response:');
    console.log(toPrettyJson(result.value));
  }
}
