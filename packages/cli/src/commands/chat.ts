/**
 * Chat command - interactive conversation loop
 */

import { input } from '@inquirer/prompts';
import { Message, getPath } from '@ollama-rest/core';
import { createClient, fail, type ConnectionOptions } from '../client.js';

export const EXIT_COMMAND = '/exit';

export interface ChatOptions extends ConnectionOptions {
  model: string;
  system?: string;
}

/**
 * Ask for the next line. Null when the user ends the prompt (Ctrl+C).
 */
async function ask(): Promise<string | null> {
  try {
    return await input({ message: 'You:' });
  } catch (error) {
    if (error instanceof Error && error.name === 'ExitPromptError') {
      return null;
    }
    throw error;
  }
}

export async function chatLoop(options: ChatOptions): Promise<void> {
  const created = createClient(options);
  if (!created.ok) {
    fail(created.error.message);
    return;
  }
  const client = created.value;

  const history: Message[] = options.system ? [Message.system(options.system)] : [];

  console.log(`\nChatting with ${options.model} at ${client.getHost()}`);
  console.log(`Type ${EXIT_COMMAND} or an empty line to quit.\n`);

  for (;;) {
    const line = await ask();
    const text = line?.trim() ?? '';
    if (text === '' || text === EXIT_COMMAND) {
      break;
    }

    history.push(Message.user(text));
    const result = await client.chat(options.model, history);
    if (!result.ok) {
      history.pop();
      console.error(`Error: ${result.error.message}`);
      continue;
    }

    const reply = Message.fromJSON(getPath(result.value, 'message'));
    if (!reply.ok) {
      history.pop();
      console.error(`Error: ${reply.error.message}`);
      continue;
    }

    history.push(reply.value);
    console.log(`\n${options.model}: ${reply.value.content}\n`);
  }

  console.log('Bye!');
}
