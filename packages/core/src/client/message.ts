/**
 * Chat message value
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ValidationError } from '../types/errors.js';
import { isJsonObject, type JsonValue } from '../types/json.js';

/**
 * Conventional roles. Any other string is passed through to the server unchecked.
 */
export type MessageRole = 'system' | 'user' | 'assistant' | (string & {});

export type MessageJson = {
  role: string;
  content: string;
};

/**
 * One conversation turn, serialized as `{ role, content }` on every request
 */
export class Message {
  readonly role: MessageRole;
  readonly content: string;

  constructor(role: MessageRole, content: string) {
    this.role = role;
    this.content = content;
  }

  static user(content: string): Message {
    return new Message('user', content);
  }

  static assistant(content: string): Message {
    return new Message('assistant', content);
  }

  static system(content: string): Message {
    return new Message('system', content);
  }

  /**
   * Rebuild a message from its JSON form (a chat response's `message`, a saved history)
   */
  static fromJSON(value: JsonValue | undefined): Result<Message, ValidationError> {
    if (!isJsonObject(value)) {
      return err(new ValidationError('Message must be an object'));
    }
    const { role, content } = value;
    if (typeof role !== 'string') {
      return err(new ValidationError('Message role must be a string', { field: 'role' }));
    }
    if (typeof content !== 'string') {
      return err(new ValidationError('Message content must be a string', { field: 'content' }));
    }
    return ok(new Message(role, content));
  }

  toJSON(): MessageJson {
    return { role: this.role, content: this.content };
  }
}
