/**
 * Readers for the response shapes the server is known to return.
 * Each one answers undefined (or an empty list) when the shape is not there.
 */

import { getPath, isJsonArray, isJsonObject, type JsonValue } from '../types/json.js';

function asString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** `response` of /api/generate */
export function getResponseText(value: JsonValue): string | undefined {
  return asString(getPath(value, 'response'));
}

/** `message.content` of /api/chat */
export function getMessageContent(value: JsonValue): string | undefined {
  return asString(getPath(value, 'message', 'content'));
}

/** `choices[index].message.content` of /v1/chat/completions */
export function getChoiceContent(value: JsonValue, index = 0): string | undefined {
  return asString(getPath(value, 'choices', index, 'message', 'content'));
}

/** `choices[index].text` of /v1/completions */
export function getChoiceText(value: JsonValue, index = 0): string | undefined {
  return asString(getPath(value, 'choices', index, 'text'));
}

/** `done` flag of native responses; false when absent */
export function isDone(value: JsonValue): boolean {
  return getPath(value, 'done') === true;
}

/**
 * Model names from /api/tags (`models[].name`) or /v1/models (`data[].id`)
 */
export function getModelNames(value: JsonValue): string[] {
  const native = getPath(value, 'models');
  if (isJsonArray(native)) {
    return collect(native, 'name');
  }
  const compat = getPath(value, 'data');
  if (isJsonArray(compat)) {
    return collect(compat, 'id');
  }
  return [];
}

function collect(entries: JsonValue[], key: string): string[] {
  const names: string[] = [];
  for (const entry of entries) {
    const name = isJsonObject(entry) ? entry[key] : undefined;
    if (typeof name === 'string') {
      names.push(name);
    }
  }
  return names;
}
