import { describe, it, expect } from 'vitest';
import { isJsonObject, isJsonArray, getPath, toPrettyJson } from './json.js';
import type { JsonValue } from './json.js';

describe('isJsonObject', () => {
  it('accepts plain objects', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject({ done: true })).toBe(true);
  });

  it('rejects arrays, null, primitives and undefined', () => {
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('text')).toBe(false);
    expect(isJsonObject(3)).toBe(false);
    expect(isJsonObject(undefined)).toBe(false);
  });
});

describe('isJsonArray', () => {
  it('accepts arrays only', () => {
    expect(isJsonArray([1, 2])).toBe(true);
    expect(isJsonArray({ 0: 1 })).toBe(false);
    expect(isJsonArray(undefined)).toBe(false);
  });
});

describe('getPath', () => {
  const doc: JsonValue = {
    message: { role: 'assistant', content: 'Hi!' },
    choices: [{ text: 'first' }, { text: 'second' }],
  };

  it('reads nested object fields', () => {
    expect(getPath(doc, 'message', 'content')).toBe('Hi!');
  });

  it('reads array elements by index', () => {
    expect(getPath(doc, 'choices', 1, 'text')).toBe('second');
  });

  it('returns the value itself for an empty path', () => {
    expect(getPath(doc)).toBe(doc);
  });

  it('returns undefined for a missing key', () => {
    expect(getPath(doc, 'message', 'images')).toBeUndefined();
  });

  it('returns undefined when indexing into the wrong kind of value', () => {
    expect(getPath(doc, 'message', 0)).toBeUndefined();
    expect(getPath(doc, 'choices', 'text')).toBeUndefined();
    expect(getPath(doc, 'choices', 5, 'text')).toBeUndefined();
  });

  it('keeps null leaves', () => {
    expect(getPath({ error: null }, 'error')).toBeNull();
  });
});

describe('toPrettyJson', () => {
  it('indents with two spaces', () => {
    expect(toPrettyJson({ a: 1, b: [true] })).toBe('{\n  "a": 1,\n  "b": [\n    true\n  ]\n}');
  });

  it('parses back to the same structure', () => {
    const value: JsonValue = { models: [{ name: 'llama3.2:latest', size: 2019393189 }], empty: {} };
    expect(JSON.parse(toPrettyJson(value))).toEqual(value);
  });
});
