// src/cli/output.ts

import type { TextWriter } from './io.js';

export const OK_TEXT = 'OK';
export const FAILED_TEXT = 'FAILED';

/**
 * Write a command's return value to `writer` and report whether it signals
 * success. Only `false` signals failure.
 *
 * | value            | output                                   |
 * |------------------|------------------------------------------|
 * | null, undefined  | nothing                                  |
 * | ''               | a single newline                         |
 * | true / false     | `OK` / `FAILED`                          |
 * | array, Set       | one line per element, line breaks trimmed |
 * | object, Map      | one `key: value` line per entry          |
 * | anything else    | `String(value)`                          |
 */
export function puts(value: unknown, writer: TextWriter = process.stdout): boolean {
  for (const line of renderLines(value)) {
    writer.write(`${line}\n`);
  }
  return value !== false;
}

export function renderLines(value: unknown): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (typeof value === 'boolean') {
    return [value ? OK_TEXT : FAILED_TEXT];
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value) || value instanceof Set) {
    return Array.from(value, (item: unknown) =>
      typeof item === 'string' ? stripLineBreaks(item) : formatEntry(item)
    );
  }
  const entries = mappingEntries(value);
  if (entries) {
    return entries.map(([key, item]) => `${key}: ${formatEntry(item)}`);
  }
  return [String(value)];
}

function formatEntry(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.map(formatEntry).join(', ');
  }
  const nested = mappingEntries(value);
  if (nested) {
    return nested.map(([, item]) => formatEntry(item)).join(', ');
  }
  return String(value);
}

function mappingEntries(value: unknown): Array<[string, unknown]> | undefined {
  if (value instanceof Map) {
    return Array.from(value, ([key, item]: [unknown, unknown]): [string, unknown] => [String(key), item]);
  }
  if (isPlainObject(value)) {
    return Object.entries(value);
  }
  return undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function stripLineBreaks(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}
