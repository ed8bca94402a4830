// src/core/coerce.ts

import type { DeclaredType, Scalar } from '../config/schema.js';

export const TRUE_WORDS: readonly string[] = ['y', 'yes', 'true', '1'];
export const FALSE_WORDS: readonly string[] = ['n', 'no', 'false', '0'];

export type Coercion = { ok: true; value: Scalar } | { ok: false; reason: string };

export function parseBooleanWord(text: string): boolean | undefined {
  const word = text.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) {
    return true;
  }
  if (FALSE_WORDS.includes(word)) {
    return false;
  }
  return undefined;
}

/**
 * Convert text from the command line, the environment or a prompt into the
 * argument's declared type, checking it against the allowed choices.
 */
export function coerce(
  text: string,
  type?: DeclaredType,
  choices?: readonly (string | number)[]
): Coercion {
  if (choices && !choices.some((choice) => String(choice) === text)) {
    return { ok: false, reason: `'${text}' is not one of ${choices.join(', ')}` };
  }

  switch (type) {
    case 'boolean': {
      const value = parseBooleanWord(text);
      return value === undefined
        ? { ok: false, reason: `'${text}' is not a yes/no value` }
        : { ok: true, value };
    }
    case 'number': {
      const value = Number(text);
      return text.trim() === '' || !Number.isFinite(value)
        ? { ok: false, reason: `'${text}' is not a number` }
        : { ok: true, value };
    }
    default:
      return { ok: true, value: text };
  }
}
