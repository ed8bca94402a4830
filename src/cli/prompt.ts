// src/cli/prompt.ts
// Interactive resolution of a single argument value

import type { DeclaredType, Scalar } from '../config/schema.js';
import { coerce } from '../core/coerce.js';
import { PromptError } from '../utils/errors.js';
import type { LineReader, TextWriter } from './io.js';

export const CONFIRM_SUFFIX = ' (again)';

export interface PromptRequest {
  type?: DeclaredType;
  default?: Scalar | null;
  choices?: readonly (string | number)[];
  /** Accept an empty answer as null */
  empty?: boolean;
  /** Ask twice and require both answers to match */
  confirm?: boolean;
  /** Do not echo the answer */
  hidden?: boolean;
}

export interface PromptIO {
  reader: LineReader;
  writer: TextWriter;
}

export type PromptValue = Scalar | null;

/**
 * Ask for a value on the writer and read the answer from the reader.
 *
 * An empty answer resolves to the default when there is one, to null when
 * `empty` is set, and fails otherwise.
 *
 * @throws PromptError on an empty, invalid or unconfirmed answer
 */
export async function prompt(
  message: string,
  request: PromptRequest,
  io: PromptIO
): Promise<PromptValue> {
  const value = await ask(formatPrompt(message, request.default), request, io);
  if (!request.confirm) {
    return value;
  }

  const repeated = await ask(`${message}${CONFIRM_SUFFIX}: `, request, io);
  if (repeated !== value) {
    throw new PromptError(`Values for '${message}' do not match`);
  }
  return value;
}

export function formatPrompt(message: string, defaultValue?: Scalar | null): string {
  if (defaultValue === undefined || defaultValue === null) {
    return `${message}: `;
  }
  return `${message} [${defaultValue}]: `;
}

async function ask(text: string, request: PromptRequest, io: PromptIO): Promise<PromptValue> {
  io.writer.write(text);
  const line = await io.reader.readLine({ hidden: request.hidden });
  if (line === undefined) {
    throw new PromptError(`No input available for '${text.trim()}'`);
  }

  const answer = line.trim();
  if (answer === '') {
    if (request.default !== undefined && request.default !== null) {
      return request.default;
    }
    if (request.empty) {
      return null;
    }
    throw new PromptError('A value is required');
  }

  const coercion = coerce(isFreeForm(request) ? line : answer, request.type, request.choices);
  if (!coercion.ok) {
    throw new PromptError(`Invalid value: ${coercion.reason}`);
  }
  return coercion.value;
}

/** Free-form and hidden answers keep their surrounding whitespace. */
function isFreeForm(request: PromptRequest): boolean {
  if (request.hidden) {
    return true;
  }
  return !request.choices && (request.type === undefined || request.type === 'string');
}
