// src/__tests__/cli/prompt.test.ts

import { describe, it, expect } from 'vitest';
import { formatPrompt, prompt } from '../../cli/prompt.js';
import { PromptError } from '../../utils/errors.js';
import { MemoryWriter, ScriptedReader } from '../mocks/memory-io.js';

function io(answers: string[]) {
  return { reader: new ScriptedReader(answers), writer: new MemoryWriter() };
}

describe('prompt', () => {
  it('should return true for "y" with a boolean type', async () => {
    const streams = io(['y']);

    await expect(prompt('Proceed', { type: 'boolean' }, streams)).resolves.toBe(true);
    expect(streams.writer.text).toBe('Proceed: ');
  });

  it('should show and use the default on an empty answer', async () => {
    const streams = io(['']);

    await expect(prompt('Region', { default: 'eu' }, streams)).resolves.toBe('eu');
    expect(streams.writer.text).toBe('Region [eu]: ');
  });

  it('should require a value when empty answers are not allowed', async () => {
    await expect(prompt('Name', {}, io(['  ']))).rejects.toThrow('A value is required');
  });

  it('should keep surrounding spaces in free-form and hidden answers', async () => {
    await expect(prompt('Password', { hidden: true }, io(['  pa ss  ']))).resolves.toBe('  pa ss  ');
    await expect(prompt('Motto', {}, io([' carpe diem']))).resolves.toBe(' carpe diem');
  });

  it('should trim typed answers before converting them', async () => {
    await expect(prompt('Port', { type: 'number' }, io([' 8080 ']))).resolves.toBe(8080);
    await expect(prompt('Env', { choices: ['dev', 'prod'] }, io(['prod ']))).resolves.toBe('prod');
  });

  it('should return null for an empty answer when allowed', async () => {
    await expect(prompt('Note', { empty: true }, io(['']))).resolves.toBeNull();
  });

  it('should convert numbers and reject non-numbers', async () => {
    await expect(prompt('Port', { type: 'number' }, io(['8080']))).resolves.toBe(8080);
    await expect(prompt('Port', { type: 'number' }, io(['http']))).rejects.toThrow(
      "Invalid value: 'http' is not a number"
    );
  });

  it('should enforce choices', async () => {
    await expect(prompt('Env', { choices: ['dev', 'prod'] }, io(['prod']))).resolves.toBe('prod');
    await expect(prompt('Env', { choices: ['dev', 'prod'] }, io(['qa']))).rejects.toBeInstanceOf(PromptError);
  });

  it('should ask twice when confirming', async () => {
    const streams = io(['secret', 'secret']);

    await expect(prompt('Password', { confirm: true, hidden: true }, streams)).resolves.toBe('secret');
    expect(streams.writer.text).toBe('Password: Password (again): ');
    expect(streams.reader.requests).toEqual([{ hidden: true }, { hidden: true }]);
  });

  it('should reject confirmations that differ', async () => {
    await expect(prompt('Password', { confirm: true }, io(['one', 'two']))).rejects.toThrow(
      "Values for 'Password' do not match"
    );
  });

  it('should fail when input has ended', async () => {
    await expect(prompt('Name', {}, io([]))).rejects.toThrow("No input available for 'Name:'");
  });
});

describe('formatPrompt', () => {
  it('should omit a null default', () => {
    expect(formatPrompt('Name', null)).toBe('Name: ');
    expect(formatPrompt('Retries', 3)).toBe('Retries [3]: ');
  });
});
