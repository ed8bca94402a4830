// src/__tests__/core/decorators.test.ts

import { describe, it, expect, vi } from 'vitest';
import { CommandBuilder } from '../../core/command.js';
import { ClassCommand } from '../../core/class-command.js';
import {
  arg,
  env,
  envBindings,
  isRegistered,
  markRegistered,
  pendingMutations,
  prompt,
} from '../../core/decorators.js';
import { inspectSignature } from '../../core/signature-inspector.js';
import type { CommandCallable } from '../../core/types.js';
import { MissingEnvError, SchemaError } from '../../utils/errors.js';

function applyPending(fn: CommandCallable): CommandBuilder {
  const builder = new CommandBuilder({ run: fn });
  for (const mutation of pendingMutations(fn)) {
    mutation(builder);
  }
  return builder;
}

describe('arg / prompt', () => {
  it('should return the function itself and record a refinement', () => {
    function greet(name: string) {
      return `Hello ${name}`;
    }

    expect(arg('name', { help: 'Who to greet' })(greet)).toBe(greet);
    expect(pendingMutations(greet)).toHaveLength(1);
  });

  it('should compose refinements on the same argument', () => {
    const greet = arg('name', { help: 'Who to greet' })(
      prompt('name', { text: 'Name' })(function greet(name: string) {
        return `Hello ${name}`;
      })
    );

    expect(applyPending(greet).getArgument('name').descriptor).toMatchObject({
      help: 'Who to greet',
      prompt: { text: 'Name', hidden: false, confirm: false, empty: false },
    });
  });

  it('should apply inner refinements first', () => {
    function size(count = 1) {
      return count;
    }
    const decorated = arg('count', { help: 'outer' })(arg('count', { help: 'inner' })(size));

    expect(applyPending(decorated).getArgument('count').descriptor.help).toBe('outer');
  });

  it('should validate options when decorating', () => {
    expect(() => arg('name', { shortcut: 'nn' })).toThrow(SchemaError);
  });

  it('should record refinements on a class-based command', () => {
    class Echo extends ClassCommand {
      run(text: string) {
        return text;
      }
    }

    expect(prompt('text')(arg('text', { help: 'What to echo' })(Echo))).toBe(Echo);
    expect(pendingMutations(Echo)).toHaveLength(2);
  });
});

describe('after registration', () => {
  function rename(from: string, to = 'copy') {
    return `${from}->${to}`;
  }
  markRegistered(rename);

  it('should report registered targets', () => {
    function unused(value: string) {
      return value;
    }

    expect(isRegistered(rename)).toBe(true);
    expect(isRegistered(unused)).toBe(false);
  });

  it('should refuse arg and prompt', () => {
    expect(() => arg('to', { shortcut: 't' })(rename)).toThrow(
      "'rename' is already registered; apply arg('to') before registering it"
    );
    expect(() => prompt('from')(rename)).toThrow(SchemaError);
    expect(pendingMutations(rename)).toEqual([]);
  });

  it('should refuse env', () => {
    expect(() => env('RENAME_TO', { arg: 'to' })(rename)).toThrow(
      "'rename' is already registered; apply env('RENAME_TO') before registering it"
    );
  });
});

describe('env', () => {
  function publish(api_token?: string) {
    return api_token;
  }

  it('should read an omitted argument from the environment on direct calls', () => {
    vi.stubEnv('API_TOKEN', 'test-secret');
    const bound = env('API_TOKEN')(publish);

    expect(bound()).toBe('test-secret');
    expect(bound('given')).toBe('given');
  });

  it('should use the fallback for an unset variable', () => {
    const bound = env('ARGBIND_TEST_UNSET_REGION', { value: 'eu', arg: 'api_token' })(publish);

    expect(bound()).toBe('eu');
  });

  it('should throw MissingEnvError for an unset required variable', () => {
    const bound = env('ARGBIND_TEST_UNSET_TOKEN', { arg: 'api_token' })(publish);

    expect(() => bound()).toThrow(MissingEnvError);
  });

  it('should keep the name and signature of the wrapped function', () => {
    const bound = env('API_TOKEN')(publish);

    expect(bound.name).toBe('publish');
    expect(inspectSignature(bound).args.map((descriptor) => descriptor.name)).toEqual(['api_token']);
    expect(envBindings(bound)).toEqual([{ variable: 'API_TOKEN', fallback: undefined, target: 'api_token' }]);
  });

  it('should carry refinements recorded before wrapping', () => {
    const bound = env('API_TOKEN')(arg('api_token', { help: 'Token' })(publish));
    const descriptor = applyPending(bound).getArgument('api_token').descriptor;

    expect(descriptor.help).toBe('Token');
    expect(descriptor.env).toEqual({ variable: 'API_TOKEN', fallback: undefined });
  });

  it('should fill the options object of a keyword catch-all', () => {
    vi.stubEnv('TAG_TOKEN', 'test-secret');
    const tag = env('TAG_TOKEN', { arg: 'token' })(function tag(
      name: string,
      { ...options }: Record<string, unknown> = {}
    ) {
      return `${name}:${String(options.token)}`;
    });

    expect(tag('v1')).toBe('v1:test-secret');
    expect(tag('v1', { token: 'explicit' })).toBe('v1:explicit');
  });
});
