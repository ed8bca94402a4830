// src/__tests__/core/signature-inspector.test.ts

import { describe, it, expect } from 'vitest';
import { parseExpression } from '@babel/parser';
import {
  evaluateDefault,
  firstLine,
  inspectSignature,
  markWrapper,
  unwrap,
} from '../../core/signature-inspector.js';
import { SchemaError } from '../../utils/errors.js';

describe('inspectSignature', () => {
  it('should derive a required and a boolean optional argument', () => {
    function deploy(target: string, force = false) {
      return `${target}:${force}`;
    }

    const { args, captureAll, acceptsExtras } = inspectSignature(deploy);

    expect(args).toHaveLength(2);
    expect(args[0]).toMatchObject({ name: 'target', required: true, defaultValue: undefined });
    expect(args[1]).toMatchObject({
      name: 'force',
      required: false,
      declaredType: 'boolean',
      defaultValue: false,
    });
    expect(captureAll).toBe(false);
    expect(acceptsExtras).toBe(false);
  });

  it('should read arrow functions', () => {
    const scale = (value: string, factor = 2) => `${value}x${factor}`;

    expect(inspectSignature(scale).args.map((arg) => [arg.name, arg.declaredType])).toEqual([
      ['value', undefined],
      ['factor', 'number'],
    ]);
  });

  it('should read async functions and method shorthand', () => {
    async function fetchAll(source: string) {
      return source;
    }
    const handlers = {
      rename(from: string, to = 'copy') {
        return `${from}->${to}`;
      },
    };

    expect(inspectSignature(fetchAll).args.map((arg) => arg.name)).toEqual(['source']);
    expect(inspectSignature(handlers.rename).args.map((arg) => arg.name)).toEqual(['from', 'to']);
  });

  it('should evaluate literal defaults', () => {
    function defaults(a = 'text', b = -1, c = null, d = `plain`) {
      return [a, b, c, d];
    }

    expect(inspectSignature(defaults).args.map((arg) => arg.defaultValue)).toEqual(['text', -1, null, 'plain']);
  });

  it('should leave computed defaults to the function', () => {
    function stamp(at = Date.now()) {
      return at;
    }

    const [at] = inspectSignature(stamp).args;

    expect(at.required).toBe(false);
    expect(at.defaultValue).toBeUndefined();
    expect(at.declaredType).toBeUndefined();
  });

  it('should capture all arguments through a lone rest parameter', () => {
    function exec(...argv: string[]) {
      return argv;
    }

    const signature = inspectSignature(exec);

    expect(signature.captureAll).toBe(true);
    expect(signature.captureMode).toBe('spread');
    expect(signature.args).toEqual([]);
  });

  it('should reject a rest parameter next to other parameters', () => {
    function exec(command: string, ...argv: string[]) {
      return [command, ...argv];
    }

    expect(() => inspectSignature(exec)).toThrow(SchemaError);
  });

  it('should detect a trailing keyword catch-all', () => {
    function tag(name: string, { ...options }: Record<string, unknown> = {}) {
      return [name, options];
    }

    const signature = inspectSignature(tag);

    expect(signature.acceptsExtras).toBe(true);
    expect(signature.args.map((arg) => arg.name)).toEqual(['name']);
  });

  it('should reject a catch-all that is not last', () => {
    function tag({ ...options }: Record<string, unknown>, name: string) {
      return [name, options];
    }

    expect(() => inspectSignature(tag)).toThrow('must come last');
  });

  it('should reject other destructuring', () => {
    function pick({ field }: { field: string }) {
      return field;
    }

    expect(() => inspectSignature(pick)).toThrow(SchemaError);
  });

  it('should reject functions without readable source', () => {
    function unbound(name: string) {
      return name;
    }

    expect(() => inspectSignature(unbound.bind(null))).toThrow('Cannot read the parameter list');
  });

  it('should inspect each function once', () => {
    function once(name: string) {
      return name;
    }

    expect(inspectSignature(once)).toBe(inspectSignature(once));
  });

  it('should follow marked wrappers to the wrapped function', () => {
    function target(first: string, second = 1) {
      return `${first}${second}`;
    }
    const wrapper = (...args: unknown[]) => args;
    markWrapper(wrapper, target);

    expect(unwrap(wrapper)).toBe(target);
    expect(inspectSignature(wrapper).args.map((arg) => arg.name)).toEqual(['first', 'second']);
  });
});

describe('evaluateDefault', () => {
  it.each([
    ['!0', true],
    ['!1', false],
    ['+3', 3],
    ['void 0', undefined],
    ['undefined', undefined],
  ])('should evaluate %s', (source, expected) => {
    expect(evaluateDefault(parseExpression(source))).toEqual({ evaluated: true, value: expected });
  });

  it('should not evaluate expressions', () => {
    expect(evaluateDefault(parseExpression('a + 1'))).toEqual({ evaluated: false });
    expect(evaluateDefault(parseExpression('`${a}`'))).toEqual({ evaluated: false });
  });
});

describe('firstLine', () => {
  it('should return the first non-empty line without comment stars', () => {
    expect(firstLine('\n * Deploys the app.\n * More text')).toBe('Deploys the app.');
    expect(firstLine('  \n ')).toBeUndefined();
  });
});
