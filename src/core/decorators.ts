// src/core/decorators.ts
// arg / env / prompt: schema refinements recorded on a function until it is registered

import type { CommandBuilder } from './command.js';
import { inspectSignature, markWrapper } from './signature-inspector.js';
import type { CommandCallable, CommandTarget } from './types.js';
import {
  ArgOptionsSchema,
  EnvOptionsSchema,
  PromptOptionsSchema,
  validateOptions,
  type ArgOptions,
  type EnvOptions,
  type PromptOptionsInput,
} from '../config/schema.js';
import { MissingEnvError, SchemaError } from '../utils/errors.js';

export type SchemaMutation = (builder: CommandBuilder) => void;

export interface EnvBinding {
  variable: string;
  /** Used when the variable is unset; absent means the variable is required */
  fallback?: string;
  /** Parameter that receives the value */
  target: string;
}

export type Decorator = <F extends CommandTarget>(target: F) => F;

export type EnvBound<F extends CommandCallable> = (...args: Parameters<F>) => ReturnType<F>;

const mutations = new WeakMap<CommandTarget, SchemaMutation[]>();
const bindings = new WeakMap<CommandCallable, EnvBinding[]>();
const registered = new WeakSet<CommandTarget>();

/**
 * Refinements waiting for `target` to be registered, innermost decorator
 * first.
 */
export function pendingMutations(target: CommandTarget): readonly SchemaMutation[] {
  return mutations.get(target) ?? [];
}

/** Freeze the decorators of `target`: later ones raise SchemaError. */
export function markRegistered(target: CommandTarget): void {
  registered.add(target);
}

export function isRegistered(target: CommandTarget): boolean {
  return registered.has(target);
}

function assertUnregistered(target: CommandTarget, decorator: string): void {
  if (registered.has(target)) {
    throw new SchemaError(
      `'${target.name || '<anonymous>'}' is already registered; apply ${decorator} before registering it`
    );
  }
}

export function envBindings(fn: CommandCallable): readonly EnvBinding[] {
  return bindings.get(fn) ?? [];
}

function record(target: CommandTarget, decorator: string, mutation: SchemaMutation): void {
  assertUnregistered(target, decorator);
  const list = mutations.get(target) ?? [];
  list.push(mutation);
  mutations.set(target, list);
}

/**
 * Refine one argument: help, shortcut, choices, type, default.
 *
 * @example
 * const greet = arg('name', { help: 'Who to greet' })(function greet(name) {
 *   return `Hello ${name}`;
 * });
 */
export function arg(name: string, options: ArgOptions = {}): Decorator {
  const validated = validateOptions(ArgOptionsSchema, options, `arg('${name}')`);
  return (target) => {
    record(target, `arg('${name}')`, (builder) => {
      builder.arg(name, validated);
    });
    return target;
  };
}

/** Ask for an argument interactively when the command line leaves it out. */
export function prompt(name: string, options: PromptOptionsInput = {}): Decorator {
  const validated = validateOptions(PromptOptionsSchema, options, `prompt('${name}')`);
  return (target) => {
    record(target, `prompt('${name}')`, (builder) => {
      builder.prompt(name, validated);
    });
    return target;
  };
}

/**
 * Source an argument from an environment variable.
 *
 * Returns a wrapper, so the binding also applies when the function is
 * called directly: an undefined argument is read from `process.env`, then
 * from `options.value`; with neither, MissingEnvError is thrown.
 */
export function env(
  variable: string,
  options: EnvOptions = {}
): <F extends CommandCallable>(fn: F) => EnvBound<F> {
  const validated = validateOptions(EnvOptionsSchema, options, `env('${variable}')`);
  const binding: EnvBinding = {
    variable,
    fallback: validated.value,
    target: validated.arg ?? variable.toLowerCase(),
  };

  return <F extends CommandCallable>(fn: F): EnvBound<F> => {
    assertUnregistered(fn, `env('${variable}')`);
    const wrapper = function (this: unknown, ...args: Parameters<F>): ReturnType<F> {
      return Reflect.apply(fn, this, injectEnv(fn, [...args], binding));
    };
    Object.defineProperty(wrapper, 'name', { value: fn.name });
    markWrapper(wrapper, fn);

    mutations.set(wrapper, [
      ...pendingMutations(fn),
      (builder) => {
        builder.env(variable, validated);
      },
    ]);
    bindings.set(wrapper, [...envBindings(fn), binding]);
    return wrapper;
  };
}

function injectEnv(fn: CommandCallable, values: unknown[], binding: EnvBinding): unknown[] {
  const signature = inspectSignature(fn);
  const index = signature.args.findIndex((descriptor) => descriptor.name === binding.target);

  if (index !== -1) {
    if (values[index] === undefined) {
      values[index] = readBinding(binding);
    }
    return values;
  }

  if (signature.acceptsExtras) {
    const extrasIndex = signature.args.length;
    const extras: unknown = values[extrasIndex];
    const named: Record<string, unknown> = isRecord(extras) ? { ...extras } : {};
    if (named[binding.target] === undefined) {
      named[binding.target] = readBinding(binding);
    }
    values[extrasIndex] = named;
  }
  return values;
}

function readBinding(binding: EnvBinding): string {
  const value = process.env[binding.variable] ?? binding.fallback;
  if (value === undefined) {
    throw new MissingEnvError(binding.variable);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
