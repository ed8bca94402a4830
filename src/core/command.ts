// src/core/command.ts

import {
  createArgument,
  inferDeclaredType,
  mergeArgument,
  type ArgumentDescriptor,
  type ArgumentPatch,
  type ArgumentValue,
  type EnvSource,
} from './argument.js';
import { coerce } from './coerce.js';
import { tokenize } from './command-parser.js';
import { firstLine, inspectSignature } from './signature-inspector.js';
import type { CaptureMode, CommandCallable, ExtraOptions } from './types.js';
import {
  ArgOptionsSchema,
  EnvOptionsSchema,
  PromptOptionsSchema,
  validateOptions,
  type ArgOptions,
  type EnvOptions,
  type PromptOptionsInput,
} from '../config/schema.js';
import { processIO, type CommandIO } from '../cli/io.js';
import { puts } from '../cli/output.js';
import { prompt } from '../cli/prompt.js';
import {
  ArgumentNotFoundError,
  CommandError,
  MissingEnvError,
  SchemaError,
  UsageError,
} from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const NO_DESCRIPTION = 'No description';

export interface CommandInit {
  /** Defaults to the function's own name */
  name?: string;
  namespace?: string;
  description?: string;
  run?: CommandCallable;
  /** `this` for `run`, for commands backed by an object method */
  thisArg?: unknown;
  /** Pass raw argv to `run` instead of typed arguments */
  captureAll?: boolean;
}

/**
 * Everything a frozen Command is made of.
 */
export interface CommandDefinition {
  name: string;
  namespace: string;
  description: string;
  args: readonly ArgumentDescriptor[];
  run: CommandCallable;
  thisArg?: unknown;
  captureAll: boolean;
  captureMode: CaptureMode;
  acceptsExtras: boolean;
}

export interface ArgumentLookup {
  descriptor: ArgumentDescriptor;
  index: number;
}

const unimplemented: CommandCallable = () => {
  throw new CommandError('This command has no implementation');
};

export function commandPath(namespace: string, name: string): string {
  return namespace ? `${namespace}.${name}` : name;
}

/**
 * Mutable command schema. Decorators refine the descriptors here; `build()`
 * freezes the result into a Command, which is what registries store.
 */
export class CommandBuilder {
  name: string;
  namespace: string;
  description?: string;
  readonly run: CommandCallable;
  readonly thisArg?: unknown;
  readonly captureAll: boolean;
  readonly acceptsExtras: boolean;
  private readonly captureMode: CaptureMode;
  private readonly argumentList: ArgumentDescriptor[] = [];
  private readonly overridden = new Set<string>();

  constructor(init: CommandInit = {}) {
    const run = init.run ?? unimplemented;
    const signature = init.run
      ? inspectSignature(init.run)
      : { args: [], captureAll: false, captureMode: 'list' as const, acceptsExtras: false };

    if (init.captureAll && !signature.captureAll && signature.args.length > 1) {
      throw new SchemaError(
        `'${init.name ?? run.name}' captures all arguments and takes a single argv parameter`
      );
    }

    this.name = init.name ?? run.name;
    this.namespace = init.namespace ?? '';
    this.description = init.description;
    this.run = run;
    this.thisArg = init.thisArg;
    this.captureAll = init.captureAll === true || signature.captureAll;
    this.captureMode = signature.captureMode;
    this.acceptsExtras = signature.acceptsExtras;
    if (!this.captureAll) {
      this.argumentList.push(...signature.args);
    }
  }

  get args(): readonly ArgumentDescriptor[] {
    return this.argumentList;
  }

  get path(): string {
    return commandPath(this.namespace, this.name);
  }

  hasArgument(name: string): boolean {
    return this.argumentList.some((descriptor) => descriptor.name === name);
  }

  /**
   * @throws ArgumentNotFoundError if no argument has this name
   */
  getArgument(name: string): ArgumentLookup {
    const index = this.argumentList.findIndex((descriptor) => descriptor.name === name);
    if (index === -1) {
      throw new ArgumentNotFoundError(name, this.name);
    }
    return { descriptor: this.argumentList[index], index };
  }

  /**
   * Append an argument. An existing argument must be refined through
   * updateArgument() instead; only an argument synthesized for the keyword
   * catch-all may be re-declared, once.
   */
  addArgument(descriptor: ArgumentDescriptor): void {
    if (this.captureAll) {
      throw new SchemaError(
        `'${this.name}' captures all arguments and cannot declare '${descriptor.name}'`
      );
    }

    const index = this.argumentList.findIndex((existing) => existing.name === descriptor.name);
    if (index === -1) {
      this.argumentList.push(descriptor);
      return;
    }

    const existing = this.argumentList[index];
    if (!existing.synthesized || this.overridden.has(descriptor.name)) {
      throw new SchemaError(
        `Argument '${descriptor.name}' is already declared on '${this.name}'`
      );
    }
    this.overridden.add(descriptor.name);
    this.argumentList[index] = { ...mergeArgument(existing, descriptor), synthesized: true };
  }

  updateArgument(name: string, patch: ArgumentPatch): ArgumentDescriptor {
    const { descriptor, index } = this.getArgument(name);
    const updated = mergeArgument(descriptor, patch);
    this.argumentList[index] = updated;
    return updated;
  }

  /** Refine an argument: help, shortcut, choices, type, default. */
  arg(name: string, options: ArgOptions = {}): this {
    const validated = validateOptions(ArgOptionsSchema, options, `arg('${name}')`);
    const defaults: ArgumentPatch =
      validated.default === undefined
        ? {}
        : {
            defaultValue: validated.default,
            declaredType: validated.type ?? inferDeclaredType(validated.default),
            required: validated.required ?? false,
          };
    const patch: ArgumentPatch = {
      help: validated.help,
      shortcut: validated.shortcut,
      choices: validated.choices,
      declaredType: validated.type,
      required: validated.required,
      ...defaults,
    };
    this.refine(name, patch);
    return this;
  }

  /**
   * Source an argument from an environment variable. The target argument is
   * the lower-cased variable name unless `options.arg` names another.
   */
  env(variable: string, options: EnvOptions = {}): this {
    const validated = validateOptions(EnvOptionsSchema, options, `env('${variable}')`);
    const source: EnvSource = { variable, fallback: validated.value };
    this.refine(validated.arg ?? variable.toLowerCase(), { env: source });
    return this;
  }

  /** Ask for an argument interactively when it is not given. */
  prompt(name: string, options: PromptOptionsInput = {}): this {
    const validated = validateOptions(PromptOptionsSchema, options, `prompt('${name}')`);
    this.refine(name, { prompt: validated });
    return this;
  }

  build(): Command {
    if (!this.name) {
      throw new SchemaError('A command needs a name');
    }
    return new Command({
      name: this.name,
      namespace: this.namespace,
      description: this.description ? firstLine(this.description) ?? NO_DESCRIPTION : NO_DESCRIPTION,
      args: this.argumentList,
      run: this.run,
      thisArg: this.thisArg,
      captureAll: this.captureAll,
      captureMode: this.captureMode,
      acceptsExtras: this.acceptsExtras,
    });
  }

  private refine(name: string, patch: ArgumentPatch): void {
    if (this.hasArgument(name)) {
      this.updateArgument(name, patch);
      return;
    }
    if (!this.acceptsExtras) {
      throw new ArgumentNotFoundError(name, this.name);
    }
    this.addArgument({ ...createArgument(name, patch), required: patch.required ?? false, synthesized: true });
  }
}

/**
 * A registered command: frozen schema plus the parse/dispatch algorithm.
 */
export class Command {
  readonly name: string;
  readonly namespace: string;
  readonly description: string;
  readonly args: readonly ArgumentDescriptor[];
  readonly captureAll: boolean;
  readonly acceptsExtras: boolean;
  readonly run: CommandCallable;
  private readonly thisArg?: unknown;
  private readonly captureMode: CaptureMode;

  constructor(definition: CommandDefinition) {
    if (definition.captureAll && definition.args.length > 0) {
      throw new SchemaError(`'${definition.name}' cannot mix raw argument capture with typed arguments`);
    }
    this.name = definition.name;
    this.namespace = definition.namespace;
    this.description = definition.description;
    this.args = Object.freeze(definition.args.map((descriptor) => Object.freeze({ ...descriptor })));
    this.captureAll = definition.captureAll;
    this.acceptsExtras = definition.acceptsExtras;
    this.run = definition.run;
    this.thisArg = definition.thisArg;
    this.captureMode = definition.captureMode;
    Object.freeze(this);
  }

  get path(): string {
    return commandPath(this.namespace, this.name);
  }

  /**
   * @throws ArgumentNotFoundError if no argument has this name
   */
  getArgument(name: string): ArgumentLookup {
    const index = this.args.findIndex((descriptor) => descriptor.name === name);
    if (index === -1) {
      throw new ArgumentNotFoundError(name, this.name);
    }
    return { descriptor: this.args[index], index };
  }

  /** Copy of this command living in another namespace. */
  withNamespace(namespace: string): Command {
    return new Command({ ...this.definition(), namespace });
  }

  /**
   * Parse `argv`, invoke the command and write its result.
   *
   * Resolves with the exit status: 1 for usage errors, CommandError and a
   * `false` result, 0 otherwise. MissingEnvError and errors thrown by the
   * command itself propagate.
   */
  async parse(argv: readonly string[], io?: CommandIO): Promise<number> {
    const streams = io ?? processIO();
    try {
      const callArgs = await this.bind(argv, streams);
      Logger.debug(`Invoking '${this.path}'`);
      const result: unknown = await Reflect.apply(this.run, this.thisArg, callArgs);
      return puts(result, streams.stdout) ? 0 : 1;
    } catch (error) {
      if (error instanceof UsageError) {
        if (!error.reported) {
          streams.stderr.write(`${error.message}\n`);
        }
        return error.exitCode;
      }
      if (error instanceof CommandError) {
        streams.stderr.write(`${error.message}\n`);
        return 1;
      }
      throw error;
    } finally {
      if (!io) {
        streams.reader.close?.();
      }
    }
  }

  /**
   * Resolve the call arguments for `argv` without invoking the command.
   */
  async bind(argv: readonly string[], io: CommandIO): Promise<unknown[]> {
    if (this.captureAll) {
      return this.captureMode === 'spread' ? [...argv] : [[...argv]];
    }

    const { values, extras } = tokenize(
      { path: this.path, description: this.description, args: this.args, acceptsExtras: this.acceptsExtras },
      argv,
      io
    );

    const resolved = new Map<string, ArgumentValue>();
    for (const descriptor of this.args) {
      resolved.set(descriptor.name, await resolveValue(descriptor, values, io));
    }

    const positional: unknown[] = this.args
      .filter((descriptor) => !descriptor.synthesized)
      .map((descriptor) => resolved.get(descriptor.name));
    if (!this.acceptsExtras) {
      return positional;
    }

    const named: ExtraOptions = { ...extras };
    for (const descriptor of this.args) {
      const value = resolved.get(descriptor.name);
      if (descriptor.synthesized && value !== undefined) {
        named[descriptor.name] = value;
      }
    }
    return [...positional, named];
  }

  private definition(): CommandDefinition {
    return {
      name: this.name,
      namespace: this.namespace,
      description: this.description,
      args: this.args,
      run: this.run,
      thisArg: this.thisArg,
      captureAll: this.captureAll,
      captureMode: this.captureMode,
      acceptsExtras: this.acceptsExtras,
    };
  }
}

/**
 * Value for an argument left off the command line: environment variable,
 * then prompt, then the env fallback, then the static default.
 */
async function resolveValue(
  descriptor: ArgumentDescriptor,
  given: ReadonlyMap<string, ArgumentValue>,
  io: CommandIO
): Promise<ArgumentValue> {
  if (given.has(descriptor.name)) {
    return given.get(descriptor.name);
  }

  const fromEnv = descriptor.env ? io.env[descriptor.env.variable] : undefined;
  if (descriptor.env && fromEnv !== undefined) {
    return coerceEnv(descriptor, descriptor.env.variable, fromEnv);
  }

  if (descriptor.prompt) {
    return prompt(
      descriptor.prompt.text ?? descriptor.name,
      {
        type: descriptor.declaredType,
        default: descriptor.defaultValue,
        choices: descriptor.choices,
        empty: descriptor.prompt.empty,
        confirm: descriptor.prompt.confirm,
        hidden: descriptor.prompt.hidden,
      },
      { reader: io.reader, writer: io.stdout }
    );
  }

  if (descriptor.env) {
    if (descriptor.env.fallback === undefined) {
      throw new MissingEnvError(descriptor.env.variable);
    }
    return coerceEnv(descriptor, descriptor.env.variable, descriptor.env.fallback);
  }

  return descriptor.defaultValue;
}

function coerceEnv(descriptor: ArgumentDescriptor, variable: string, text: string): ArgumentValue {
  const coercion = coerce(text, descriptor.declaredType, descriptor.choices);
  if (!coercion.ok) {
    throw new CommandError(`Environment variable ${variable}: ${coercion.reason}`);
  }
  return coercion.value;
}
