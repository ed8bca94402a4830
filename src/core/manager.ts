// src/core/manager.ts

import * as path from 'path';
import { isCommandClass, snakeCase, type CommandClass } from './class-command.js';
import { Command, CommandBuilder } from './command.js';
import {
  arg,
  env,
  envBindings,
  markRegistered,
  pendingMutations,
  prompt,
  type Decorator,
  type EnvBinding,
  type EnvBound,
} from './decorators.js';
import { parseEnv } from './env-blob.js';
import type { CommandCallable, CommandTarget } from './types.js';
import {
  ManagerOptionsSchema,
  RegisterOptionsSchema,
  resolveSettings,
  validateOptions,
  type ArgOptions,
  type EnvOptions,
  type ManagerOptions,
  type PromptOptionsInput,
  type RegisterOptions,
} from '../config/schema.js';
import { processIO, type CommandIO } from '../cli/io.js';
import { UsageFormatter, type CommandGroup } from '../cli/usage-formatter.js';
import { SchemaError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export type Registrable = CommandTarget | CommandBuilder | Command;

export interface CommandListing {
  /** '' for the root namespace */
  namespace: string;
  commands: Command[];
}

/**
 * Registry of commands keyed by path (`name` or `namespace.name`), and the
 * dispatcher that runs them.
 *
 * @example
 * ```typescript
 * const manager = new Manager({ name: 'tool' });
 *
 * manager.command(function greet(name, shout = false) {
 *   const text = `Hello ${name}`;
 *   return shout ? text.toUpperCase() : text;
 * });
 *
 * await manager.run(); // tool greet Ada --shout
 * ```
 */
export class Manager {
  readonly prog: string;
  /** Env bindings of functions wrapped by `env`, by function name */
  readonly envVars = new Map<string, EnvBinding[]>();
  private readonly registry = new Map<string, Command>();

  constructor(options: ManagerOptions = {}) {
    const validated = validateOptions(ManagerOptionsSchema, options, 'Manager');
    const settings = resolveSettings();

    if (validated.logLevel) {
      Logger.setLevelName(validated.logLevel);
    } else if (settings.logLevel !== undefined) {
      Logger.setLevel(settings.logLevel);
    }

    this.prog = validated.name ?? settings.programName ?? path.basename(process.argv[1] ?? 'cli');
  }

  static parseEnv(text: string): Record<string, string> {
    return parseEnv(text);
  }

  get commands(): ReadonlyMap<string, Command> {
    return this.registry;
  }

  /**
   * Register a function or a ClassCommand subclass as a command and return
   * it unchanged. Without a target, returns a decorator that does the same.
   */
  command<F extends CommandTarget>(target: F, options?: RegisterOptions): F;
  command(options?: RegisterOptions): Decorator;
  command(
    targetOrOptions?: CommandTarget | RegisterOptions,
    options: RegisterOptions = {}
  ): CommandTarget | Decorator {
    if (typeof targetOrOptions === 'function') {
      this.register(targetOrOptions, options);
      return targetOrOptions;
    }

    const registerOptions = targetOrOptions ?? {};
    const decorate: Decorator = (target) => {
      this.register(target, registerOptions);
      return target;
    };
    return decorate;
  }

  /**
   * Register a function, a class-based command, a builder or a built command.
   *
   * Functions and classes are inspected, refined by their pending
   * `arg`/`env`/`prompt` decorators and frozen; decorating them afterwards
   * is a SchemaError. A built Command only takes `namespace`.
   *
   * @throws SchemaError on an invalid signature or a duplicate path
   */
  register(target: Registrable, options: RegisterOptions = {}): Command {
    const validated = validateOptions(RegisterOptionsSchema, options, 'register()');

    let command: Command;
    let decorated: CommandTarget | undefined;
    if (target instanceof Command) {
      if (validated.name !== undefined || validated.description !== undefined) {
        throw new SchemaError(`'${target.path}' is already built; only its namespace can change`);
      }
      command = validated.namespace === undefined ? target : target.withNamespace(validated.namespace);
    } else if (target instanceof CommandBuilder) {
      target.name = validated.name ?? target.name;
      target.namespace = validated.namespace ?? target.namespace;
      target.description = validated.description ?? target.description;
      command = target.build();
    } else if (isCommandClass(target)) {
      command = this.buildFromClass(target, validated);
      decorated = target;
    } else {
      command = this.buildFromFunction(target, validated);
      decorated = target;
    }

    this.addCommand(command);
    if (decorated) {
      markRegistered(decorated);
    }
    return command;
  }

  /**
   * @throws SchemaError if the path is taken
   */
  addCommand(command: Command): void {
    if (this.registry.has(command.path)) {
      throw new SchemaError(`Command '${command.path}' is already registered`);
    }
    this.registry.set(command.path, command);
    Logger.debug(`Registered command '${command.path}'`);
  }

  get(key: string): Command | undefined {
    return this.registry.get(key);
  }

  has(key: string): boolean {
    return this.registry.has(key);
  }

  /**
   * Copy every command of `other` into this registry, under `namespace` when
   * given. Nothing is copied if any resulting path is already taken.
   */
  merge(other: Manager, namespace?: string): void {
    const incoming = Array.from(other.commands.values(), (command) => {
      if (!namespace) {
        return command;
      }
      return command.withNamespace(
        command.namespace ? `${namespace}.${command.namespace}` : namespace
      );
    });

    const seen = new Set<string>();
    for (const command of incoming) {
      if (this.registry.has(command.path) || seen.has(command.path)) {
        throw new SchemaError(`Cannot merge: command '${command.path}' is already registered`);
      }
      seen.add(command.path);
    }

    for (const command of incoming) {
      this.addCommand(command);
    }
    for (const [name, envBindingList] of other.envVars) {
      this.envVars.set(name, [...(this.envVars.get(name) ?? []), ...envBindingList]);
    }
    Logger.debug(`Merged ${incoming.length} command(s)${namespace ? ` into '${namespace}'` : ''}`);
  }

  parseEnv(text: string): Record<string, string> {
    return parseEnv(text);
  }

  /**
   * Copy the variables of an env blob into `target`.
   */
  loadEnv(text: string, target: NodeJS.ProcessEnv = process.env): Record<string, string> {
    const parsed = parseEnv(text);
    Object.assign(target, parsed);
    return parsed;
  }

  arg(name: string, options: ArgOptions = {}): Decorator {
    return arg(name, options);
  }

  prompt(name: string, options: PromptOptionsInput = {}): Decorator {
    return prompt(name, options);
  }

  env(
    variable: string,
    options: EnvOptions = {}
  ): <F extends CommandCallable>(fn: F) => EnvBound<F> {
    const decorate = env(variable, options);
    return <F extends CommandCallable>(fn: F): EnvBound<F> => {
      const wrapped = decorate(fn);
      this.recordEnvBindings(wrapped);
      return wrapped;
    };
  }

  /**
   * Commands grouped by namespace: the root namespace first, then the others
   * in order, each group sorted by command name.
   */
  listCommands(): CommandListing[] {
    const groups = new Map<string, Command[]>();
    for (const command of this.registry.values()) {
      const group = groups.get(command.namespace) ?? [];
      group.push(command);
      groups.set(command.namespace, group);
    }

    return Array.from(groups.keys())
      .sort((a, b) => (a === '' ? -1 : b === '' ? 1 : a.localeCompare(b)))
      .map((namespace) => ({
        namespace,
        commands: (groups.get(namespace) ?? []).sort((a, b) => a.name.localeCompare(b.name)),
      }));
  }

  usage(): string {
    const groups: CommandGroup[] = this.listCommands().map(({ namespace, commands }) => ({
      namespace,
      commands: commands.map((command) => ({ name: command.name, description: command.description })),
    }));
    return UsageFormatter.formatUsage(this.prog, groups);
  }

  /**
   * Dispatch `argv` (without the program name) and resolve with the exit
   * status.
   */
  async main(argv: readonly string[], io?: CommandIO): Promise<number> {
    const streams = io ?? processIO();
    try {
      const [target, ...rest] = argv;
      if (target === undefined || target === '-h' || target === '--help') {
        streams.stdout.write(this.usage());
        return 0;
      }

      const command = this.registry.get(target);
      if (!command) {
        streams.stderr.write(`Unknown command: ${target}\n`);
        streams.stderr.write(this.usage());
        return 1;
      }

      Logger.debug(`Dispatching '${command.path}' with ${rest.length} argument(s)`);
      return await command.parse(rest, streams);
    } finally {
      if (!io) {
        streams.reader.close?.();
      }
    }
  }

  /** Run `main` on the process arguments and exit with its status. */
  async run(argv: readonly string[] = process.argv.slice(2)): Promise<never> {
    const status = await this.main(argv);
    process.exit(status);
  }

  private buildFromFunction(fn: CommandCallable, options: RegisterOptions): Command {
    const builder = new CommandBuilder({
      run: fn,
      name: options.name,
      namespace: options.namespace,
      description: options.description,
    });
    for (const mutation of pendingMutations(fn)) {
      mutation(builder);
    }
    const command = builder.build();
    this.recordEnvBindings(fn);
    Logger.debug(`Built '${command.path}' from ${fn.name || 'an anonymous function'}`);
    return command;
  }

  /** One instance per registration; `run` is called with it as `this`. */
  private buildFromClass(cls: CommandClass, options: RegisterOptions): Command {
    const instance = new cls();
    const builder = new CommandBuilder({
      run: instance.run,
      thisArg: instance,
      name: options.name ?? snakeCase(cls.name),
      namespace: options.namespace,
      description: options.description,
    });
    for (const mutation of pendingMutations(cls)) {
      mutation(builder);
    }
    const command = builder.build();
    Logger.debug(`Built '${command.path}' from class ${cls.name}`);
    return command;
  }

  private recordEnvBindings(fn: CommandCallable): void {
    const list = envBindings(fn);
    if (list.length > 0 && fn.name) {
      this.envVars.set(fn.name, [...list]);
    }
  }
}
