// src/core/command-parser.ts
// Renders a command schema onto commander and tokenizes argv against it

import { Argument, Command as Program, CommanderError, InvalidArgumentError, Option } from 'commander';

import {
  hasFallbackSource,
  isBooleanFlag,
  isPositional,
  longFlag,
  type ArgumentDescriptor,
  type ArgumentValue,
} from './argument.js';
import { coerce } from './coerce.js';
import type { ExtraOptions } from './types.js';
import type { TextWriter } from '../cli/io.js';
import { UsageError } from '../utils/errors.js';

export interface ParserSchema {
  path: string;
  description: string;
  args: readonly ArgumentDescriptor[];
  acceptsExtras: boolean;
}

export interface ParserOutput {
  stdout: TextWriter;
  stderr: TextWriter;
}

export interface TokenizedArgs {
  /** Values given explicitly on the command line, by argument name */
  values: Map<string, ArgumentValue>;
  /** Undeclared `--key [value]` flags, for commands with a keyword catch-all */
  extras: ExtraOptions;
}

interface ParserSurface {
  program: Program;
  positionals: ArgumentDescriptor[];
  options: Array<{ descriptor: ArgumentDescriptor; option: Option }>;
}

/**
 * Tokenize `argv` for one command.
 *
 * @throws UsageError when commander rejects the input; the error and the
 * command's help have already been written to `output.stderr`
 */
export function tokenize(
  schema: ParserSchema,
  argv: readonly string[],
  output: ParserOutput
): TokenizedArgs {
  const surface = buildParser(schema, output);
  const lifted = schema.acceptsExtras
    ? liftExtras(argv, knownFlags(surface))
    : { argv: [...argv], extras: {} };

  try {
    surface.program.parse(lifted.argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new UsageError(error.message, error.exitCode, true);
    }
    throw error;
  }

  const values = new Map<string, ArgumentValue>();
  surface.positionals.forEach((descriptor, index) => {
    const value: ArgumentValue = surface.program.processedArgs[index];
    if (value !== undefined) {
      values.set(descriptor.name, value);
    }
  });

  const parsed = surface.program.opts();
  for (const { descriptor, option } of surface.options) {
    const key = option.attributeName();
    if (surface.program.getOptionValueSource(key) === 'cli') {
      values.set(descriptor.name, parsed[key]);
    }
  }

  return { values, extras: lifted.extras };
}

function buildParser(schema: ParserSchema, output: ParserOutput): ParserSurface {
  const program = new Program(schema.path)
    .description(schema.description)
    .exitOverride()
    .allowExcessArguments(false)
    .showHelpAfterError()
    .configureOutput({
      writeOut: (text) => {
        output.stdout.write(text);
      },
      writeErr: (text) => {
        output.stderr.write(text);
      },
    })
    // values are read back from processedArgs and opts()
    .action(() => undefined);

  const surface: ParserSurface = { program, positionals: [], options: [] };

  for (const descriptor of schema.args) {
    if (isPositional(descriptor)) {
      program.addArgument(toArgument(descriptor));
      surface.positionals.push(descriptor);
    } else {
      const option = toOption(descriptor);
      program.addOption(option);
      surface.options.push({ descriptor, option });
    }
  }

  return surface;
}

function toArgument(descriptor: ArgumentDescriptor): Argument {
  const argument = new Argument(`<${descriptor.name}>`, descriptor.help ?? '');
  if (descriptor.choices) {
    argument.choices(descriptor.choices.map(String));
  }
  return argument.argParser(valueParser(descriptor));
}

function toOption(descriptor: ArgumentDescriptor): Option {
  const long = isBooleanFlag(descriptor) ? longFlag(descriptor) : `${longFlag(descriptor)} <value>`;
  const flags = descriptor.shortcut ? `-${descriptor.shortcut}, ${long}` : long;
  const option = new Option(flags, descriptor.help ?? '');

  if (isBooleanFlag(descriptor)) {
    return option;
  }
  if (descriptor.choices) {
    option.choices(descriptor.choices.map(String));
  }
  if (descriptor.required && !hasFallbackSource(descriptor)) {
    option.makeOptionMandatory();
  }
  return option.argParser(valueParser(descriptor));
}

/**
 * Commander's own choices check is replaced by the argument parser, so the
 * parser checks choices itself before coercing.
 */
function valueParser(descriptor: ArgumentDescriptor): (text: string) => string | number | boolean {
  return (text) => {
    const coercion = coerce(text, descriptor.declaredType, descriptor.choices);
    if (!coercion.ok) {
      throw new InvalidArgumentError(`${coercion.reason}.`);
    }
    return coercion.value;
  };
}

function knownFlags(surface: ParserSurface): Set<string> {
  const flags = new Set<string>(['--help']);
  for (const { descriptor } of surface.options) {
    flags.add(longFlag(descriptor));
    flags.add(`--${descriptor.name}`);
  }
  return flags;
}

/**
 * Pull undeclared long flags out of argv. `--key=value` and `--key value`
 * take a value; a bare `--key` is true. Tokens after `--` are left alone.
 */
export function liftExtras(
  argv: readonly string[],
  known: ReadonlySet<string>
): { argv: string[]; extras: ExtraOptions } {
  const remaining: string[] = [];
  const extras: ExtraOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '--') {
      remaining.push(...argv.slice(i));
      break;
    }
    if (!token.startsWith('--')) {
      remaining.push(token);
      continue;
    }

    const separator = token.indexOf('=');
    const flag = separator === -1 ? token : token.slice(0, separator);
    if (known.has(flag)) {
      remaining.push(token);
      continue;
    }

    const key = flag.slice(2);
    const next = argv[i + 1];
    if (separator !== -1) {
      extras[key] = token.slice(separator + 1);
    } else if (next !== undefined && !next.startsWith('-')) {
      extras[key] = next;
      i++;
    } else {
      extras[key] = true;
    }
  }

  return { argv: remaining, extras };
}
