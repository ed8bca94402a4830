// src/core/argument.ts

import type { DeclaredType, PromptConfig, Scalar } from '../config/schema.js';

export type ArgumentValue = Scalar | null | undefined;

export interface EnvSource {
  /** Environment variable that supplies the value */
  variable: string;
  /** Used when the variable is unset; absent means the variable is required */
  fallback?: string;
}

/**
 * Parsing and resolution rules for one command parameter.
 */
export interface ArgumentDescriptor {
  readonly name: string;
  /** True iff the source parameter had no default */
  readonly required: boolean;
  readonly defaultValue: ArgumentValue;
  /** Inferred from a non-null default; undefined means free-form text */
  readonly declaredType?: DeclaredType;
  readonly choices?: readonly (string | number)[];
  readonly help?: string;
  readonly shortcut?: string;
  readonly env?: EnvSource;
  readonly prompt?: PromptConfig;
  /** Added through a decorator on a command with a keyword catch-all */
  readonly synthesized?: boolean;
}

export type ArgumentPatch = Partial<Omit<ArgumentDescriptor, 'name'>>;

/** Prefix that turns a boolean option off (`--no-verbose`). */
export const NEGATED_FLAG_PREFIX = 'no-';

export type FlagPolarity = 'enable' | 'disable';

/**
 * Boolean flag polarity: a flag whose default is `true` can only turn the
 * value off, so it is rendered with NEGATED_FLAG_PREFIX. Every other boolean
 * flag turns the value on.
 */
export function booleanFlagPolarity(descriptor: ArgumentDescriptor): FlagPolarity {
  return descriptor.defaultValue === true ? 'disable' : 'enable';
}

export function isBooleanFlag(descriptor: ArgumentDescriptor): boolean {
  return descriptor.declaredType === 'boolean';
}

/**
 * Required, value-taking arguments are positional tokens; everything else is
 * an option flag. Arguments the environment or a prompt can supply are
 * options too, so leaving one out never shifts the positionals after it.
 */
export function isPositional(descriptor: ArgumentDescriptor): boolean {
  return (
    descriptor.required &&
    !isBooleanFlag(descriptor) &&
    !descriptor.synthesized &&
    !hasFallbackSource(descriptor)
  );
}

/** Something other than the command line can supply the value. */
export function hasFallbackSource(descriptor: ArgumentDescriptor): boolean {
  return descriptor.env !== undefined || descriptor.prompt !== undefined;
}

export function inferDeclaredType(value: unknown): DeclaredType | undefined {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return undefined;
  }
}

export function createArgument(
  name: string,
  options: ArgumentPatch = {}
): ArgumentDescriptor {
  const defaultValue = options.defaultValue;
  return mergeArgument(
    {
      name,
      required: defaultValue === undefined,
      defaultValue,
      declaredType: inferDeclaredType(defaultValue),
    },
    options
  );
}

export function mergeArgument(
  descriptor: ArgumentDescriptor,
  patch: ArgumentPatch
): ArgumentDescriptor {
  const merged: ArgumentDescriptor = { ...descriptor };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

/** Flag text as it appears on the command line (`--name` or `--no-name`). */
export function longFlag(descriptor: ArgumentDescriptor): string {
  if (isBooleanFlag(descriptor) && booleanFlagPolarity(descriptor) === 'disable') {
    return `--${NEGATED_FLAG_PREFIX}${descriptor.name}`;
  }
  return `--${descriptor.name}`;
}

export function formatValue(value: ArgumentValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}
