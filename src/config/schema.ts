// src/config/schema.ts

import { z, type ZodError, type ZodTypeDef, type ZodType } from 'zod';
import { LOG_LEVEL_NAMES, LogLevel, Logger } from '../utils/logger.js';
import { SchemaError } from '../utils/errors.js';

/**
 * Value types an argument can be coerced to. Anything else stays free-form
 * text.
 */
export const DeclaredTypeSchema = z.enum(['string', 'number', 'boolean']);
export type DeclaredType = z.infer<typeof DeclaredTypeSchema>;

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);
export type Scalar = z.infer<typeof ScalarSchema>;

/**
 * Options accepted by the `arg` decorator. Every field refines the
 * descriptor derived from the function signature.
 */
export const ArgOptionsSchema = z
  .object({
    help: z.string().optional(),
    shortcut: z
      .string()
      .regex(/^[A-Za-z0-9]$/, 'shortcut must be a single letter or digit')
      .optional(),
    choices: z.array(z.union([z.string(), z.number()])).nonempty().optional(),
    type: DeclaredTypeSchema.optional(),
    default: z.union([ScalarSchema, z.null()]).optional(),
    required: z.boolean().optional(),
  })
  .strict();
export type ArgOptions = z.infer<typeof ArgOptionsSchema>;

/**
 * Options accepted by the `env` decorator.
 * - value: fallback used when the variable is unset (absent = required)
 * - arg:   target parameter (defaults to the lower-cased variable name)
 */
export const EnvOptionsSchema = z
  .object({
    value: z.string().optional(),
    arg: z.string().min(1).optional(),
  })
  .strict();
export type EnvOptions = z.infer<typeof EnvOptionsSchema>;

export const PromptOptionsSchema = z
  .object({
    text: z.string().optional(),
    hidden: z.boolean().default(false),
    confirm: z.boolean().default(false),
    empty: z.boolean().default(false),
  })
  .strict();
export type PromptOptionsInput = z.input<typeof PromptOptionsSchema>;
export type PromptConfig = z.output<typeof PromptOptionsSchema>;

export const LogLevelNameSchema = z.enum(LOG_LEVEL_NAMES);

export const ManagerOptionsSchema = z
  .object({
    name: z.string().min(1).optional(),
    logLevel: LogLevelNameSchema.optional(),
  })
  .strict();
export type ManagerOptions = z.infer<typeof ManagerOptionsSchema>;

export const RegisterOptionsSchema = z
  .object({
    name: z.string().min(1).optional(),
    namespace: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();
export type RegisterOptions = z.infer<typeof RegisterOptionsSchema>;

/** Format a ZodError into a human-readable string. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate decorator or manager options, turning zod failures into a
 * SchemaError that names the offending call.
 */
export function validateOptions<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  context: string
): T {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new SchemaError(`Invalid options for ${context}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export interface Settings {
  /** Undefined when the environment does not ask for a level */
  logLevel?: LogLevel;
  programName?: string;
}

/**
 * Runtime settings derived from the environment:
 * - ARGBIND_LOG_LEVEL: debug | info | warn | error
 * - DEBUG:             any value turns on debug logging
 * - ARGBIND_PROG:      program name shown in usage text
 */
export function resolveSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const requested = env.ARGBIND_LOG_LEVEL;
  let logLevel = requested ? Logger.parseLevel(requested) : undefined;
  if (requested && logLevel === undefined) {
    Logger.warn(`Ignoring ARGBIND_LOG_LEVEL=${requested}; expected one of ${LOG_LEVEL_NAMES.join(', ')}`);
  }
  if (logLevel === undefined && env.DEBUG) {
    logLevel = LogLevel.DEBUG;
  }

  const programName = env.ARGBIND_PROG?.trim();
  return {
    logLevel,
    programName: programName ? programName : undefined,
  };
}
