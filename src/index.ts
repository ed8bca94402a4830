// src/index.ts - Public API

import { Manager } from './core/manager.js';

export { Manager, type CommandListing, type Registrable } from './core/manager.js';
export {
  Command,
  CommandBuilder,
  NO_DESCRIPTION,
  commandPath,
  type ArgumentLookup,
  type CommandDefinition,
  type CommandInit,
} from './core/command.js';
export {
  NEGATED_FLAG_PREFIX,
  booleanFlagPolarity,
  createArgument,
  isBooleanFlag,
  isPositional,
  longFlag,
  type ArgumentDescriptor,
  type ArgumentPatch,
  type ArgumentValue,
  type EnvSource,
  type FlagPolarity,
} from './core/argument.js';
export { inspectSignature, type Signature } from './core/signature-inspector.js';
export { ClassCommand, isCommandClass, snakeCase, type CommandClass } from './core/class-command.js';
export {
  arg,
  env,
  envBindings,
  isRegistered,
  pendingMutations,
  prompt,
  type Decorator,
  type EnvBinding,
  type EnvBound,
  type SchemaMutation,
} from './core/decorators.js';
export { parseEnv } from './core/env-blob.js';
export type { CaptureMode, CommandCallable, CommandTarget, ExtraOptions } from './core/types.js';
export { FAILED_TEXT, OK_TEXT, puts, renderLines } from './cli/output.js';
export { prompt as ask, type PromptIO, type PromptRequest, type PromptValue } from './cli/prompt.js';
export {
  StreamLineReader,
  processIO,
  type CommandIO,
  type LineReader,
  type ReadLineOptions,
  type TextWriter,
} from './cli/io.js';
export { UsageFormatter, type CommandGroup, type CommandSummary } from './cli/usage-formatter.js';
export {
  ArgumentNotFoundError,
  CommandError,
  MissingEnvError,
  PromptError,
  SchemaError,
  UsageError,
} from './utils/errors.js';
export { LogLevel, Logger } from './utils/logger.js';
export {
  resolveSettings,
  type ArgOptions,
  type EnvOptions,
  type ManagerOptions,
  type PromptOptionsInput,
  type RegisterOptions,
  type Settings,
} from './config/schema.js';
export {
  DEFAULT_NAMESPACE,
  MemoryConfigStore,
  createConfigsManager,
  type ConfigItem,
  type ConfigStore,
} from './ext/configs.js';

/** Process-wide registry for single-manager programs. */
export const manager = new Manager();
