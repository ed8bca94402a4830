// src/utils/errors.ts

/**
 * Raised while a command schema is being built or registered: duplicate
 * argument or command path, capture-all mixed with typed arguments, invalid
 * decorator options. Fatal to program start-up.
 */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class ArgumentNotFoundError extends SchemaError {
  constructor(
    public readonly argumentName: string,
    commandName: string
  ) {
    super(`Command '${commandName}' has no argument named '${argumentName}'`);
    this.name = 'ArgumentNotFoundError';
  }
}

/**
 * Malformed command line. The parser has already reported the problem on
 * stderr when `reported` is true.
 */
export class UsageError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly reported: boolean = false
  ) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * User-facing failure. Throw it from a command to print `message` on stderr
 * and exit non-zero without a stack trace.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export class PromptError extends CommandError {
  constructor(message: string) {
    super(message);
    this.name = 'PromptError';
  }
}

export class MissingEnvError extends Error {
  constructor(public readonly variable: string) {
    super(`Missing required environment variable '${variable}'`);
    this.name = 'MissingEnvError';
  }
}
