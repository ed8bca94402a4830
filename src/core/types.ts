// src/core/types.ts

import type { CommandClass } from './class-command.js';

/**
 * Any function can back a command. The parameter list is typed `never` so
 * that functions with concrete parameter types stay assignable; the engine
 * calls them through Reflect.apply with values bound from the command line.
 */
export type CommandCallable = (...args: never) => unknown;

/**
 * How a capture-all command receives raw argv: spread over a rest parameter,
 * or as a single array argument.
 */
export type CaptureMode = 'spread' | 'list';

/** Extra named values collected for a keyword catch-all parameter. */
export type ExtraOptions = Record<string, string | boolean | number | null | undefined>;

/** Anything the `arg` and `prompt` decorators and `Manager.command` accept. */
export type CommandTarget = CommandCallable | CommandClass;
