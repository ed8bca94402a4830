// src/core/class-command.ts
// Commands declared as classes with a `run` method

/**
 * Base class for class-based commands. The parameter list of `run` becomes
 * the command's arguments, and the class name in snake_case its name.
 *
 * @example
 * ```typescript
 * class ClassBased extends ClassCommand {
 *   run(name: string, capitalize = false) {
 *     return capitalize ? name.toUpperCase() : name;
 *   }
 * }
 *
 * manager.command(ClassBased); // tool class_based Ada --capitalize
 * ```
 */
export abstract class ClassCommand {
  abstract run(...args: never): unknown;
}

export type CommandClass = new () => ClassCommand;

export function isCommandClass(value: unknown): value is CommandClass {
  return typeof value === 'function' && value.prototype instanceof ClassCommand;
}

/** `ClassBased` → `class_based`, `HTTPServer` → `http_server`. */
export function snakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}
