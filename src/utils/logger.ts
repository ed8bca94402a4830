// src/utils/logger.ts

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

/** Names accepted by ARGBIND_LOG_LEVEL and `ManagerOptions.logLevel`. */
export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const LEVELS_BY_NAME = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
]);

export class Logger {
  private static level: LogLevel = LogLevel.INFO;

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  /** Level for a name such as `warn` or `DEBUG`; undefined if unknown. */
  static parseLevel(name: string): LogLevel | undefined {
    return LEVELS_BY_NAME.get(name.trim().toLowerCase());
  }

  /**
   * Set the level by name. Unknown names leave the level alone and return
   * false.
   */
  static setLevelName(name: string): boolean {
    const level = this.parseLevel(name);
    if (level === undefined) {
      return false;
    }
    this.level = level;
    return true;
  }

  static debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(`🔍 ${message}`, ...args);
    }
  }

  static info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(`ℹ️  ${message}`, ...args);
    }
  }

  static warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(`⚠️  ${message}`, ...args);
    }
  }

  static error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(`❌ ${message}`, ...args);
    }
  }
}
