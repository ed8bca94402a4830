// src/cli/io.ts
// Injectable process I/O for commands, prompts and output

import * as readline from 'readline';
import { Writable } from 'stream';

export interface TextWriter {
  write(chunk: string): unknown;
}

export interface ReadLineOptions {
  /** Ask the reader not to echo what is typed */
  hidden?: boolean;
}

export interface LineReader {
  /** Resolves with the next line, or undefined once input has ended */
  readLine(options?: ReadLineOptions): Promise<string | undefined>;
  close?(): void;
}

export interface CommandIO {
  stdout: TextWriter;
  stderr: TextWriter;
  reader: LineReader;
  env: NodeJS.ProcessEnv;
}

/**
 * Forwards writes to the real output unless muted. Readline echoes typed
 * characters through it, so muting hides input.
 */
class EchoStream extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

/**
 * Reads lines from a stream through one readline interface, created on the
 * first read so commands that never prompt do not hold stdin open.
 */
export class StreamLineReader implements LineReader {
  private rl?: readline.Interface;
  private lines?: AsyncIterableIterator<string>;
  private readonly echo: EchoStream;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    private readonly terminal: boolean = process.stdin.isTTY === true
  ) {
    this.echo = new EchoStream(output);
  }

  async readLine(options: ReadLineOptions = {}): Promise<string | undefined> {
    const lines = this.open();
    const hidden = options.hidden ?? false;
    this.echo.muted = hidden;
    try {
      const next = await lines.next();
      return next.done ? undefined : next.value;
    } finally {
      this.echo.muted = false;
      if (hidden && this.terminal) {
        this.output.write('\n');
      }
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
    this.lines = undefined;
  }

  private open(): AsyncIterableIterator<string> {
    if (!this.lines) {
      this.rl = readline.createInterface({
        input: this.input,
        output: this.echo,
        terminal: this.terminal,
      });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    return this.lines;
  }
}

/**
 * I/O bound to the current process. The stdin reader is created lazily and
 * released by `close()`.
 */
export function processIO(): CommandIO {
  let reader: StreamLineReader | undefined;
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    reader: {
      readLine: (options) => {
        reader ??= new StreamLineReader();
        return reader.readLine(options);
      },
      close: () => {
        reader?.close();
        reader = undefined;
      },
    },
  };
}
