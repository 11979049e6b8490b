export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Anything with a write method: process.stdout, process.stderr, or a test sink
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface LoggerStreams {
  out: OutputStream;
  err: OutputStream;
}

/**
 * Operator-facing console output. Diagnostics go through pino instead
 * (see diagnostics.ts).
 */
export class Logger {
  private streams: LoggerStreams;

  constructor(
    private level: LogLevel = LogLevel.INFO,
    streams?: Partial<LoggerStreams>,
  ) {
    this.streams = {
      out: streams?.out ?? process.stdout,
      err: streams?.err ?? process.stderr,
    };
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    if (this.level <= LogLevel.DEBUG) {
      this.streams.err.write(`[DEBUG] ${message}\n`);
    }
  }

  info(message: string): void {
    if (this.level <= LogLevel.INFO) {
      this.streams.out.write(`${message}\n`);
    }
  }

  warn(message: string): void {
    if (this.level <= LogLevel.WARN) {
      this.streams.err.write(`[WARN] ${message}\n`);
    }
  }

  error(message: string): void {
    if (this.level <= LogLevel.ERROR) {
      this.streams.err.write(`[ERROR] ${message}\n`);
    }
  }

  /**
   * Print a success message (always shown)
   */
  success(message: string): void {
    this.streams.out.write(`✓ ${message}\n`);
  }

  /**
   * Print a failure message (always shown)
   */
  fail(message: string): void {
    this.streams.out.write(`✗ ${message}\n`);
  }

  /**
   * Write a bare line to stderr, ignoring the level (hints under an error)
   */
  note(message: string): void {
    this.streams.err.write(`${message}\n`);
  }

  /**
   * Write a bare line to stdout, ignoring the level. Used for machine-readable output.
   */
  print(message: string): void {
    this.streams.out.write(`${message}\n`);
  }
}

export const logger = new Logger();
