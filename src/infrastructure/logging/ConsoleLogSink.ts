import type { LogLevel, LogSink } from '../../domain/ports/LogSink.js';

/** Writes info lines to stdout and warnings and errors to stderr. */
export class ConsoleLogSink implements LogSink {
  constructor(
    private readonly out: NodeJS.WritableStream = process.stdout,
    private readonly err: NodeJS.WritableStream = process.stderr,
  ) {}

  write(level: LogLevel, message: string): void {
    (level === 'info' ? this.out : this.err).write(`${message}\n`);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
