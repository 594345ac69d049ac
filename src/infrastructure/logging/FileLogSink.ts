import { createWriteStream } from 'node:fs';
import type { WriteStream } from 'node:fs';
import type { LogLevel, LogSink } from '../../domain/ports/LogSink.js';

/** Appends timestamped diagnostic lines to a log file. */
export class FileLogSink implements LogSink {
  private readonly stream: WriteStream;
  private streamError: Error | null = null;
  private closing: Promise<void> | null = null;

  constructor(readonly path: string) {
    this.stream = createWriteStream(path, { flags: 'a', encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      this.streamError = error;
    });
  }

  write(level: LogLevel, message: string): void {
    if (this.closing) return;
    this.stream.write(`${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`);
  }

  close(): Promise<void> {
    this.closing ??= new Promise<void>((resolve, reject) => {
      const settle = (): void => {
        if (this.streamError) reject(this.streamError);
        else resolve();
      };
      if (this.stream.closed) {
        settle();
        return;
      }
      this.stream.once('close', settle);
      this.stream.end();
    });
    return this.closing;
  }
}
