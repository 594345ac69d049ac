import type { LogLevel, LogSink } from '../../domain/ports/LogSink.js';

/** Mirrors every line to several sinks, e.g. the console and a log file. */
export class TeeLogSink implements LogSink {
  private readonly sinks: readonly LogSink[];

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks;
  }

  write(level: LogLevel, message: string): void {
    for (const sink of this.sinks) {
      sink.write(level, message);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close()));
  }
}
