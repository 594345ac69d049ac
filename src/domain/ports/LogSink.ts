export type LogLevel = 'info' | 'warn' | 'error';

/** Destination of every diagnostic line produced by a run. */
export interface LogSink {
  write(level: LogLevel, message: string): void;
  close(): Promise<void>;
}
