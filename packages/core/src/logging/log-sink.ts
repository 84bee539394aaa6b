/**
 * sdfkit Core: Log Sink Interface
 *
 * The injection point for generation logs. The core owns the contract and
 * the GenerationLogger; concrete sinks live in the host package and are
 * handed in when a SystemDescription is created. The core never writes to
 * disk itself.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export type LogContext = Readonly<Record<string, string | number | boolean>>;

export interface GenerationLogEntry {
  readonly level: LogLevel;
  /** Dotted event identifier, e.g. `subsystem.connected`. */
  readonly event: string;
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Receives generation log entries. append() is synchronous; an
 * implementation that fails should throw rather than drop the entry.
 */
export interface LogSink {
  append(entry: GenerationLogEntry): void;
}
