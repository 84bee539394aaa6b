/**
 * sdfkit Core: Generation Logger
 *
 * Thin front for an optional LogSink. Without a sink every call is a no-op,
 * which is what tests and embedded callers get by default.
 */

import {
  LogLevel,
  type GenerationLogEntry,
  type LogContext,
  type LogSink,
} from './log-sink.js';

export class GenerationLogger {
  constructor(private readonly sink?: LogSink) {}

  record(entry: GenerationLogEntry): void {
    this.sink?.append(entry);
  }

  debug(event: string, message: string, context?: LogContext): void {
    this.record({ level: LogLevel.Debug, event, message, context });
  }

  info(event: string, message: string, context?: LogContext): void {
    this.record({ level: LogLevel.Info, event, message, context });
  }

  warn(event: string, message: string, context?: LogContext): void {
    this.record({ level: LogLevel.Warn, event, message, context });
  }

  error(event: string, message: string, context?: LogContext): void {
    this.record({ level: LogLevel.Error, event, message, context });
  }
}
