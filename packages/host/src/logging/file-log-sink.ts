/**
 * sdfkit Host: Generation Log Sinks
 *
 * FileLogSink implements the core LogSink by appending one JSON line per
 * entry to `generation.jsonl` through an OutputIO. Each line gets an
 * `event_id` (monotonic ULID) and an ISO-8601 `timestamp`. Writes are
 * synchronous and errors propagate to the caller.
 */

import type { GenerationLogEntry, LogLevel, LogSink } from '@sdfkit/core';
import type { OutputIO } from '../output/output-io.js';
import { ulid } from './ulid.js';

export const GENERATION_LOG = 'generation.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly io: OutputIO,
    private readonly minLevel?: LogLevel,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  append(entry: GenerationLogEntry): void {
    if (this.minLevel !== undefined && rank(entry.level) < rank(this.minLevel)) return;
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: this.clock().toISOString(),
      level: entry.level,
      event: entry.event,
      message: entry.message,
      ...(entry.context ? { context: entry.context } : {}),
    });
    this.io.appendLine(GENERATION_LOG, line);
  }
}

/** Keeps entries in memory. */
export class MemoryLogSink implements LogSink {
  private readonly list: GenerationLogEntry[] = [];

  append(entry: GenerationLogEntry): void {
    this.list.push(entry);
  }

  get entries(): ReadonlyArray<GenerationLogEntry> {
    return this.list;
  }

  /** Event names in order, handy for assertions. */
  events(): string[] {
    return this.list.map((e) => e.event);
  }
}

const LEVEL_ORDER: ReadonlyArray<string> = ['debug', 'info', 'warn', 'error'];

function rank(level: LogLevel): number {
  return LEVEL_ORDER.indexOf(level);
}
