/**
 * sdfkit Host: Output IO
 *
 * Where generated artefacts go: config blobs, the system document, channel
 * headers and the generation log. Names are relative to one output
 * directory; callers never build absolute paths.
 *
 *   FileOutputIO: writes under a directory on disk
 *   MemoryOutputIO: keeps everything in memory, for tests and dry runs
 */

import { appendFileSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { BlobSink } from '@sdfkit/core';

export interface OutputIO extends BlobSink {
  /** Write a binary file, replacing any previous content. */
  write(name: string, data: Uint8Array): void;

  /**
   * Write a UTF-8 text file. With `atomic`, the content goes to a temporary
   * sibling first and is renamed into place.
   */
  writeText(name: string, text: string, options?: { atomic?: boolean }): void;

  /** Append one line; a newline is added after it. */
  appendLine(name: string, line: string): void;

  /** Raw file content, undefined when the file does not exist. */
  read(name: string): Uint8Array | undefined;
}

// ---------------------------------------------------------------------------
// FileOutputIO
// ---------------------------------------------------------------------------

export class FileOutputIO implements OutputIO {
  constructor(readonly dir: string) {}

  private resolve(name: string): string {
    const path = join(this.dir, name);
    mkdirSync(dirname(path), { recursive: true });
    return path;
  }

  write(name: string, data: Uint8Array): void {
    writeFileSync(this.resolve(name), data);
  }

  writeText(name: string, text: string, options: { atomic?: boolean } = {}): void {
    const path = this.resolve(name);
    if (options.atomic !== true) {
      writeFileSync(path, text, 'utf-8');
      return;
    }
    const temp = `${path}.${process.pid}.tmp`;
    writeFileSync(temp, text, 'utf-8');
    renameSync(temp, path);
  }

  appendLine(name: string, line: string): void {
    appendFileSync(this.resolve(name), line + '\n', 'utf-8');
  }

  read(name: string): Uint8Array | undefined {
    try {
      return readFileSync(join(this.dir, name));
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return undefined;
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryOutputIO
// ---------------------------------------------------------------------------

export class MemoryOutputIO implements OutputIO {
  private readonly files = new Map<string, Uint8Array>();

  write(name: string, data: Uint8Array): void {
    this.files.set(name, Uint8Array.from(data));
  }

  writeText(name: string, text: string): void {
    this.files.set(name, Buffer.from(text, 'utf-8'));
  }

  appendLine(name: string, line: string): void {
    const previous = this.files.get(name) ?? new Uint8Array();
    this.files.set(name, Buffer.concat([previous, Buffer.from(line + '\n', 'utf-8')]));
  }

  read(name: string): Uint8Array | undefined {
    return this.files.get(name);
  }

  /** Text content of a file, undefined when absent. Test helper. */
  readText(name: string): string | undefined {
    const data = this.files.get(name);
    return data === undefined ? undefined : Buffer.from(data).toString('utf-8');
  }

  /** File names in write order. */
  get names(): ReadonlyArray<string> {
    return [...this.files.keys()];
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
