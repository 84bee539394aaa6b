/**
 * sdfkit Host: Document Output
 *
 * Renders a system description and writes it, plus optional per-PD channel
 * headers, through an OutputIO. Render and IO failures come back as
 * Results; nothing is written when rendering fails.
 */

import { ErrorKind, fail, ok, type ProtectionDomain, type Result, type SystemDescription } from '@sdfkit/core';
import type { OutputIO } from './output/output-io.js';

export interface WriteDocumentOptions {
  /** Write to a temporary file and rename it into place. */
  readonly atomic?: boolean;
}

function ioFailure(name: string, err: unknown): Result<never> {
  return fail(ErrorKind.IOFailure, `failed to write ${name}: ${err instanceof Error ? err.message : String(err)}`);
}

/** Render `sdf` to `name` (e.g. `system.xml`). Returns the rendered text. */
export function writeSystemDocument(
  sdf: SystemDescription,
  io: OutputIO,
  name: string,
  options: WriteDocumentOptions = {},
): Result<string> {
  const doc = sdf.render();
  if (!doc.ok) return doc;
  try {
    io.writeText(name, doc.value, { atomic: options.atomic === true });
  } catch (err: unknown) {
    return ioFailure(name, err);
  }
  return doc;
}

/** Write `<pd>_channels.h` for each PD. Returns the names written. */
export function writeChannelHeaders(
  sdf: SystemDescription,
  io: OutputIO,
  pds: ReadonlyArray<ProtectionDomain>,
): Result<ReadonlyArray<string>> {
  const names: string[] = [];
  for (const pd of pds) {
    const header = sdf.exportChannelHeader(pd);
    if (!header.ok) return header;
    const name = `${pd.name}_channels.h`;
    try {
      io.writeText(name, header.value);
    } catch (err: unknown) {
      return ioFailure(name, err);
    }
    names.push(name);
  }
  return ok(names);
}
