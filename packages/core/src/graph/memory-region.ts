/**
 * sdfkit Core: Memory Regions and Maps
 */

import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import type { PageSize } from '../types/arch.js';

export interface MemoryRegionOptions {
  /** Page class backing the region; small pages when omitted. */
  readonly pageSize?: PageSize;
  /** Fixed physical address. The engine does not allocate physical memory. */
  readonly paddr?: number;
}

export class MemoryRegion {
  constructor(
    readonly id: number,
    readonly name: string,
    readonly size: number,
    /** Bytes per page, resolved for the target architecture. */
    readonly pageBytes: number,
    readonly pageSize: PageSize | undefined,
    readonly paddr: number | undefined,
  ) {}
}

// ---------------------------------------------------------------------------
// Maps
// ---------------------------------------------------------------------------

export interface Perms {
  readonly read: boolean;
  readonly write: boolean;
  readonly execute: boolean;
}

export function parsePerms(text: string): Result<Perms> {
  const seen = new Set<string>();
  for (const ch of text) {
    if (ch !== 'r' && ch !== 'w' && ch !== 'x') {
      return fail(ErrorKind.InvalidArgument, `unknown permission '${ch}' in "${text}"`);
    }
    if (seen.has(ch)) {
      return fail(ErrorKind.InvalidArgument, `permission '${ch}' repeated in "${text}"`);
    }
    seen.add(ch);
  }
  return ok({ read: seen.has('r'), write: seen.has('w'), execute: seen.has('x') });
}

export function formatPerms(perms: Perms): string {
  return `${perms.read ? 'r' : ''}${perms.write ? 'w' : ''}${perms.execute ? 'x' : ''}`;
}

export interface MapOptions {
  /** Defaults to true. */
  readonly cached?: boolean;
  /** Symbol in the image that receives the mapping's virtual address. */
  readonly setvarVaddr?: string;
  /** Permit an empty permission set, which reserves address space only. */
  readonly allowEmpty?: boolean;
}

/**
 * One MR mapped into one PD or VM address space. The region is referenced
 * by entity id and resolved through the owning SystemDescription.
 */
export class MemoryMap {
  constructor(
    readonly mrId: number,
    readonly vaddr: number,
    readonly perms: Perms,
    readonly cached: boolean,
    readonly setvarVaddr: string | undefined,
  ) {}
}
