/**
 * sdfkit Core: Local Id Allocation
 *
 * A PD owns small integer id spaces (channel ends and IRQs share one, child
 * PDs use another). Ids are handed out lowest-unused-first from an explicit
 * sorted free list, so interleaved allocate/release sequences always yield
 * the same ids.
 */

import { ErrorKind, fail, ok, type Result } from '../types/result.js';

/** Number of ids in each per-PD id space. */
export const MAX_IDS = 62;

export class IdAllocator {
  /** Ascending list of ids not currently in use. */
  private readonly free: number[];

  constructor(
    private readonly label: string,
    readonly capacity: number = MAX_IDS,
  ) {
    this.free = Array.from({ length: capacity }, (_, i) => i);
  }

  /**
   * Take the lowest free id, or exactly `fixed` when given.
   * Fails with IdConflict when `fixed` is taken, IdExhausted when none remain.
   */
  allocate(fixed?: number): Result<number> {
    if (fixed !== undefined) {
      if (!Number.isInteger(fixed) || fixed < 0 || fixed >= this.capacity) {
        return fail(
          ErrorKind.InvalidArgument,
          `id ${fixed} is outside ${this.label} (0..${this.capacity - 1})`,
        );
      }
      const index = this.free.indexOf(fixed);
      if (index === -1) {
        return fail(ErrorKind.IdConflict, `id ${fixed} is already allocated in ${this.label}`);
      }
      this.free.splice(index, 1);
      return ok(fixed);
    }
    const next = this.free.shift();
    if (next === undefined) {
      return fail(ErrorKind.IdExhausted, `no free ids remain in ${this.label}`);
    }
    return ok(next);
  }

  release(id: number): void {
    if (id < 0 || id >= this.capacity || this.free.includes(id)) return;
    let at = 0;
    while (at < this.free.length && this.free[at] < id) at++;
    this.free.splice(at, 0, id);
  }

  isAllocated(id: number): boolean {
    return id >= 0 && id < this.capacity && !this.free.includes(id);
  }

  get allocatedCount(): number {
    return this.capacity - this.free.length;
  }
}
