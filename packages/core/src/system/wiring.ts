/**
 * sdfkit Core: Wiring Transactions
 *
 * Subsystem connect() creates many MRs, maps, channels and IRQ bindings.
 * Every mutation made through a Wiring records its inverse; rollback()
 * replays the inverses newest-first, restoring the graph and every id
 * allocator to where they were at begin().
 */

import type { Channel, ChannelOptions } from '../graph/channel.js';
import type { Irq, IrqOptions } from '../graph/irq.js';
import type {
  MapOptions,
  MemoryMap,
  MemoryRegion,
  MemoryRegionOptions,
  Perms,
} from '../graph/memory-region.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { MapTarget } from '../graph/virtual-machine.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import type { SystemDescription } from './system-description.js';

/** A map together with the region it maps, as config blobs describe it. */
export interface MappedRegion {
  readonly map: MemoryMap;
  readonly mr: MemoryRegion;
  readonly vaddr: number;
  readonly size: number;
}

export interface WiringMapOptions extends MapOptions {
  /** Fixed virtual address; the next free address otherwise. */
  readonly vaddr?: number;
}

export class Wiring {
  private readonly undo: Array<() => void> = [];
  private closed = false;

  constructor(readonly sdf: SystemDescription) {}

  /** Register an extra inverse step, e.g. a subsystem's state change. */
  onRollback(step: () => void): void {
    this.undo.push(step);
  }

  mr(name: string, size: number, options: MemoryRegionOptions = {}): Result<MemoryRegion> {
    const mr = this.sdf.createMr(name, size, options);
    if (!mr.ok) return mr;
    const added = this.sdf.addMr(mr.value);
    if (!added.ok) {
      this.sdf.discardMr(mr.value);
      return added;
    }
    this.undo.push(() => this.sdf.discardMr(mr.value));
    return mr;
  }

  /**
   * MR for a device register window at a fixed physical address. An MR
   * already registered at that address is reused when it is large enough.
   */
  deviceMr(name: string, paddr: number, size: number): Result<MemoryRegion> {
    const existing = this.sdf.memoryRegions.find((mr) => mr.paddr === paddr);
    if (existing) {
      if (existing.size < size) {
        return fail(
          ErrorKind.InvalidAddress,
          `MR '${existing.name}' already covers ${paddr} with a smaller size`,
          name,
        );
      }
      return ok(existing);
    }
    return this.mr(name, size, { paddr });
  }

  map(
    target: MapTarget,
    mr: MemoryRegion,
    perms: Perms | string,
    options: WiringMapOptions = {},
  ): Result<MappedRegion> {
    const vaddr = options.vaddr ?? this.sdf.nextMapVaddr(target, mr);
    const map = this.sdf.createMap(mr, vaddr, perms, options);
    if (!map.ok) return map;
    target.addMap(map.value);
    this.undo.push(() => target.removeMap(map.value));
    return ok({ map: map.value, mr, vaddr, size: mr.size });
  }

  channel(a: ProtectionDomain, b: ProtectionDomain, options: ChannelOptions = {}): Result<Channel> {
    const channel = this.sdf.createChannel(a, b, options);
    if (!channel.ok) return channel;
    const added = this.sdf.addChannel(channel.value);
    if (!added.ok) {
      this.sdf.destroyChannel(channel.value);
      return added;
    }
    this.undo.push(() => this.sdf.destroyChannel(channel.value));
    return channel;
  }

  irq(pd: ProtectionDomain, options: IrqOptions): Result<Irq> {
    const irq = pd.addIrq(options);
    if (!irq.ok) return irq;
    this.undo.push(() => pd.removeIrq(irq.value));
    return irq;
  }

  commit(): void {
    this.closed = true;
    this.undo.length = 0;
  }

  rollback(): void {
    if (this.closed) return;
    this.closed = true;
    while (this.undo.length > 0) {
      this.undo.pop()?.();
    }
  }
}
