/**
 * sdfkit Core: System Description
 *
 * The top-level container for one generated system. It creates and owns
 * every entity, registers top-level PDs, MRs and channels in insertion
 * order, and renders the final document.
 *
 * Validation failures leave the graph untouched. Subsystems perform their
 * multi-step wiring through a Wiring transaction (see wiring.ts) so that a
 * failed connect leaves nothing behind either.
 */

import { Channel, type ChannelOptions } from '../graph/channel.js';
import { EntityStore } from '../graph/entity-store.js';
import { checkCpu, checkSchedule, checkStackSize } from '../graph/attributes.js';
import {
  MemoryMap,
  MemoryRegion,
  parsePerms,
  type MapOptions,
  type MemoryRegionOptions,
  type Perms,
} from '../graph/memory-region.js';
import { ProtectionDomain, type PdOptions } from '../graph/protection-domain.js';
import { VirtualMachine, type MapTarget, type VmOptions } from '../graph/virtual-machine.js';
import { GenerationLogger } from '../logging/generation-log.js';
import { renderSystem } from '../render/system-writer.js';
import { DriverCatalog } from '../sddf/driver-catalog.js';
import {
  Arch,
  PageSize,
  SMALL_PAGE,
  hex,
  isAligned,
  pageBytes,
  parseArch,
  roundUp,
} from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import { Wiring } from './wiring.js';

/**
 * First name in `incoming`'s tree that repeats a name from `existing` or
 * from earlier in the same tree.
 */
function firstClash(incoming: ProtectionDomain, existing: Iterable<ProtectionDomain>): string | undefined {
  const taken = new Set<string>();
  for (const pd of existing) taken.add(pd.name);
  for (const node of incoming.descendants()) {
    if (taken.has(node.name)) return node.name;
    taken.add(node.name);
  }
  return undefined;
}

/** Lowest virtual address handed out by nextMapVaddr. */
export const MAP_VADDR_BASE = 0x10000000;

export interface SystemDescriptionOptions {
  /** Drivers available to hardware-backed subsystems. */
  readonly drivers?: DriverCatalog;
  readonly logger?: GenerationLogger;
}

export class SystemDescription {
  readonly drivers: DriverCatalog;
  readonly log: GenerationLogger;
  private readonly store = new EntityStore();
  private readonly pdList: ProtectionDomain[] = [];
  private readonly mrList: MemoryRegion[] = [];
  private readonly channelList: Channel[] = [];

  private constructor(
    readonly arch: Arch,
    /** Upper bound (exclusive) for fixed physical addresses. */
    readonly paddrTop: number,
    options: SystemDescriptionOptions,
  ) {
    this.drivers = options.drivers ?? DriverCatalog.empty();
    this.log = options.logger ?? new GenerationLogger();
  }

  static create(
    arch: Arch | string,
    paddrTop: number,
    options: SystemDescriptionOptions = {},
  ): Result<SystemDescription> {
    const target = parseArch(arch);
    if (target === undefined) {
      return fail(ErrorKind.UnsupportedArch, `unknown architecture '${arch}'`);
    }
    if (!Number.isSafeInteger(paddrTop) || paddrTop <= 0 || !isAligned(paddrTop, SMALL_PAGE)) {
      return fail(ErrorKind.InvalidAddress, `paddr_top ${paddrTop} must be a positive page-aligned address`);
    }
    return ok(new SystemDescription(target, paddrTop, options));
  }

  // -------------------------------------------------------------------------
  // Entity creation
  // -------------------------------------------------------------------------

  createPd(name: string, image: string, options: PdOptions = {}): Result<ProtectionDomain> {
    if (name.length === 0) return fail(ErrorKind.InvalidArgument, 'PD name must not be empty');
    if (image.length === 0) {
      return fail(ErrorKind.InvalidArgument, `PD '${name}' needs a program image`);
    }
    const bad =
      checkSchedule(name, options) ??
      (options.stackSize !== undefined ? checkStackSize(name, options.stackSize) : undefined) ??
      (options.cpu !== undefined ? checkCpu(name, options.cpu) : undefined);
    if (bad) return bad;
    const pd = new ProtectionDomain(this.store.issue(), name, image, options);
    this.store.put(pd);
    return ok(pd);
  }

  createMr(name: string, size: number, options: MemoryRegionOptions = {}): Result<MemoryRegion> {
    if (name.length === 0) return fail(ErrorKind.InvalidArgument, 'MR name must not be empty');
    const page = pageBytes(this.arch, options.pageSize ?? PageSize.Small);
    if (page === undefined) {
      return fail(
        ErrorKind.UnsupportedArch,
        `${options.pageSize ?? PageSize.Small} pages are not available on ${this.arch}`,
        name,
      );
    }
    if (!Number.isSafeInteger(size) || size <= 0 || !isAligned(size, page)) {
      return fail(
        ErrorKind.InvalidArgument,
        `size ${size} of MR '${name}' must be a positive multiple of ${hex(page)}`,
      );
    }
    const paddr = options.paddr;
    if (paddr !== undefined) {
      if (!Number.isSafeInteger(paddr) || paddr < 0 || !isAligned(paddr, page)) {
        return fail(ErrorKind.InvalidAddress, `physical address ${paddr} of MR '${name}' is not page-aligned`);
      }
      if (paddr + size > this.paddrTop) {
        return fail(
          ErrorKind.InvalidAddress,
          `MR '${name}' at ${hex(paddr)} (+${hex(size)}) lies above paddr_top ${hex(this.paddrTop)}`,
        );
      }
    }
    const mr = new MemoryRegion(this.store.issue(), name, size, page, options.pageSize, paddr);
    this.store.put(mr);
    return ok(mr);
  }

  createVm(name: string, options: VmOptions): Result<VirtualMachine> {
    if (name.length === 0) return fail(ErrorKind.InvalidArgument, 'VM name must not be empty');
    if (options.vcpus.length === 0) {
      return fail(ErrorKind.InvalidArgument, `virtual machine '${name}' needs at least one vCPU`);
    }
    const seen = new Set<number>();
    for (const vcpu of options.vcpus) {
      if (!Number.isSafeInteger(vcpu.id) || vcpu.id < 0) {
        return fail(ErrorKind.InvalidArgument, `vCPU id ${vcpu.id} of '${name}' must be a non-negative integer`);
      }
      if (seen.has(vcpu.id)) {
        return fail(ErrorKind.IdConflict, `vCPU id ${vcpu.id} is used twice in '${name}'`);
      }
      seen.add(vcpu.id);
      if (vcpu.cpu !== undefined) {
        const bad = checkCpu(name, vcpu.cpu);
        if (bad) return bad;
      }
    }
    const bad = checkSchedule(name, options);
    if (bad) return bad;
    const vm = new VirtualMachine(this.store.issue(), name, [...options.vcpus], options);
    this.store.put(vm);
    return ok(vm);
  }

  createMap(
    mr: MemoryRegion,
    vaddr: number,
    perms: Perms | string,
    options: MapOptions = {},
  ): Result<MemoryMap> {
    if (!this.store.has(mr)) {
      return fail(ErrorKind.UnknownEntity, `MR '${mr.name}' does not belong to this system`);
    }
    let parsed: Perms;
    if (typeof perms === 'string') {
      const p = parsePerms(perms);
      if (!p.ok) return p;
      parsed = p.value;
    } else {
      parsed = perms;
    }
    if (!parsed.read && !parsed.write && !parsed.execute && options.allowEmpty !== true) {
      return fail(ErrorKind.InvalidArgument, `map of '${mr.name}' has no permissions`);
    }
    if (!Number.isSafeInteger(vaddr) || vaddr < 0 || !isAligned(vaddr, mr.pageBytes)) {
      return fail(
        ErrorKind.InvalidAddress,
        `virtual address ${vaddr} for '${mr.name}' is not aligned to ${hex(mr.pageBytes)}`,
      );
    }
    return ok(new MemoryMap(mr.id, vaddr, parsed, options.cached ?? true, options.setvarVaddr));
  }

  /**
   * Create a channel between two PDs, allocating an end id on each. The
   * channel is not part of the system until addChannel.
   */
  createChannel(a: ProtectionDomain, b: ProtectionDomain, options: ChannelOptions = {}): Result<Channel> {
    if (!this.store.has(a) || !this.store.has(b)) {
      return fail(ErrorKind.UnknownEntity, `channel '${a.name}' <-> '${b.name}' references a destroyed PD`);
    }
    if (a === b) {
      return fail(ErrorKind.InvalidArgument, `channel endpoints must differ (both are '${a.name}')`);
    }
    const endA = a.channelIds.allocate(options.idA);
    if (!endA.ok) return endA;
    const endB = b.channelIds.allocate(options.idB);
    if (!endB.ok) {
      a.channelIds.release(endA.value);
      return endB;
    }
    const channel = new Channel(
      this.store.issue(),
      a.id,
      b.id,
      endA.value,
      endB.value,
      options.notifyA ?? true,
      options.notifyB ?? true,
      options.pp,
    );
    this.store.put(channel);
    return ok(channel);
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a top-level PD together with every PD nested under it.
   *
   * Names across the incoming tree and everything already registered must
   * be unique. A PD that has a parent is registered through its root.
   *
   * @returns DuplicateName, InvalidArgument for a nested PD, or
   *          UnknownEntity for a PD from another system
   */
  addPd(pd: ProtectionDomain): Result {
    if (!this.store.has(pd)) {
      return fail(ErrorKind.UnknownEntity, `PD '${pd.name}' does not belong to this system`);
    }
    if (pd.parent) {
      return fail(
        ErrorKind.InvalidArgument,
        `PD '${pd.name}' is a child of '${pd.parent.name}' and is registered through it`,
      );
    }
    if (this.pdList.includes(pd)) {
      return fail(ErrorKind.DuplicateName, `PD '${pd.name}' is already registered`);
    }
    const clash = firstClash(pd, this.allPds());
    if (clash !== undefined) {
      return fail(ErrorKind.DuplicateName, `a PD named '${clash}' is already registered`);
    }
    this.pdList.push(pd);
    this.log.debug('pd.registered', `registered PD '${pd.name}'`, { pd: pd.name });
    return ok();
  }

  /**
   * Nest `child` (and its own subtree) under `parent`.
   *
   * The child must not be registered at top level or nested anywhere else.
   * Subtree names must be unique within the parent's tree, and across the
   * whole system once that tree is registered.
   *
   * @param fixedId - child id to claim instead of the lowest free one
   * @returns the child id in the parent's child-id space
   */
  addChild(parent: ProtectionDomain, child: ProtectionDomain, fixedId?: number): Result<number> {
    for (const pd of [parent, child]) {
      if (!this.store.has(pd)) {
        return fail(ErrorKind.UnknownEntity, `PD '${pd.name}' does not belong to this system`);
      }
    }
    if (this.pdList.includes(child)) {
      return fail(ErrorKind.StructuralCycle, `PD '${child.name}' is already registered at top level`);
    }
    const structural = parent.checkChild(child);
    if (!structural.ok) return structural;
    const scope = this.isRegistered(parent) ? this.allPds() : [...parent.root().descendants()];
    const clash = firstClash(child, scope);
    if (clash !== undefined) {
      return fail(
        ErrorKind.DuplicateName,
        `a PD named '${clash}' already exists under '${parent.root().name}'`,
      );
    }
    const id = parent.adoptChild(child, fixedId);
    if (!id.ok) return id;
    if (this.isRegistered(parent)) {
      this.log.debug('pd.registered', `registered PD '${child.name}' under '${parent.name}'`, {
        pd: child.name,
        parent: parent.name,
      });
    }
    return id;
  }

  /** Register an MR. Names are unique among registered MRs (DuplicateName). */
  addMr(mr: MemoryRegion): Result {
    if (!this.store.has(mr)) {
      return fail(ErrorKind.UnknownEntity, `MR '${mr.name}' does not belong to this system`);
    }
    if (this.mrList.some((m) => m.name === mr.name)) {
      return fail(ErrorKind.DuplicateName, `an MR named '${mr.name}' is already registered`);
    }
    this.mrList.push(mr);
    this.log.debug('mr.registered', `registered MR '${mr.name}'`, { mr: mr.name, size: mr.size });
    return ok();
  }

  /**
   * Register a channel. Both endpoint PDs must already be registered
   * (InvalidState), and a channel is registered at most once.
   */
  addChannel(channel: Channel): Result {
    if (!this.store.has(channel)) {
      return fail(ErrorKind.UnknownEntity, 'channel does not belong to this system');
    }
    if (this.channelList.includes(channel)) {
      return fail(ErrorKind.InvalidState, 'channel is already registered');
    }
    const a = this.resolvePd(channel.pdA);
    const b = this.resolvePd(channel.pdB);
    if (!a || !b) {
      return fail(ErrorKind.UnknownEntity, 'channel references a destroyed PD');
    }
    for (const pd of [a, b]) {
      if (!this.isRegistered(pd)) {
        return fail(ErrorKind.InvalidState, `channel endpoint '${pd.name}' is not registered`);
      }
    }
    this.channelList.push(channel);
    this.log.debug('channel.registered', `registered channel '${a.name}' <-> '${b.name}'`, {
      a: a.name,
      b: b.name,
      end_a: channel.endA,
      end_b: channel.endB,
    });
    return ok();
  }

  /**
   * Unregister a channel (if registered) and release both end ids.
   *
   * @returns UnknownEntity for a channel that was already destroyed or
   *          belongs to another system; its end ids may be held by a newer
   *          channel and are left alone
   */
  destroyChannel(channel: Channel): Result {
    if (!this.store.has(channel)) {
      return fail(ErrorKind.UnknownEntity, 'channel does not belong to this system');
    }
    const at = this.channelList.indexOf(channel);
    if (at !== -1) this.channelList.splice(at, 1);
    this.resolvePd(channel.pdA)?.channelIds.release(channel.endA);
    this.resolvePd(channel.pdB)?.channelIds.release(channel.endB);
    this.store.retire(channel.id);
    this.log.debug('channel.destroyed', 'destroyed channel', { end_a: channel.endA, end_b: channel.endB });
    return ok();
  }

  /**
   * Destroy a top-level PD and everything nested under it. Channels that
   * still reference it are left in place; rendering then fails with
   * UnknownEntity until the caller destroys them too.
   */
  destroyPd(pd: ProtectionDomain): Result {
    if (!this.store.has(pd)) {
      return fail(ErrorKind.UnknownEntity, `PD '${pd.name}' does not belong to this system`);
    }
    if (pd.parent) {
      return fail(ErrorKind.InvalidArgument, `child PD '${pd.name}' cannot be destroyed on its own`);
    }
    const at = this.pdList.indexOf(pd);
    if (at !== -1) this.pdList.splice(at, 1);
    for (const node of pd.descendants()) {
      if (node.vm) this.store.retire(node.vm.id);
      this.store.retire(node.id);
    }
    this.log.info('pd.destroyed', `destroyed PD '${pd.name}'`, { pd: pd.name });
    return ok();
  }

  /** @internal Rollback of an MR created inside a Wiring transaction. */
  discardMr(mr: MemoryRegion): void {
    const at = this.mrList.indexOf(mr);
    if (at !== -1) this.mrList.splice(at, 1);
    this.store.retire(mr.id);
  }

  /** Start a transaction for multi-step wiring. */
  begin(): Wiring {
    return new Wiring(this);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  get protectionDomains(): ReadonlyArray<ProtectionDomain> {
    return this.pdList;
  }

  get memoryRegions(): ReadonlyArray<MemoryRegion> {
    return this.mrList;
  }

  get channels(): ReadonlyArray<Channel> {
    return this.channelList;
  }

  /** Registered top-level entities: PDs, MRs and channels. */
  get entityCount(): number {
    return this.pdList.length + this.mrList.length + this.channelList.length;
  }

  /** Every registered PD, top-level and nested, in document order. */
  allPds(): ProtectionDomain[] {
    return this.pdList.flatMap((pd) => [...pd.descendants()]);
  }

  findPd(name: string): ProtectionDomain | undefined {
    return this.allPds().find((pd) => pd.name === name);
  }

  findMr(name: string): MemoryRegion | undefined {
    return this.mrList.find((mr) => mr.name === name);
  }

  isLive(entity: ProtectionDomain | MemoryRegion | VirtualMachine | Channel): boolean {
    return this.store.has(entity);
  }

  /** A PD is registered when it is live and its tree's root was added. */
  isRegistered(pd: ProtectionDomain): boolean {
    const root = pd.root();
    return this.store.has(pd) && this.store.has(root) && this.pdList.includes(root);
  }

  resolvePd(id: number): ProtectionDomain | undefined {
    return this.store.resolve(id, ProtectionDomain);
  }

  resolveMr(id: number): MemoryRegion | undefined {
    return this.store.resolve(id, MemoryRegion);
  }

  /** Registered channels with an end on `pd`, in registration order. */
  channelsOf(pd: ProtectionDomain): Channel[] {
    return this.channelList.filter((ch) => ch.involves(pd.id));
  }

  /**
   * Lowest address at or above MAP_VADDR_BASE that lies past every existing
   * map in `target`, aligned to the region's page size.
   */
  nextMapVaddr(target: MapTarget, mr: MemoryRegion): number {
    let next = MAP_VADDR_BASE;
    for (const map of target.maps) {
      const size = this.resolveMr(map.mrId)?.size ?? 0;
      next = Math.max(next, map.vaddr + size);
    }
    return roundUp(next, mr.pageBytes);
  }

  // -------------------------------------------------------------------------
  // Output
  // -------------------------------------------------------------------------

  render(): Result<string> {
    const doc = renderSystem(this);
    if (!doc.ok) {
      this.log.error('render.failed', doc.error.message, { kind: doc.error.kind });
      return doc;
    }
    this.log.info('render.completed', 'rendered system description', {
      pds: this.pdList.length,
      mrs: this.mrList.length,
      channels: this.channelList.length,
    });
    return doc;
  }

  /**
   * C header naming the channel ids `pd` holds, one `#define <PEER>_CH <id>`
   * per registered channel. A second channel to the same peer gets `_CH_2`.
   */
  exportChannelHeader(pd: ProtectionDomain): Result<string> {
    if (!this.isRegistered(pd)) {
      return fail(ErrorKind.InvalidState, `PD '${pd.name}' is not registered`);
    }
    const lines = ['#pragma once', ''];
    const used = new Map<string, number>();
    for (const channel of this.channelsOf(pd)) {
      const peerId = channel.pdA === pd.id ? channel.pdB : channel.pdA;
      const peer = this.resolvePd(peerId);
      if (!peer) return fail(ErrorKind.UnknownEntity, 'channel references a destroyed PD', pd.name);
      const base = `${peer.name.toUpperCase().replace(/[^A-Z0-9_]/g, '_')}_CH`;
      const count = (used.get(base) ?? 0) + 1;
      used.set(base, count);
      const macro = count === 1 ? base : `${base}_${count}`;
      lines.push(`#define ${macro} ${channel.endOf(pd.id) ?? 0}`);
    }
    return ok(`${lines.join('\n')}\n`);
  }
}
