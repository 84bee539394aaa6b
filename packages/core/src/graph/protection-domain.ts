/**
 * sdfkit Core: Protection Domains
 *
 * A PD runs one program image. It owns two local id spaces: one shared by
 * channel ends and IRQs, one for child PDs. Relations to other entities
 * (children, the attached VM) are validated here; registration with the
 * system is the SystemDescription's concern.
 */

import {
  checkBudgetPeriod,
  checkCpu,
  checkPriority,
  checkStackSize,
  DEFAULT_PRIORITY,
  type Schedule,
} from './attributes.js';
import { IdAllocator } from './id-allocator.js';
import type { Irq, IrqOptions } from './irq.js';
import type { MemoryMap } from './memory-region.js';
import type { MapTarget, VirtualMachine } from './virtual-machine.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

export interface PdOptions extends Schedule {
  readonly passive?: boolean | undefined;
  readonly stackSize?: number | undefined;
  readonly cpu?: number | undefined;
}

export interface ChildPd {
  readonly pd: ProtectionDomain;
  readonly id: number;
}

export class ProtectionDomain implements MapTarget {
  /** Channel ends and IRQs. */
  readonly channelIds: IdAllocator;
  private readonly childIds: IdAllocator;
  private readonly schedule: Schedule;
  private passiveFlag: boolean | undefined;
  private stack: number | undefined;
  private cpuAffinity: number | undefined;
  private readonly mapList: MemoryMap[] = [];
  private readonly irqList: Irq[] = [];
  private readonly childList: ChildPd[] = [];
  private vmRef: VirtualMachine | undefined;
  private parentRef: ProtectionDomain | undefined;

  constructor(
    readonly id: number,
    readonly name: string,
    readonly image: string,
    options: PdOptions = {},
  ) {
    this.channelIds = new IdAllocator(`channel ids of PD '${name}'`);
    this.childIds = new IdAllocator(`child ids of PD '${name}'`);
    this.schedule = { priority: options.priority, budget: options.budget, period: options.period };
    this.passiveFlag = options.passive;
    this.stack = options.stackSize;
    this.cpuAffinity = options.cpu;
  }

  // -------------------------------------------------------------------------
  // Attributes
  // -------------------------------------------------------------------------

  /** Explicit priority, undefined when the PD runs at the default. */
  get priority(): number | undefined {
    return this.schedule.priority;
  }

  /** Priority used for ordering rules when none was set explicitly. */
  get effectivePriority(): number {
    return this.schedule.priority ?? DEFAULT_PRIORITY;
  }

  /** Scheduling budget in microseconds. */
  get budget(): number | undefined {
    return this.schedule.budget;
  }

  /** Scheduling period in microseconds. */
  get period(): number | undefined {
    return this.schedule.period;
  }

  get passive(): boolean | undefined {
    return this.passiveFlag;
  }

  get stackSize(): number | undefined {
    return this.stack;
  }

  get cpu(): number | undefined {
    return this.cpuAffinity;
  }

  /**
   * Set the priority, 0..255.
   *
   * @returns InvalidArgument when out of range; the previous value is kept
   */
  setPriority(value: number): Result {
    const bad = checkPriority(this.name, value);
    if (bad) return bad;
    this.schedule.priority = value;
    return ok();
  }

  /**
   * Set the budget. With a period set, the budget may not exceed it.
   *
   * @returns InvalidArgument for a negative or fractional value, or a budget
   *          above the period
   */
  setBudget(value: number): Result {
    const bad = checkBudgetPeriod(this.name, value, this.schedule.period);
    if (bad) return bad;
    this.schedule.budget = value;
    return ok();
  }

  /**
   * Set the period. With a budget set, the period may not fall below it.
   *
   * @returns InvalidArgument for a negative or fractional value, or a period
   *          below the budget
   */
  setPeriod(value: number): Result {
    const bad = checkBudgetPeriod(this.name, this.schedule.budget, value);
    if (bad) return bad;
    this.schedule.period = value;
    return ok();
  }

  /**
   * Set the stack size: a multiple of 0x1000 between 0x1000 and 0x100000.
   *
   * @returns InvalidArgument for any other size
   */
  setStackSize(value: number): Result {
    const bad = checkStackSize(this.name, value);
    if (bad) return bad;
    this.stack = value;
    return ok();
  }

  /** Pin the PD to a CPU core. InvalidArgument for a negative core. */
  setCpu(value: number): Result {
    const bad = checkCpu(this.name, value);
    if (bad) return bad;
    this.cpuAffinity = value;
    return ok();
  }

  /** A passive PD runs only on protected-procedure calls from its clients. */
  setPassive(value: boolean): void {
    this.passiveFlag = value;
  }

  // -------------------------------------------------------------------------
  // Maps and IRQs
  // -------------------------------------------------------------------------

  get maps(): ReadonlyArray<MemoryMap> {
    return this.mapList;
  }

  /** Map a region into this PD. Placement rules are checked by createMap. */
  addMap(map: MemoryMap): void {
    this.mapList.push(map);
  }

  removeMap(map: MemoryMap): void {
    const at = this.mapList.indexOf(map);
    if (at !== -1) this.mapList.splice(at, 1);
  }

  get irqs(): ReadonlyArray<Irq> {
    return this.irqList;
  }

  /** Bind a hardware interrupt, allocating its id from the channel id space. */
  addIrq(options: IrqOptions): Result<Irq> {
    if (!Number.isSafeInteger(options.irq) || options.irq < 0) {
      return fail(ErrorKind.InvalidArgument, `IRQ number ${options.irq} must be a non-negative integer`, this.name);
    }
    if (this.irqList.some((existing) => existing.irq === options.irq)) {
      return fail(ErrorKind.InvalidArgument, `IRQ ${options.irq} is already bound to '${this.name}'`);
    }
    const id = this.channelIds.allocate(options.id);
    if (!id.ok) return id;
    const irq: Irq = { irq: options.irq, trigger: options.trigger, id: id.value };
    this.irqList.push(irq);
    return ok(irq);
  }

  /** Unbind an interrupt and release its id. */
  removeIrq(irq: Irq): void {
    const at = this.irqList.indexOf(irq);
    if (at === -1) return;
    this.irqList.splice(at, 1);
    this.channelIds.release(irq.id);
  }

  // -------------------------------------------------------------------------
  // Children and virtual machine
  // -------------------------------------------------------------------------

  /** The PD this one is nested under, if any. */
  get parent(): ProtectionDomain | undefined {
    return this.parentRef;
  }

  /** Direct children with their ids, in the order they were added. */
  get children(): ReadonlyArray<ChildPd> {
    return this.childList;
  }

  get vm(): VirtualMachine | undefined {
    return this.vmRef;
  }

  /** This PD and every PD nested under it, depth first. */
  *descendants(): Generator<ProtectionDomain> {
    yield this;
    for (const child of this.childList) {
      yield* child.pd.descendants();
    }
  }

  /** Root of the tree this PD belongs to. */
  root(): ProtectionDomain {
    let node: ProtectionDomain = this;
    while (node.parentRef) node = node.parentRef;
    return node;
  }

  /**
   * Structural check for nesting `child` here: it must not already have a
   * parent, and it must not be this PD or one of its ancestors.
   *
   * @returns StructuralCycle when either rule is broken
   */
  checkChild(child: ProtectionDomain): Result {
    if (child.parentRef) {
      return fail(
        ErrorKind.StructuralCycle,
        `PD '${child.name}' is already a child of '${child.parentRef.name}'`,
      );
    }
    for (let node: ProtectionDomain | undefined = this; node; node = node.parentRef) {
      if (node === child) {
        return fail(
          ErrorKind.StructuralCycle,
          `adding '${child.name}' under '${this.name}' would create a cycle`,
        );
      }
    }
    return ok();
  }

  /**
   * @internal Tree bookkeeping for SystemDescription.addChild, which checks
   * names against the rest of the system first.
   */
  adoptChild(child: ProtectionDomain, fixedId?: number): Result<number> {
    const checked = this.checkChild(child);
    if (!checked.ok) return checked;
    const id = this.childIds.allocate(fixedId);
    if (!id.ok) return id;
    child.parentRef = this;
    this.childList.push({ pd: child, id: id.value });
    return ok(id.value);
  }

  /**
   * Host `vm` in this PD.
   *
   * @returns StructuralCycle when this PD already hosts a VM or the VM
   *          already has a host
   */
  attachVm(vm: VirtualMachine): Result {
    if (this.vmRef) {
      return fail(
        ErrorKind.StructuralCycle,
        `PD '${this.name}' already hosts virtual machine '${this.vmRef.name}'`,
      );
    }
    if (vm.host !== undefined) {
      return fail(ErrorKind.StructuralCycle, `virtual machine '${vm.name}' is already attached`);
    }
    this.vmRef = vm;
    vm.bindHost(this.id);
    return ok();
  }

  /** Release the hosted VM, if any. */
  detachVm(): void {
    this.vmRef?.bindHost(undefined);
    this.vmRef = undefined;
  }
}
