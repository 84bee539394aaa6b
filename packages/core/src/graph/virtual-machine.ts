/**
 * sdfkit Core: Virtual Machines
 */

import type { MemoryMap } from './memory-region.js';
import {
  checkBudgetPeriod,
  checkPriority,
  type Schedule,
} from './attributes.js';
import { ok, type Result } from '../types/result.js';

export interface Vcpu {
  readonly id: number;
  /** Physical CPU the vCPU is pinned to. */
  readonly cpu?: number | undefined;
}

export interface VmOptions extends Schedule {
  readonly vcpus: ReadonlyArray<Vcpu>;
}

/** Anything a memory region can be mapped into. */
export interface MapTarget {
  readonly name: string;
  readonly maps: ReadonlyArray<MemoryMap>;
  addMap(map: MemoryMap): void;
  removeMap(map: MemoryMap): void;
}

export class VirtualMachine implements MapTarget {
  private readonly mapList: MemoryMap[] = [];
  private readonly schedule: Schedule;
  private hostId: number | undefined;

  constructor(
    readonly id: number,
    readonly name: string,
    readonly vcpus: ReadonlyArray<Vcpu>,
    schedule: Schedule,
  ) {
    this.schedule = { ...schedule };
  }

  get priority(): number | undefined {
    return this.schedule.priority;
  }

  get budget(): number | undefined {
    return this.schedule.budget;
  }

  get period(): number | undefined {
    return this.schedule.period;
  }

  get maps(): ReadonlyArray<MemoryMap> {
    return this.mapList;
  }

  /** Entity id of the PD hosting this VM, if attached. */
  get host(): number | undefined {
    return this.hostId;
  }

  setPriority(value: number): Result {
    const bad = checkPriority(this.name, value);
    if (bad) return bad;
    this.schedule.priority = value;
    return ok();
  }

  setBudget(value: number): Result {
    const bad = checkBudgetPeriod(this.name, value, this.schedule.period);
    if (bad) return bad;
    this.schedule.budget = value;
    return ok();
  }

  setPeriod(value: number): Result {
    const bad = checkBudgetPeriod(this.name, this.schedule.budget, value);
    if (bad) return bad;
    this.schedule.period = value;
    return ok();
  }

  addMap(map: MemoryMap): void {
    this.mapList.push(map);
  }

  removeMap(map: MemoryMap): void {
    const at = this.mapList.indexOf(map);
    if (at !== -1) this.mapList.splice(at, 1);
  }

  /** @internal Called by ProtectionDomain.attachVm / detachVm. */
  bindHost(hostId: number | undefined): void {
    this.hostId = hostId;
  }
}
