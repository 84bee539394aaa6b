/**
 * sdfkit Core: Virtual Machine Monitor
 *
 * Hosts a VM inside a VMM PD. Guest RAM is one MR visible to both the guest
 * (at its guest physical address) and the VMM. Passthrough devices are
 * mapped straight into the guest and their interrupts are delivered to the
 * VMM, which injects them.
 */

import type { DeviceNode, DeviceTree } from '../dtb/device-tree.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { VirtualMachine } from '../graph/virtual-machine.js';
import {
  MAX_PASSTHROUGH_IRQS,
  MAX_PASSTHROUGH_REGIONS,
  MAX_VMM_VCPUS,
  VMM_NAME_LEN,
  encodeVmm,
  type GuestRam,
  type PassthroughIrq,
  type PassthroughRegion,
} from '../config/vmm.js';
import { SubsystemBase, type ConfigBlob } from '../sddf/subsystem.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { Arch, SMALL_PAGE, isAligned, roundDown, roundUp } from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

export const DEFAULT_GUEST_RAM_SIZE = 0x10000000;
export const DEFAULT_GUEST_RAM_PADDR = 0x40000000;

const SUPPORTED_ARCHES: ReadonlyArray<Arch> = [Arch.Aarch64, Arch.Riscv64];

export interface VmmOptions {
  /** Guest device tree; its `memory` node overrides the RAM defaults. */
  readonly guestDtb?: DeviceTree | undefined;
  readonly ramSize?: number;
  readonly ramPaddr?: number;
}

export interface PassthroughDevice {
  /** The VMM PD, which receives the device's interrupts. */
  readonly pd: ProtectionDomain;
  readonly name: string;
  readonly node: DeviceNode;
}

export class VirtualMachineMonitor extends SubsystemBase<PassthroughDevice> {
  readonly kind = 'vmm';
  readonly vmm: ProtectionDomain;
  readonly vm: VirtualMachine;
  readonly ram: { readonly paddr: number; readonly size: number };
  private ramVaddr = 0;
  private regions: PassthroughRegion[] = [];
  private irqs: PassthroughIrq[] = [];

  private constructor(
    sdf: SystemDescription,
    vmm: ProtectionDomain,
    vm: VirtualMachine,
    ram: { paddr: number; size: number },
  ) {
    super(sdf);
    this.vmm = vmm;
    this.vm = vm;
    this.ram = ram;
  }

  static create(
    sdf: SystemDescription,
    vmm: ProtectionDomain,
    vm: VirtualMachine,
    options: VmmOptions = {},
  ): Result<VirtualMachineMonitor> {
    if (!SUPPORTED_ARCHES.includes(sdf.arch)) {
      return fail(ErrorKind.UnsupportedArch, `virtual machines are not supported on ${sdf.arch}`);
    }
    if (!sdf.isLive(vmm)) return fail(ErrorKind.UnknownEntity, `VMM PD '${vmm.name}' has been destroyed`);
    if (!sdf.isLive(vm)) return fail(ErrorKind.UnknownEntity, `virtual machine '${vm.name}' has been destroyed`);
    if (vmm.vm || vm.host !== undefined) {
      return fail(ErrorKind.StructuralCycle, `'${vmm.name}' or '${vm.name}' is already part of a VMM`);
    }
    if (vm.vcpus.length > MAX_VMM_VCPUS) {
      return fail(ErrorKind.InvalidArgument, `a VMM supports at most ${MAX_VMM_VCPUS} vCPUs`);
    }
    if (Buffer.byteLength(vm.name, 'utf8') >= VMM_NAME_LEN) {
      return fail(ErrorKind.InvalidArgument, `VM name '${vm.name}' must be shorter than ${VMM_NAME_LEN} bytes`);
    }

    let paddr = options.ramPaddr ?? DEFAULT_GUEST_RAM_PADDR;
    let size = options.ramSize ?? DEFAULT_GUEST_RAM_SIZE;
    const memory = options.guestDtb?.lookup('memory')?.registers()[0];
    if (memory) {
      paddr = memory.paddr;
      size = memory.size;
    }
    if (!isAligned(paddr, SMALL_PAGE) || !isAligned(size, SMALL_PAGE) || size <= 0) {
      return fail(ErrorKind.InvalidAddress, `guest RAM ${paddr}+${size} is not page-aligned`);
    }
    return ok(new VirtualMachineMonitor(sdf, vmm, vm, { paddr, size }));
  }

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return [];
  }

  addPassthroughDevice(name: string, node: DeviceNode): Result {
    const open = this.checkOpen('add a passthrough device to');
    if (!open.ok) return this.reject(this.vmm, open);
    if (this.clientList.some((d) => d.name === name)) {
      return this.reject(
        this.vmm,
        fail(ErrorKind.DuplicateClient, `passthrough device '${name}' already added to '${this.vm.name}'`),
      );
    }
    this.admit({ pd: this.vmm, name, node });
    return ok();
  }

  get devices(): ReadonlyArray<PassthroughDevice> {
    return this.clientList;
  }

  protected wire(tx: Wiring): Result {
    this.regions = [];
    this.irqs = [];

    const attached = this.vmm.attachVm(this.vm);
    if (!attached.ok) return attached;
    tx.onRollback(() => this.vmm.detachVm());

    const ram = tx.mr(`guest_ram_${this.vm.name}`, this.ram.size);
    if (!ram.ok) return ram;
    const guest = tx.map(this.vm, ram.value, 'rwx', { vaddr: this.ram.paddr, cached: true });
    if (!guest.ok) return guest;
    const host = tx.map(this.vmm, ram.value, 'rw', { setvarVaddr: 'guest_ram_vaddr' });
    if (!host.ok) return host;
    this.ramVaddr = host.value.vaddr;

    for (const device of this.clientList) {
      for (const [i, reg] of device.node.registers().entries()) {
        const base = roundDown(reg.paddr, SMALL_PAGE);
        const size = roundUp(reg.size + (reg.paddr - base), SMALL_PAGE);
        const mr = tx.deviceMr(`${this.vm.name}/${device.name}/${i}`, base, size);
        if (!mr.ok) return mr;
        const mapped = tx.map(this.vm, mr.value, 'rw', { vaddr: base, cached: false });
        if (!mapped.ok) return mapped;
        this.regions.push({ guestPaddr: base, size });
      }
      for (const interrupt of device.node.interrupts()) {
        const bound = tx.irq(this.vmm, { irq: interrupt.irq, trigger: interrupt.trigger });
        if (!bound.ok) return bound;
        this.irqs.push({ id: bound.value.id, irq: interrupt.irq });
      }
    }
    if (this.regions.length > MAX_PASSTHROUGH_REGIONS || this.irqs.length > MAX_PASSTHROUGH_IRQS) {
      return fail(ErrorKind.InvalidArgument, `too many passthrough resources for '${this.vm.name}'`);
    }
    return ok();
  }

  private get guestRam(): GuestRam {
    return { guestPaddr: this.ram.paddr, size: this.ram.size, vmmVaddr: this.ramVaddr };
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    const data = encodeVmm({
      vmName: this.vm.name,
      ram: this.guestRam,
      vcpus: this.vm.vcpus.map((v) => v.id),
      regions: this.regions,
      irqs: this.irqs,
    });
    return [{ name: `vmm_${this.vmm.name}.data`, data }];
  }
}
