/**
 * sdfkit Core: Virtual Machine Monitor Tests
 *
 *   VMM-U1: only aarch64 and riscv64 host virtual machines
 *   VMM-U2: guest RAM defaults and the guest device tree override
 *   VMM-U3: a PD or VM already in a VMM is rejected
 *   VMM-U4: vCPU count and VM name limits
 *   VMM-U5: connect maps RAM, passthrough regions and interrupts
 *   VMM-U6: the VMM blob layout
 *   VMM-U7: a failing connect detaches the VM and removes its regions
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  Arch,
  ErrorKind,
  IrqTrigger,
  SubsystemState,
  VirtualMachineMonitor,
  type ProtectionDomain,
  type SystemDescription,
  type VirtualMachine,
} from '../src/index.js';
import { FakeDevice, FakeTree, MemoryBlobSink, addPd, errorOf, newSystem, unwrap } from './fixtures.js';

const UART = new FakeDevice('uart', {
  compatible: ['arm,pl011'],
  registers: [{ paddr: 0x9000000, size: 0x1000 }],
  interrupts: [{ irq: 33, trigger: IrqTrigger.Level }],
});

let sdf: SystemDescription;
let vmm: ProtectionDomain;
let vm: VirtualMachine;

beforeEach(() => {
  sdf = newSystem();
  vmm = addPd(sdf, 'vmm', { priority: 254 });
  vm = unwrap(sdf.createVm('linux', { vcpus: [{ id: 0 }] }));
});

describe('VirtualMachineMonitor.create', () => {
  it('VMM-U1: rejects architectures without virtualisation support', () => {
    for (const arch of [Arch.Riscv32, Arch.X86_64]) {
      const other = newSystem({ arch });
      const pd = addPd(other, 'vmm');
      const guest = unwrap(other.createVm('linux', { vcpus: [{ id: 0 }] }));
      expect(errorOf(VirtualMachineMonitor.create(other, pd, guest))).toBe(ErrorKind.UnsupportedArch);
    }
    const riscv = newSystem({ arch: Arch.Riscv64 });
    const pd = addPd(riscv, 'vmm');
    const guest = unwrap(riscv.createVm('linux', { vcpus: [{ id: 0 }] }));
    unwrap(VirtualMachineMonitor.create(riscv, pd, guest));
  });

  it('VMM-U2: uses default RAM unless the guest device tree has a memory node', () => {
    expect(unwrap(VirtualMachineMonitor.create(sdf, vmm, vm)).ram).toEqual({ paddr: 0x40000000, size: 0x10000000 });

    const guestDtb = new FakeTree({
      memory: new FakeDevice('memory', { compatible: [], registers: [{ paddr: 0x80000000, size: 0x8000000 }] }),
    });
    expect(unwrap(VirtualMachineMonitor.create(sdf, vmm, vm, { guestDtb })).ram).toEqual({
      paddr: 0x80000000,
      size: 0x8000000,
    });
  });

  it('VMM-U2: rejects guest RAM that is not page-aligned', () => {
    expect(errorOf(VirtualMachineMonitor.create(sdf, vmm, vm, { ramPaddr: 0x40000800 }))).toBe(
      ErrorKind.InvalidAddress,
    );
    const guestDtb = new FakeTree({
      memory: new FakeDevice('memory', { compatible: [], registers: [{ paddr: 0x80000000, size: 0x1800 }] }),
    });
    expect(errorOf(VirtualMachineMonitor.create(sdf, vmm, vm, { guestDtb }))).toBe(ErrorKind.InvalidAddress);
  });

  it('VMM-U3: refuses a PD that already hosts a VM', () => {
    const other = unwrap(sdf.createVm('other', { vcpus: [{ id: 0 }] }));
    unwrap(vmm.attachVm(other));
    expect(errorOf(VirtualMachineMonitor.create(sdf, vmm, vm))).toBe(ErrorKind.StructuralCycle);

    const second = addPd(sdf, 'vmm2');
    expect(errorOf(VirtualMachineMonitor.create(sdf, second, other))).toBe(ErrorKind.StructuralCycle);
  });

  it('VMM-U4: limits vCPUs to 16 and the VM name to 63 bytes', () => {
    const wide = unwrap(sdf.createVm('wide', { vcpus: Array.from({ length: 17 }, (_, id) => ({ id })) }));
    expect(errorOf(VirtualMachineMonitor.create(sdf, vmm, wide))).toBe(ErrorKind.InvalidArgument);

    const named = unwrap(sdf.createVm('v'.repeat(64), { vcpus: [{ id: 0 }] }));
    expect(errorOf(VirtualMachineMonitor.create(sdf, vmm, named))).toBe(ErrorKind.InvalidArgument);
  });
});

describe('VirtualMachineMonitor.connect', () => {
  it('VMM-U5: rejects the same passthrough device twice', () => {
    const monitor = unwrap(VirtualMachineMonitor.create(sdf, vmm, vm));
    unwrap(monitor.addPassthroughDevice('uart', UART));
    expect(errorOf(monitor.addPassthroughDevice('uart', UART))).toBe(ErrorKind.DuplicateClient);
    expect(monitor.devices.map((d) => d.name)).toEqual(['uart']);
  });

  it('VMM-U5: maps guest RAM and passthrough devices', () => {
    const monitor = unwrap(VirtualMachineMonitor.create(sdf, vmm, vm));
    unwrap(monitor.addPassthroughDevice('uart', UART));
    unwrap(monitor.connect());

    expect(monitor.state).toBe(SubsystemState.Connected);
    expect(vmm.vm).toBe(vm);
    expect(sdf.memoryRegions.map((mr) => [mr.name, mr.size, mr.paddr])).toEqual([
      ['guest_ram_linux', 0x10000000, undefined],
      ['linux/uart/0', 0x1000, 0x9000000],
    ]);
    expect(vm.maps.map((m) => [m.vaddr, m.cached])).toEqual([
      [0x40000000, true],
      [0x9000000, false],
    ]);
    expect(vmm.maps.map((m) => [m.vaddr, m.setvarVaddr])).toEqual([[0x10000000, 'guest_ram_vaddr']]);
    expect(vmm.irqs.map((irq) => [irq.irq, irq.id])).toEqual([[33, 0]]);
  });

  it('VMM-U6: writes the VM name, RAM, vCPUs, regions and interrupts', () => {
    const monitor = unwrap(VirtualMachineMonitor.create(sdf, vmm, vm));
    unwrap(monitor.addPassthroughDevice('uart', UART));
    unwrap(monitor.connect());
    const sink = new MemoryBlobSink();
    expect(unwrap(monitor.serializeConfig(sink))).toEqual(['vmm_vmm.data']);

    const blob = sink.get('vmm_vmm.data');
    expect(blob).toHaveLength(1656);
    expect(blob.toString('utf8', 0, 5)).toBe('linux');
    expect(blob[5]).toBe(0);
    expect(blob.readBigUInt64LE(64)).toBe(BigInt(0x40000000));
    expect(blob.readBigUInt64LE(72)).toBe(BigInt(0x10000000));
    expect(blob.readBigUInt64LE(80)).toBe(BigInt(0x10000000));
    expect(blob[88]).toBe(1);
    expect(blob[89]).toBe(0);
    expect(blob[105]).toBe(1);
    expect(blob.readBigUInt64LE(112)).toBe(BigInt(0x9000000));
    expect(blob.readBigUInt64LE(120)).toBe(BigInt(0x1000));
    expect(blob[1136]).toBe(1);
    expect(blob[1140]).toBe(0);
    expect(blob.readUInt32LE(1144)).toBe(33);
  });

  it('VMM-U7: rolls back the attach and the guest regions on failure', () => {
    const monitor = unwrap(VirtualMachineMonitor.create(sdf, vmm, vm));
    const twice = new FakeDevice('gic', {
      compatible: ['arm,gic'],
      registers: [{ paddr: 0x8000000, size: 0x10000 }],
      interrupts: [
        { irq: 40, trigger: IrqTrigger.Level },
        { irq: 40, trigger: IrqTrigger.Edge },
      ],
    });
    unwrap(monitor.addPassthroughDevice('gic', twice));

    expect(errorOf(monitor.connect())).toBe(ErrorKind.InvalidArgument);
    expect(vmm.vm).toBeUndefined();
    expect(vm.host).toBeUndefined();
    expect(sdf.memoryRegions).toEqual([]);
    expect(vm.maps).toEqual([]);
    expect(vmm.maps).toEqual([]);
    expect(vmm.irqs).toEqual([]);
    expect(monitor.state).toBe(SubsystemState.Configured);
  });
});
