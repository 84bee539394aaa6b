/**
 * sdfkit Core: Driver Catalog and Device Binding Tests
 *
 *   DRV-U1: parseDriverConfig narrows a driver's config.json
 *   DRV-U2: malformed configs fail with InvalidConfig
 *   DRV-U3: a compatible string may be claimed by one driver per class
 *   DRV-U4: find() honours the device's compatible order
 *   DRV-U5: bindDevice maps register windows and scratch regions
 *   DRV-U6: bindDevice rejects disabled, unknown and incomplete devices
 */

import { describe, it, expect } from 'vitest';
import {
  DeviceClass,
  DriverCatalog,
  ErrorKind,
  IrqTrigger,
  bindDevice,
  parseDriverConfig,
} from '../src/index.js';
import { FakeDevice, RecordingLogSink, addPd, catalog, errorOf, newSystem, unwrap } from './fixtures.js';

const ARM_TIMER = {
  compatible: ['arm,armv8-timer'],
  resources: {
    regions: [{ name: 'regs', dt_index: 0, setvar_vaddr: 'timer_regs' }],
    irqs: [{ dt_index: 0 }],
  },
};

describe('parseDriverConfig', () => {
  it('DRV-U1: reads regions and irqs', () => {
    const config = unwrap(parseDriverConfig(ARM_TIMER, 'timer/arm/config.json'));
    expect(config.compatible).toEqual(['arm,armv8-timer']);
    expect(config.regions).toEqual([
      {
        name: 'regs',
        perms: undefined,
        setvarVaddr: 'timer_regs',
        size: undefined,
        cached: undefined,
        dtIndex: 0,
      },
    ]);
    expect(config.irqs).toEqual([{ dtIndex: 0, channelId: undefined }]);
  });

  it('DRV-U1: resources are optional', () => {
    const config = unwrap(parseDriverConfig({ compatible: ['x'] }, 'x'));
    expect(config.regions).toEqual([]);
    expect(config.irqs).toEqual([]);
  });

  it('DRV-U2: rejects malformed configs', () => {
    expect(errorOf(parseDriverConfig([], 'a'))).toBe(ErrorKind.InvalidConfig);
    expect(errorOf(parseDriverConfig({ compatible: 'x' }, 'a'))).toBe(ErrorKind.InvalidConfig);
    expect(errorOf(parseDriverConfig({ compatible: ['x'], resources: { regions: [{}] } }, 'a'))).toBe(
      ErrorKind.InvalidConfig,
    );
    expect(
      errorOf(parseDriverConfig({ compatible: ['x'], resources: { regions: [{ name: 'r', size: -1 }] } }, 'a')),
    ).toBe(ErrorKind.InvalidConfig);
    expect(errorOf(parseDriverConfig({ compatible: ['x'], resources: { irqs: [{ channel_id: 1 }] } }, 'a'))).toBe(
      ErrorKind.InvalidConfig,
    );
  });

  it('DRV-U2: names the source file in the message', () => {
    const result = parseDriverConfig(null, 'serial/pl011/config.json');
    expect(result.ok ? '' : result.error.message).toBe('serial/pl011/config.json: expected an object');
  });
});

describe('DriverCatalog', () => {
  const pl011 = { compatible: ['arm,pl011'], regions: [], irqs: [] };

  it('DRV-U3: rejects a compatible string claimed twice in one class', () => {
    const result = DriverCatalog.create([
      { deviceClass: DeviceClass.Serial, name: 'pl011', config: pl011 },
      { deviceClass: DeviceClass.Serial, name: 'other', config: pl011 },
    ]);
    expect(errorOf(result)).toBe(ErrorKind.InvalidConfig);
  });

  it('DRV-U3: the same string may appear in different classes', () => {
    const drivers = catalog([
      { deviceClass: DeviceClass.Serial, name: 'pl011', config: pl011 },
      { deviceClass: DeviceClass.Timer, name: 'pl011', config: pl011 },
    ]);
    expect(drivers.size).toBe(2);
  });

  it('DRV-U3: rejects regions with neither size nor dt_index', () => {
    const result = DriverCatalog.create([
      {
        deviceClass: DeviceClass.Blk,
        name: 'virtio',
        config: { compatible: ['virtio,mmio'], regions: [{ name: 'scratch' }], irqs: [] },
      },
    ]);
    expect(errorOf(result)).toBe(ErrorKind.InvalidConfig);
  });

  it('DRV-U4: tries compatible strings most specific first', () => {
    const drivers = catalog([
      { deviceClass: DeviceClass.Serial, name: 'generic', config: { ...pl011, compatible: ['arm,primecell'] } },
      { deviceClass: DeviceClass.Serial, name: 'pl011', config: pl011 },
    ]);
    expect(drivers.find(DeviceClass.Serial, ['arm,pl011', 'arm,primecell'])?.name).toBe('pl011');
    expect(drivers.find(DeviceClass.Serial, ['vendor,uart', 'arm,primecell'])?.name).toBe('generic');
    expect(drivers.find(DeviceClass.Timer, ['arm,pl011'])).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Device binding
// ---------------------------------------------------------------------------

describe('bindDevice', () => {
  const drivers = catalog([
    {
      deviceClass: DeviceClass.Timer,
      name: 'arm',
      config: {
        compatible: ['arm,armv8-timer'],
        regions: [
          { name: 'regs', dtIndex: 0, setvarVaddr: 'timer_regs' },
          { name: 'scratch', size: 0x1800 },
        ],
        irqs: [{ dtIndex: 0 }],
      },
    },
  ]);
  const timer = new FakeDevice('timer', {
    compatible: ['arm,armv8-timer'],
    registers: [{ paddr: 0x9010010, size: 0x20 }],
    interrupts: [{ irq: 30, trigger: IrqTrigger.Level }],
  });

  it('DRV-U5: maps the register window, a scratch region and the irq', () => {
    const sink = new RecordingLogSink();
    const sdf = newSystem({ drivers, sink });
    const driver = addPd(sdf, 'timer_driver');
    const tx = sdf.begin();

    const resources = unwrap(bindDevice(tx, DeviceClass.Timer, timer, driver));
    tx.commit();

    expect(resources.regions).toEqual([
      { region: { vaddr: 0x10000010, size: 0x20 }, ioAddr: 0x9010010 },
      { region: { vaddr: 0x10001000, size: 0x2000 }, ioAddr: 0 },
    ]);
    expect(resources.irqs).toEqual([0]);
    expect(sdf.memoryRegions.map((mr) => [mr.name, mr.size, mr.paddr])).toEqual([
      ['timer/regs', 0x1000, 0x9010000],
      ['timer/timer_driver/scratch', 0x2000, undefined],
    ]);
    expect(driver.maps.map((m) => [m.vaddr, m.cached, m.setvarVaddr])).toEqual([
      [0x10000000, false, 'timer_regs'],
      [0x10001000, true, undefined],
    ]);
    expect(driver.irqs).toEqual([{ irq: 30, trigger: IrqTrigger.Level, id: 0 }]);
    expect(sink.events).toContain('driver.bound');
  });

  it('DRV-U6: rejects a disabled device', () => {
    const sdf = newSystem({ drivers });
    const driver = addPd(sdf, 'd');
    const off = new FakeDevice('timer', { compatible: ['arm,armv8-timer'], status: 'disabled' });
    expect(errorOf(bindDevice(sdf.begin(), DeviceClass.Timer, off, driver))).toBe(ErrorKind.InvalidDevice);
  });

  it('DRV-U6: rejects a device no driver claims', () => {
    const sdf = newSystem({ drivers });
    const driver = addPd(sdf, 'd');
    const odd = new FakeDevice('odd', { compatible: ['vendor,odd'] });
    expect(errorOf(bindDevice(sdf.begin(), DeviceClass.Timer, odd, driver))).toBe(ErrorKind.InvalidDevice);
  });

  it('DRV-U6: rejects a device missing an interrupt and rolls back cleanly', () => {
    const sdf = newSystem({ drivers });
    const driver = addPd(sdf, 'd');
    const bare = new FakeDevice('timer', {
      compatible: ['arm,armv8-timer'],
      registers: [{ paddr: 0x9010000, size: 0x20 }],
    });
    const tx = sdf.begin();

    expect(errorOf(bindDevice(tx, DeviceClass.Timer, bare, driver))).toBe(ErrorKind.InvalidDevice);
    tx.rollback();
    expect(sdf.memoryRegions).toEqual([]);
    expect(driver.maps).toEqual([]);
    expect(driver.channelIds.allocatedCount).toBe(0);
  });
});
