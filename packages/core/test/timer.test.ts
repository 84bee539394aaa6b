/**
 * sdfkit Core: Timer Subsystem Tests
 *
 *   TMR-U1: the driver becomes passive
 *   TMR-U2: clients must run below the driver
 *   TMR-U3: connect binds the device and adds one channel per client
 *   TMR-U4: client channels are protected calls without client notification
 *   TMR-U5: blobs carry device resources and each client's channel id
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DeviceClass,
  ErrorKind,
  IrqTrigger,
  SubsystemState,
  TimerSystem,
  type ProtectionDomain,
  type SystemDescription,
} from '../src/index.js';
import { FakeDevice, MemoryBlobSink, addPd, catalog, errorOf, newSystem, unwrap } from './fixtures.js';

const drivers = catalog([
  {
    deviceClass: DeviceClass.Timer,
    name: 'arm',
    config: {
      compatible: ['arm,armv8-timer'],
      regions: [{ name: 'regs', dtIndex: 0 }],
      irqs: [{ dtIndex: 0 }],
    },
  },
]);

const device = new FakeDevice('timer', {
  compatible: ['arm,armv8-timer'],
  registers: [{ paddr: 0x9010000, size: 0x20 }],
  interrupts: [{ irq: 30, trigger: IrqTrigger.Level }],
});

let sdf: SystemDescription;
let driver: ProtectionDomain;

beforeEach(() => {
  sdf = newSystem({ drivers });
  driver = addPd(sdf, 'timer_driver', { priority: 200 });
});

describe('TimerSystem', () => {
  it('TMR-U1: makes the driver passive', () => {
    unwrap(TimerSystem.create(sdf, { driver, device }));
    expect(driver.passive).toBe(true);
  });

  it('TMR-U2: rejects clients at or above the driver priority', () => {
    const timer = unwrap(TimerSystem.create(sdf, { driver, device }));
    const equal = addPd(sdf, 'equal', { priority: 200 });
    const below = addPd(sdf, 'below', { priority: 199 });

    expect(errorOf(timer.addClient(equal))).toBe(ErrorKind.InvalidClient);
    expect(errorOf(timer.addClient(driver))).toBe(ErrorKind.InvalidClient);
    unwrap(timer.addClient(below));
    expect(errorOf(timer.addClient(below))).toBe(ErrorKind.DuplicateClient);
    expect(timer.state).toBe(SubsystemState.Configured);
  });

  it('TMR-U2: rechecks priorities changed after the client was added', () => {
    const timer = unwrap(TimerSystem.create(sdf, { driver, device }));
    const client = addPd(sdf, 'client', { priority: 10 });
    unwrap(timer.addClient(client));
    unwrap(client.setPriority(250));

    expect(errorOf(timer.connect())).toBe(ErrorKind.InvalidClient);
    expect(timer.state).toBe(SubsystemState.Configured);
    expect(sdf.memoryRegions).toEqual([]);
  });

  it('TMR-U3: connect binds the device and allocates channel ids after the irq', () => {
    const timer = unwrap(TimerSystem.create(sdf, { driver, device }));
    const c1 = addPd(sdf, 'c1', { priority: 100 });
    const c2 = addPd(sdf, 'c2', { priority: 100 });
    const other = addPd(sdf, 'other');
    unwrap(sdf.addChannel(unwrap(sdf.createChannel(c2, other))));
    unwrap(timer.addClient(c1));
    unwrap(timer.addClient(c2));

    unwrap(timer.connect());

    expect(timer.state).toBe(SubsystemState.Connected);
    expect(driver.irqs).toEqual([{ irq: 30, trigger: IrqTrigger.Level, id: 0 }]);
    const ends = sdf.channels.slice(1).map((ch) => [ch.endA, ch.endB]);
    expect(ends).toEqual([
      [1, 0],
      [2, 1],
    ]);
  });

  it('TMR-U4: renders client ends as pp without notification', () => {
    const timer = unwrap(TimerSystem.create(sdf, { driver }));
    const client = addPd(sdf, 'client', { priority: 100 });
    unwrap(timer.addClient(client));
    unwrap(timer.connect());

    const xml = unwrap(sdf.render());
    expect(xml).toContain(
      [
        '    <channel>',
        '        <end pd="timer_driver" id="0" />',
        '        <end pd="client" id="0" notify="false" pp="true" />',
        '    </channel>',
      ].join('\n'),
    );
    expect(xml).toContain('<protection_domain name="timer_driver" priority="200" passive="true">');
  });

  it('TMR-U5: serialises the driver and client blobs', () => {
    const timer = unwrap(TimerSystem.create(sdf, { driver, device }));
    const c1 = addPd(sdf, 'c1', { priority: 100 });
    const c2 = addPd(sdf, 'c2', { priority: 100 });
    unwrap(sdf.addChannel(unwrap(sdf.createChannel(c2, c1))));
    unwrap(timer.addClient(c1));
    unwrap(timer.addClient(c2));
    unwrap(timer.connect());

    const sink = new MemoryBlobSink();
    expect(unwrap(timer.serializeConfig(sink))).toEqual([
      'timer_driver_timer_driver.data',
      'timer_client_c1.data',
      'timer_client_c2.data',
    ]);
    expect(timer.state).toBe(SubsystemState.Serialised);

    const driverBlob = sink.get('timer_driver_timer_driver.data');
    expect(driverBlob).toHaveLength(1608);
    expect([driverBlob[0], driverBlob[1]]).toEqual([1, 1]);
    expect(driverBlob.readBigUInt64LE(8)).toBe(BigInt(0x10000000));
    expect(driverBlob.readBigUInt64LE(16)).toBe(BigInt(0x20));
    expect(driverBlob.readBigUInt64LE(24)).toBe(BigInt(0x9010000));
    expect(driverBlob[1544]).toBe(0);

    expect([...sink.get('timer_client_c1.data')]).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
    expect([...sink.get('timer_client_c2.data')]).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
  });
});
