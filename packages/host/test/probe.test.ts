/**
 * sdfkit Host: Driver Probe Tests
 *
 *   PRB-U1: every class directory is scanned, including blk/mmc
 *   PRB-U2: driver directories without config.json are skipped
 *   PRB-U3: a missing class directory is an IO failure
 *   PRB-U4: malformed JSON and bad config shapes are InvalidConfig
 *   PRB-U5: each probed driver is logged
 *
 * Isolation: builds a throwaway sDDF tree under the OS temp directory.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeviceClass, ErrorKind, GenerationLogger } from '@sdfkit/core';
import { probeDrivers } from '../src/drivers/probe.js';
import { MemoryLogSink } from '../src/logging/file-log-sink.js';

const CLASS_DIRS = ['network', 'serial', 'timer', 'blk', 'blk/mmc', 'i2c', 'gpu'];

let sddf: string;

function addDriver(classDir: string, name: string, config: unknown): void {
  const dir = join(sddf, 'drivers', classDir, name);
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, 'config.json'), typeof config === 'string' ? config : JSON.stringify(config));
}

beforeEach(() => {
  sddf = mkdtempSync(join(tmpdir(), 'sdfkit-sddf-'));
  for (const dir of CLASS_DIRS) mkdirSync(join(sddf, 'drivers', dir), { recursive: true });
});

afterEach(() => {
  rmSync(sddf, { recursive: true, force: true });
});

describe('probeDrivers', () => {
  it('PRB-U1: finds drivers in every class, including nested block drivers', () => {
    addDriver('serial', 'arm', {
      compatible: ['arm,pl011'],
      resources: { regions: [{ name: 'regs', dt_index: 0 }], irqs: [{ dt_index: 0 }] },
    });
    addDriver('timer', 'arm', { compatible: ['arm,armv8-timer'], resources: { irqs: [{ dt_index: 1 }] } });
    addDriver('blk/mmc', 'imx', { compatible: ['fsl,imx8mq-usdhc'] });

    const catalog = probeDrivers(sddf);
    if (!catalog.ok) throw new Error(catalog.error.message);
    expect(catalog.value.size).toBe(3);
    expect(catalog.value.find(DeviceClass.Serial, ['arm,pl011'])?.config.regions).toEqual([
      { name: 'regs', perms: undefined, setvarVaddr: undefined, size: undefined, cached: undefined, dtIndex: 0 },
    ]);
    expect(catalog.value.find(DeviceClass.Blk, ['fsl,imx8mq-usdhc'])?.name).toBe('imx');
    expect(catalog.value.find(DeviceClass.Timer, ['arm,armv8-timer'])?.config.irqs).toEqual([
      { dtIndex: 1, channelId: undefined },
    ]);
  });

  it('PRB-U2: skips a driver directory without a config file', () => {
    mkdirSync(join(sddf, 'drivers', 'network', 'wip'));
    addDriver('network', 'virtio', { compatible: ['virtio,mmio'] });

    const catalog = probeDrivers(sddf);
    expect(catalog.ok && catalog.value.size).toBe(1);
  });

  it('PRB-U3: fails with IOFailure when a class directory is missing', () => {
    rmSync(join(sddf, 'drivers', 'gpu'), { recursive: true });
    const catalog = probeDrivers(sddf);
    expect(catalog.ok ? undefined : catalog.error.kind).toBe(ErrorKind.IOFailure);
  });

  it('PRB-U4: rejects malformed JSON and invalid configs', () => {
    addDriver('i2c', 'broken', '{ "compatible": [');
    const parsed = probeDrivers(sddf);
    expect(parsed.ok ? undefined : parsed.error.kind).toBe(ErrorKind.InvalidConfig);

    rmSync(join(sddf, 'drivers', 'i2c', 'broken'), { recursive: true });
    addDriver('i2c', 'shapeless', { compatible: 'meson,i2c' });
    const shaped = probeDrivers(sddf);
    expect(shaped.ok ? undefined : shaped.error.kind).toBe(ErrorKind.InvalidConfig);
  });

  it('PRB-U4: rejects two drivers claiming one compatible string', () => {
    addDriver('serial', 'first', { compatible: ['arm,pl011'] });
    addDriver('serial', 'second', { compatible: ['arm,pl011'] });
    const catalog = probeDrivers(sddf);
    expect(catalog.ok ? undefined : catalog.error.kind).toBe(ErrorKind.InvalidConfig);
  });

  it('PRB-U5: logs a driver.probed event per driver', () => {
    addDriver('serial', 'arm', { compatible: ['arm,pl011'] });
    addDriver('gpu', 'virtio', { compatible: ['virtio,mmio'] });
    const sink = new MemoryLogSink();
    probeDrivers(sddf, new GenerationLogger(sink));

    expect(sink.entries.map((e) => e.context)).toEqual([
      { class: 'serial', driver: 'arm' },
      { class: 'gpu', driver: 'virtio' },
    ]);
  });
});
