/**
 * sdfkit Core: Device Binding
 *
 * Turns a device node into driver resources: looks up the driver for the
 * node's compatible strings, maps each register window or scratch region
 * into the driver PD and binds the driver's interrupts.
 */

import type { ProtectionDomain } from '../graph/protection-domain.js';
import { isEnabled, type DeviceNode } from '../dtb/device-tree.js';
import type { DeviceRegionResource, DeviceResources } from '../config/common.js';
import type { Wiring } from '../system/wiring.js';
import { SMALL_PAGE, roundDown, roundUp } from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import type { DeviceClass } from './driver-catalog.js';

export function bindDevice(
  tx: Wiring,
  deviceClass: DeviceClass,
  device: DeviceNode,
  driver: ProtectionDomain,
): Result<DeviceResources> {
  if (!isEnabled(device)) {
    return fail(ErrorKind.InvalidDevice, `device '${device.name}' is disabled (status '${device.status()}')`);
  }
  const entry = tx.sdf.drivers.find(deviceClass, device.compatible());
  if (!entry) {
    return fail(
      ErrorKind.InvalidDevice,
      `no ${deviceClass} driver is compatible with '${device.name}' (${device.compatible().join(', ')})`,
    );
  }

  const registers = device.registers();
  const interrupts = device.interrupts();
  const regions: DeviceRegionResource[] = [];

  for (const region of entry.config.regions) {
    if (region.dtIndex !== undefined) {
      const reg = registers[region.dtIndex];
      if (!reg) {
        return fail(
          ErrorKind.InvalidDevice,
          `device '${device.name}' has no register entry ${region.dtIndex} for region '${region.name}'`,
        );
      }
      const base = roundDown(reg.paddr, SMALL_PAGE);
      const offset = reg.paddr - base;
      const size = roundUp(region.size ?? reg.size + offset, SMALL_PAGE);
      const mr = tx.deviceMr(`${device.name}/${region.name}`, base, size);
      if (!mr.ok) return mr;
      const mapped = tx.map(driver, mr.value, region.perms ?? 'rw', {
        cached: region.cached ?? false,
        setvarVaddr: region.setvarVaddr,
      });
      if (!mapped.ok) return mapped;
      regions.push({ region: { vaddr: mapped.value.vaddr + offset, size: reg.size }, ioAddr: reg.paddr });
    } else {
      const mr = tx.mr(
        `${device.name}/${driver.name}/${region.name}`,
        roundUp(region.size ?? SMALL_PAGE, SMALL_PAGE),
      );
      if (!mr.ok) return mr;
      const mapped = tx.map(driver, mr.value, region.perms ?? 'rw', {
        cached: region.cached ?? true,
        setvarVaddr: region.setvarVaddr,
      });
      if (!mapped.ok) return mapped;
      regions.push({ region: { vaddr: mapped.value.vaddr, size: mapped.value.size }, ioAddr: 0 });
    }
  }

  const irqs: number[] = [];
  for (const irq of entry.config.irqs) {
    const line = interrupts[irq.dtIndex];
    if (!line) {
      return fail(
        ErrorKind.InvalidDevice,
        `device '${device.name}' has no interrupt ${irq.dtIndex}`,
      );
    }
    const bound = tx.irq(driver, { irq: line.irq, trigger: line.trigger, id: irq.channelId });
    if (!bound.ok) return bound;
    irqs.push(bound.value.id);
  }

  tx.sdf.log.debug('driver.bound', `bound '${device.name}' to ${deviceClass} driver '${entry.name}'`, {
    device: device.name,
    driver: entry.name,
    pd: driver.name,
  });
  return ok({ regions, irqs });
}
