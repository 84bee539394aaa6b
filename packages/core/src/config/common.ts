/**
 * sdfkit Core: Shared Config Structures
 *
 * Region descriptors and the device-resources section that opens every
 * driver's blob.
 */

import type { MappedRegion } from '../system/wiring.js';
import type { StructWriter } from './struct-writer.js';

/** Upper bound on per-client tables in every subsystem config. */
export const MAX_CLIENTS = 61;
export const MAX_DEVICE_REGIONS = 64;
export const MAX_DEVICE_IRQS = 64;

export interface RegionResource {
  readonly vaddr: number;
  readonly size: number;
}

export interface DeviceRegionResource {
  readonly region: RegionResource;
  /** Physical address of the region, 0 when it is not pinned. */
  readonly ioAddr: number;
}

export interface DeviceResources {
  readonly regions: ReadonlyArray<DeviceRegionResource>;
  /** Local ids of the IRQs bound to the driver. */
  readonly irqs: ReadonlyArray<number>;
}

export const EMPTY_REGION: RegionResource = { vaddr: 0, size: 0 };
export const EMPTY_DEVICE_REGION: DeviceRegionResource = { region: EMPTY_REGION, ioAddr: 0 };
export const NO_DEVICE: DeviceResources = { regions: [], irqs: [] };

export function regionOf(mapped: MappedRegion): RegionResource {
  return { vaddr: mapped.vaddr, size: mapped.size };
}

export function deviceRegionOf(mapped: MappedRegion): DeviceRegionResource {
  return { region: regionOf(mapped), ioAddr: mapped.mr.paddr ?? 0 };
}

export function writeRegion(w: StructWriter, region: RegionResource): void {
  w.struct(8, () => {
    w.u64(region.vaddr).u64(region.size);
  });
}

export function writeDeviceRegion(w: StructWriter, region: DeviceRegionResource): void {
  w.struct(8, () => {
    writeRegion(w, region.region);
    w.u64(region.ioAddr);
  });
}

export function writeDeviceResources(w: StructWriter, resources: DeviceResources): void {
  w.struct(8, () => {
    w.u8(resources.regions.length).u8(resources.irqs.length);
    w.array(resources.regions, MAX_DEVICE_REGIONS, EMPTY_DEVICE_REGION, writeDeviceRegion);
    w.array(resources.irqs, MAX_DEVICE_IRQS, 0, (out, id) => out.u8(id));
  });
}
