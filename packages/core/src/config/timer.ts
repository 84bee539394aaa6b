/**
 * sdfkit Core: Timer Config Layout
 */

import { writeDeviceResources, type DeviceResources } from './common.js';
import { StructWriter } from './struct-writer.js';

export interface TimerClientConfig {
  /** The client's local id for its channel to the driver. */
  readonly driverId: number;
}

export function encodeTimerDriver(resources: DeviceResources): Uint8Array {
  const w = new StructWriter();
  writeDeviceResources(w, resources);
  return w.finish();
}

export function encodeTimerClient(config: TimerClientConfig): Uint8Array {
  return new StructWriter().struct(1, (w) => w.u8(config.driverId)).finish();
}
