/**
 * sdfkit Core: Block and GPU Config Layouts
 *
 * Both classes share the queue connection shape; block connections carry
 * a storage-info region, GPU connections an events region in its place.
 */

import {
  EMPTY_DEVICE_REGION,
  EMPTY_REGION,
  MAX_CLIENTS,
  writeDeviceRegion,
  writeDeviceResources,
  writeRegion,
  type DeviceRegionResource,
  type DeviceResources,
  type RegionResource,
} from './common.js';
import { StructWriter } from './struct-writer.js';

export interface QueueConnection {
  /** Storage info (block) or events (GPU) region. */
  readonly info: RegionResource;
  readonly requestQueue: RegionResource;
  readonly responseQueue: RegionResource;
  readonly numBuffers: number;
  readonly id: number;
}

export const EMPTY_QUEUE_CONNECTION: QueueConnection = {
  info: EMPTY_REGION,
  requestQueue: EMPTY_REGION,
  responseQueue: EMPTY_REGION,
  numBuffers: 0,
  id: 0,
};

export interface VirtDriverSide {
  readonly conn: QueueConnection;
  readonly data: DeviceRegionResource;
}

export interface VirtClientSide {
  readonly conn: QueueConnection;
  readonly data: DeviceRegionResource;
  /** Block only; 0 for GPU clients. */
  readonly partition: number;
}

export interface QueueVirtConfig {
  readonly driver: VirtDriverSide;
  readonly clients: ReadonlyArray<VirtClientSide>;
}

export interface QueueClientConfig {
  readonly virt: QueueConnection;
  readonly data: RegionResource;
}

function writeConnection(w: StructWriter, conn: QueueConnection): void {
  w.struct(8, () => {
    writeRegion(w, conn.info);
    writeRegion(w, conn.requestQueue);
    writeRegion(w, conn.responseQueue);
    w.u16(conn.numBuffers).u8(conn.id);
  });
}

export function encodeQueueDriver(resources: DeviceResources, virt: QueueConnection): Uint8Array {
  const w = new StructWriter();
  writeDeviceResources(w, resources);
  writeConnection(w, virt);
  return w.finish();
}

export function encodeQueueVirt(config: QueueVirtConfig, withPartition: boolean): Uint8Array {
  const empty: VirtClientSide = { conn: EMPTY_QUEUE_CONNECTION, data: EMPTY_DEVICE_REGION, partition: 0 };
  const w = new StructWriter();
  w.struct(8, () => {
    w.struct(8, () => {
      writeConnection(w, config.driver.conn);
      writeDeviceRegion(w, config.driver.data);
    });
    w.u8(config.clients.length);
    w.array(config.clients, MAX_CLIENTS, empty, (out, client) => {
      out.struct(8, () => {
        writeConnection(out, client.conn);
        writeDeviceRegion(out, client.data);
        if (withPartition) out.u32(client.partition);
      });
    });
  });
  return w.finish();
}

export function encodeQueueClient(config: QueueClientConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.virt);
    writeRegion(w, config.data);
  });
  return w.finish();
}
