/**
 * sdfkit Core: I2C Config Layout
 */

import {
  EMPTY_REGION,
  MAX_CLIENTS,
  writeDeviceResources,
  writeRegion,
  type DeviceResources,
  type RegionResource,
} from './common.js';
import { StructWriter } from './struct-writer.js';

export interface I2cConnection {
  readonly requestQueue: RegionResource;
  readonly responseQueue: RegionResource;
  readonly numBuffers: number;
  readonly id: number;
}

export const EMPTY_I2C_CONNECTION: I2cConnection = {
  requestQueue: EMPTY_REGION,
  responseQueue: EMPTY_REGION,
  numBuffers: 0,
  id: 0,
};

export interface I2cVirtClient {
  readonly conn: I2cConnection;
  readonly dataSize: number;
  /** Where the client's data region sits in the driver. */
  readonly driverDataVaddr: number;
  /** Where the client's data region sits in the client itself. */
  readonly clientDataVaddr: number;
}

export interface I2cVirtConfig {
  readonly driver: I2cConnection;
  readonly clients: ReadonlyArray<I2cVirtClient>;
}

export interface I2cClientConfig {
  readonly virt: I2cConnection;
  readonly data: RegionResource;
}

function writeConnection(w: StructWriter, conn: I2cConnection): void {
  w.struct(8, () => {
    writeRegion(w, conn.requestQueue);
    writeRegion(w, conn.responseQueue);
    w.u16(conn.numBuffers).u8(conn.id);
  });
}

export function encodeI2cDriver(resources: DeviceResources, virt: I2cConnection): Uint8Array {
  const w = new StructWriter();
  writeDeviceResources(w, resources);
  writeConnection(w, virt);
  return w.finish();
}

export function encodeI2cVirt(config: I2cVirtConfig): Uint8Array {
  const empty: I2cVirtClient = {
    conn: EMPTY_I2C_CONNECTION,
    dataSize: 0,
    driverDataVaddr: 0,
    clientDataVaddr: 0,
  };
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.driver);
    w.u8(config.clients.length);
    w.array(config.clients, MAX_CLIENTS, empty, (out, client) => {
      out.struct(8, () => {
        writeConnection(out, client.conn);
        out.u64(client.dataSize).u64(client.driverDataVaddr).u64(client.clientDataVaddr);
      });
    });
  });
  return w.finish();
}

export function encodeI2cClient(config: I2cClientConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.virt);
    writeRegion(w, config.data);
  });
  return w.finish();
}
