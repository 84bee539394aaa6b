/**
 * sdfkit Core: Network Config Layout
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

export const MAC_LEN = 6;

export interface NetConnection {
  readonly freeQueue: RegionResource;
  readonly activeQueue: RegionResource;
  readonly numBuffers: number;
  readonly id: number;
}

export const EMPTY_NET_CONNECTION: NetConnection = {
  freeQueue: EMPTY_REGION,
  activeQueue: EMPTY_REGION,
  numBuffers: 0,
  id: 0,
};

export interface NetDriverConfig {
  readonly virtRx: NetConnection;
  readonly virtTx: NetConnection;
}

export interface NetVirtRxConfig {
  readonly driver: NetConnection;
  readonly data: DeviceRegionResource;
  readonly bufferMetadata: RegionResource;
  readonly clients: ReadonlyArray<{ readonly conn: NetConnection; readonly mac: Uint8Array }>;
}

export interface NetVirtTxConfig {
  readonly driver: NetConnection;
  readonly clients: ReadonlyArray<{ readonly conn: NetConnection; readonly data: DeviceRegionResource }>;
}

export interface NetCopyConfig {
  readonly virtRx: NetConnection;
  readonly deviceData: RegionResource;
  readonly client: NetConnection;
  readonly clientData: RegionResource;
}

export interface NetClientConfig {
  readonly rx: NetConnection;
  readonly rxData: RegionResource;
  readonly tx: NetConnection;
  readonly txData: RegionResource;
  readonly mac: Uint8Array;
}

function writeConnection(w: StructWriter, conn: NetConnection): void {
  w.struct(8, () => {
    writeRegion(w, conn.freeQueue);
    writeRegion(w, conn.activeQueue);
    w.u16(conn.numBuffers).u8(conn.id);
  });
}

export function encodeNetDriver(resources: DeviceResources, config: NetDriverConfig): Uint8Array {
  const w = new StructWriter();
  writeDeviceResources(w, resources);
  w.struct(8, () => {
    writeConnection(w, config.virtRx);
    writeConnection(w, config.virtTx);
  });
  return w.finish();
}

export function encodeNetVirtRx(config: NetVirtRxConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.driver);
    writeDeviceRegion(w, config.data);
    writeRegion(w, config.bufferMetadata);
    w.u8(config.clients.length);
    w.array(config.clients, MAX_CLIENTS, { conn: EMPTY_NET_CONNECTION, mac: new Uint8Array(MAC_LEN) }, (out, client) => {
      out.struct(8, () => {
        writeConnection(out, client.conn);
        out.bytes(client.mac, MAC_LEN);
      });
    });
  });
  return w.finish();
}

export function encodeNetVirtTx(config: NetVirtTxConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.driver);
    w.u8(config.clients.length);
    w.array(config.clients, MAX_CLIENTS, { conn: EMPTY_NET_CONNECTION, data: EMPTY_DEVICE_REGION }, (out, client) => {
      out.struct(8, () => {
        writeConnection(out, client.conn);
        writeDeviceRegion(out, client.data);
      });
    });
  });
  return w.finish();
}

export function encodeNetCopy(config: NetCopyConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.virtRx);
    writeRegion(w, config.deviceData);
    writeConnection(w, config.client);
    writeRegion(w, config.clientData);
  });
  return w.finish();
}

export function encodeNetClient(config: NetClientConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.rx);
    writeRegion(w, config.rxData);
    writeConnection(w, config.tx);
    writeRegion(w, config.txData);
    w.bytes(config.mac, MAC_LEN);
  });
  return w.finish();
}
