/**
 * sdfkit Core: Serial Config Layout
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

export const SERIAL_NAME_LEN = 64;
export const SERIAL_BEGIN_STR_LEN = 128;

export interface SerialConnection {
  readonly queue: RegionResource;
  readonly data: RegionResource;
  readonly id: number;
}

export const EMPTY_SERIAL_CONNECTION: SerialConnection = {
  queue: EMPTY_REGION,
  data: EMPTY_REGION,
  id: 0,
};

export interface SerialDriverConfig {
  readonly rx: SerialConnection;
  readonly tx: SerialConnection;
  readonly defaultBaud: number;
  readonly rxEnabled: boolean;
}

export interface SerialVirtRxConfig {
  readonly driver: SerialConnection;
  readonly clients: ReadonlyArray<SerialConnection>;
  readonly switchChar: number;
  readonly terminateNumChar: number;
}

export interface SerialVirtTxClient {
  readonly name: string;
  readonly conn: SerialConnection;
}

export interface SerialVirtTxConfig {
  readonly driver: SerialConnection;
  readonly clients: ReadonlyArray<SerialVirtTxClient>;
  readonly beginStr: string;
  readonly enableColour: boolean;
  readonly enableRx: boolean;
}

export interface SerialClientConfig {
  readonly rx: SerialConnection;
  readonly tx: SerialConnection;
}

function writeConnection(w: StructWriter, conn: SerialConnection): void {
  w.struct(8, () => {
    writeRegion(w, conn.queue);
    writeRegion(w, conn.data);
    w.u8(conn.id);
  });
}

export function encodeSerialDriver(resources: DeviceResources, config: SerialDriverConfig): Uint8Array {
  const w = new StructWriter();
  writeDeviceResources(w, resources);
  w.struct(8, () => {
    writeConnection(w, config.rx);
    writeConnection(w, config.tx);
    w.u64(config.defaultBaud).bool(config.rxEnabled);
  });
  return w.finish();
}

export function encodeSerialVirtRx(config: SerialVirtRxConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.driver);
    w.array(config.clients, MAX_CLIENTS, EMPTY_SERIAL_CONNECTION, writeConnection);
    w.u8(config.clients.length).u8(config.switchChar).u8(config.terminateNumChar);
  });
  return w.finish();
}

export function encodeSerialVirtTx(config: SerialVirtTxConfig): Uint8Array {
  const beginStr = Buffer.from(config.beginStr, 'utf8');
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.driver);
    w.array(config.clients, MAX_CLIENTS, { name: '', conn: EMPTY_SERIAL_CONNECTION }, (out, client) => {
      out.struct(8, () => {
        out.cstring(client.name, SERIAL_NAME_LEN);
        writeConnection(out, client.conn);
      });
    });
    w.u8(config.clients.length);
    w.bytes(beginStr, SERIAL_BEGIN_STR_LEN).u8(beginStr.length);
    w.bool(config.enableColour).bool(config.enableRx);
  });
  return w.finish();
}

export function encodeSerialClient(config: SerialClientConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    writeConnection(w, config.rx);
    writeConnection(w, config.tx);
  });
  return w.finish();
}
