/**
 * sdfkit Core: Serial Subsystem
 *
 * driver <-> TX virtualiser <-> clients, and optionally
 * driver <-> RX virtualiser <-> clients for input. Each connection is a
 * queue region, a data region and one channel.
 */

import type { DeviceNode } from '../dtb/device-tree.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import { NO_DEVICE, regionOf, type DeviceResources } from '../config/common.js';
import {
  EMPTY_SERIAL_CONNECTION,
  SERIAL_BEGIN_STR_LEN,
  SERIAL_NAME_LEN,
  encodeSerialClient,
  encodeSerialDriver,
  encodeSerialVirtRx,
  encodeSerialVirtTx,
  type SerialConnection,
} from '../config/serial.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { SMALL_PAGE, isAligned } from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import { DeviceClass } from './driver-catalog.js';
import { bindDevice } from './driver.js';
import { SubsystemBase, blobName, type ConfigBlob } from './subsystem.js';

export interface SerialOptions {
  readonly dataSize?: number;
  readonly queueSize?: number;
  /** Colour-code client output; doubles the driver's TX data region. */
  readonly enableColour?: boolean;
  /** Printed by the TX virtualiser when input switches clients. */
  readonly beginStr?: string;
  readonly defaultBaud?: number;
}

export interface SerialSystemOptions {
  readonly driver: ProtectionDomain;
  readonly virtTx: ProtectionDomain;
  readonly virtRx?: ProtectionDomain | undefined;
  readonly device?: DeviceNode | undefined;
  readonly options?: SerialOptions;
}

export interface SerialClient {
  readonly pd: ProtectionDomain;
}

interface Link {
  readonly server: SerialConnection;
  readonly client: SerialConnection;
}

const DEFAULTS = {
  dataSize: 0x10000,
  queueSize: 0x1000,
  enableColour: false,
  beginStr: 'Begin input\r\n',
  defaultBaud: 115200,
} as const;

/** Ctrl-\ switches the RX virtualiser between clients. */
const SWITCH_CHAR = 28;
const TERMINATE_NUM_CHAR = 0x0d;

export class SerialSystem extends SubsystemBase<SerialClient> {
  readonly kind = 'serial';
  readonly driver: ProtectionDomain;
  readonly virtTx: ProtectionDomain;
  readonly virtRx: ProtectionDomain | undefined;
  readonly device: DeviceNode | undefined;
  readonly options: Required<SerialOptions>;
  private resources: DeviceResources = NO_DEVICE;
  private driverRx: Link | undefined;
  private driverTx: Link | undefined;
  private clientRx: Link[] = [];
  private clientTx: Link[] = [];

  private constructor(sdf: SystemDescription, options: SerialSystemOptions, resolved: Required<SerialOptions>) {
    super(sdf);
    this.driver = options.driver;
    this.virtTx = options.virtTx;
    this.virtRx = options.virtRx;
    this.device = options.device;
    this.options = resolved;
  }

  static create(sdf: SystemDescription, options: SerialSystemOptions): Result<SerialSystem> {
    const { driver, virtTx, virtRx } = options;
    if (driver === virtTx || driver === virtRx || virtTx === virtRx) {
      return fail(ErrorKind.InvalidArgument, 'serial driver and virtualisers must be distinct PDs');
    }
    for (const pd of [driver, virtTx, virtRx]) {
      if (pd && !sdf.isLive(pd)) {
        return fail(ErrorKind.UnknownEntity, `serial PD '${pd.name}' has been destroyed`);
      }
    }
    const resolved = { ...DEFAULTS, ...options.options };
    for (const [label, size] of [['data', resolved.dataSize], ['queue', resolved.queueSize]] as const) {
      if (!Number.isSafeInteger(size) || size <= 0 || !isAligned(size, SMALL_PAGE)) {
        return fail(ErrorKind.InvalidArgument, `serial ${label} size ${size} must be a positive multiple of 0x1000`);
      }
    }
    if (Buffer.byteLength(resolved.beginStr, 'utf8') > SERIAL_BEGIN_STR_LEN) {
      return fail(ErrorKind.InvalidArgument, `serial begin string exceeds ${SERIAL_BEGIN_STR_LEN} bytes`);
    }
    return ok(new SerialSystem(sdf, options, resolved));
  }

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return this.virtRx ? [this.driver, this.virtTx, this.virtRx] : [this.driver, this.virtTx];
  }

  /** Admit `pd`. DuplicateClient for a repeat, InvalidClient for a core PD. */
  addClient(pd: ProtectionDomain): Result {
    const checked = this.checkClient(pd);
    if (!checked.ok) return this.reject(pd, checked);
    if (Buffer.byteLength(pd.name, 'utf8') >= SERIAL_NAME_LEN) {
      return this.reject(
        pd,
        fail(ErrorKind.InvalidClient, `serial client name '${pd.name}' is longer than ${SERIAL_NAME_LEN - 1} bytes`),
      );
    }
    this.admit({ pd });
    return ok();
  }

  private link(
    tx: Wiring,
    server: ProtectionDomain,
    client: ProtectionDomain,
    dataSize: number,
  ): Result<Link> {
    const prefix = `${this.device?.name ?? this.driver.name}/serial`;
    const queue = tx.mr(`${prefix}/queue/${server.name}/${client.name}`, this.options.queueSize);
    if (!queue.ok) return queue;
    const data = tx.mr(`${prefix}/data/${server.name}/${client.name}`, dataSize);
    if (!data.ok) return data;
    const serverQueue = tx.map(server, queue.value, 'rw');
    if (!serverQueue.ok) return serverQueue;
    const serverData = tx.map(server, data.value, 'rw');
    if (!serverData.ok) return serverData;
    const clientQueue = tx.map(client, queue.value, 'rw');
    if (!clientQueue.ok) return clientQueue;
    const clientData = tx.map(client, data.value, 'rw');
    if (!clientData.ok) return clientData;
    const channel = tx.channel(server, client);
    if (!channel.ok) return channel;
    return ok({
      server: { queue: regionOf(serverQueue.value), data: regionOf(serverData.value), id: channel.value.endA },
      client: { queue: regionOf(clientQueue.value), data: regionOf(clientData.value), id: channel.value.endB },
    });
  }

  protected wire(tx: Wiring): Result {
    this.resources = NO_DEVICE;
    this.driverRx = undefined;
    this.clientRx = [];
    this.clientTx = [];
    const { dataSize, enableColour } = this.options;

    if (this.device) {
      const bound = bindDevice(tx, DeviceClass.Serial, this.device, this.driver);
      if (!bound.ok) return bound;
      this.resources = bound.value;
    }
    if (this.virtRx) {
      const rx = this.link(tx, this.driver, this.virtRx, dataSize);
      if (!rx.ok) return rx;
      this.driverRx = rx.value;
    }
    const driverTx = this.link(tx, this.driver, this.virtTx, enableColour ? dataSize * 2 : dataSize);
    if (!driverTx.ok) return driverTx;
    this.driverTx = driverTx.value;

    for (const client of this.clientList) {
      if (this.virtRx) {
        const rx = this.link(tx, this.virtRx, client.pd, dataSize);
        if (!rx.ok) return rx;
        this.clientRx.push(rx.value);
      }
      const clientTx = this.link(tx, this.virtTx, client.pd, dataSize);
      if (!clientTx.ok) return clientTx;
      this.clientTx.push(clientTx.value);
    }
    return ok();
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    const driverTx = this.driverTx?.server ?? EMPTY_SERIAL_CONNECTION;
    const blobs: ConfigBlob[] = [
      {
        name: blobName(this.kind, 'driver', this.driver),
        data: encodeSerialDriver(this.resources, {
          rx: this.driverRx?.server ?? EMPTY_SERIAL_CONNECTION,
          tx: driverTx,
          defaultBaud: this.options.defaultBaud,
          rxEnabled: this.virtRx !== undefined,
        }),
      },
    ];
    if (this.virtRx) {
      blobs.push({
        name: blobName(this.kind, 'virt_rx', this.virtRx),
        data: encodeSerialVirtRx({
          driver: this.driverRx?.client ?? EMPTY_SERIAL_CONNECTION,
          clients: this.clientRx.map((l) => l.server),
          switchChar: SWITCH_CHAR,
          terminateNumChar: TERMINATE_NUM_CHAR,
        }),
      });
    }
    blobs.push({
      name: blobName(this.kind, 'virt_tx', this.virtTx),
      data: encodeSerialVirtTx({
        driver: this.driverTx?.client ?? EMPTY_SERIAL_CONNECTION,
        clients: this.clientTx.map((l, i) => ({ name: this.clientList[i]?.pd.name ?? '', conn: l.server })),
        beginStr: this.options.beginStr,
        enableColour: this.options.enableColour,
        enableRx: this.virtRx !== undefined,
      }),
    });
    this.clientList.forEach((client, i) => {
      blobs.push({
        name: blobName(this.kind, 'client', client.pd),
        data: encodeSerialClient({
          rx: this.clientRx[i]?.client ?? EMPTY_SERIAL_CONNECTION,
          tx: this.clientTx[i]?.client ?? EMPTY_SERIAL_CONNECTION,
        }),
      });
    });
    return blobs;
  }
}
