/**
 * sdfkit Core: Network Subsystem
 *
 * Receive path: driver -> RX virtualiser -> copier -> client. Each client
 * brings its own copier PD, which copies packets out of the shared DMA
 * region into the client's private buffers. Transmit is opt-in per client:
 * client -> TX virtualiser -> driver.
 *
 * Clients are identified by MAC address. Addresses are either supplied
 * when the client is added or generated at connect from the client name.
 */

import type { DeviceNode } from '../dtb/device-tree.js';
import type { MemoryRegion } from '../graph/memory-region.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import {
  EMPTY_DEVICE_REGION,
  EMPTY_REGION,
  NO_DEVICE,
  deviceRegionOf,
  regionOf,
  type DeviceRegionResource,
  type DeviceResources,
  type RegionResource,
} from '../config/common.js';
import {
  EMPTY_NET_CONNECTION,
  encodeNetClient,
  encodeNetCopy,
  encodeNetDriver,
  encodeNetVirtRx,
  encodeNetVirtTx,
  type NetConnection,
} from '../config/net.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { SMALL_PAGE, roundUp } from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import { DeviceClass } from './driver-catalog.js';
import { bindDevice } from './driver.js';
import { formatMac, generateMac, parseMac, type MacInput } from './mac.js';
import { SubsystemBase, blobName, type ConfigBlob } from './subsystem.js';

export const NET_BUFFER_SIZE = 2048;
const DEFAULT_BUFFERS = 512;

export interface NetOptions {
  /** Receive buffers owned by the driver. */
  readonly rxBuffers?: number;
  /** Caller-provided DMA region for received packets. */
  readonly rxDma?: MemoryRegion;
}

export interface NetSystemOptions {
  readonly driver: ProtectionDomain;
  readonly virtRx: ProtectionDomain;
  readonly virtTx: ProtectionDomain;
  readonly device?: DeviceNode | undefined;
  readonly options?: NetOptions;
}

export interface NetClientOptions {
  readonly copier: ProtectionDomain;
  readonly macAddr?: MacInput;
  readonly rxBuffers?: number;
  /** Wire a transmit path for this client. */
  readonly tx?: boolean;
  readonly txBuffers?: number;
}

export interface NetClient {
  readonly pd: ProtectionDomain;
  readonly copier: ProtectionDomain;
  /** Supplied address; generated at connect when absent. */
  readonly mac: Uint8Array | undefined;
  readonly rxBuffers: number;
  readonly tx: boolean;
  readonly txBuffers: number;
}

interface Link {
  readonly server: NetConnection;
  readonly client: NetConnection;
}

interface ClientWiring {
  readonly mac: Uint8Array;
  readonly virtRx: NetConnection;
  readonly copierRx: NetConnection;
  readonly copierDevice: RegionResource;
  readonly copierClient: NetConnection;
  readonly copierClientData: RegionResource;
  readonly rx: NetConnection;
  readonly rxData: RegionResource;
  readonly tx?: { readonly virt: NetConnection; readonly virtData: DeviceRegionResource; readonly client: NetConnection; readonly data: RegionResource };
}

function isBufferCount(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0 && n <= 0xffff;
}

/** Free and active queues hold an 8-byte header plus 16 bytes per buffer. */
function queueSize(buffers: number): number {
  return roundUp(8 + 16 * buffers, SMALL_PAGE);
}

export class NetSystem extends SubsystemBase<NetClient> {
  readonly kind = 'net';
  readonly driver: ProtectionDomain;
  readonly virtRx: ProtectionDomain;
  readonly virtTx: ProtectionDomain;
  readonly device: DeviceNode | undefined;
  readonly rxBuffers: number;
  private readonly rxDma: MemoryRegion | undefined;
  private resources: DeviceResources = NO_DEVICE;
  private driverRx: Link | undefined;
  private driverTx: Link | undefined;
  private rxData: DeviceRegionResource = EMPTY_DEVICE_REGION;
  private rxMetadata: RegionResource = EMPTY_REGION;
  private wired: ClientWiring[] = [];

  private constructor(sdf: SystemDescription, options: NetSystemOptions) {
    super(sdf);
    this.driver = options.driver;
    this.virtRx = options.virtRx;
    this.virtTx = options.virtTx;
    this.device = options.device;
    this.rxBuffers = options.options?.rxBuffers ?? DEFAULT_BUFFERS;
    this.rxDma = options.options?.rxDma;
  }

  static create(sdf: SystemDescription, options: NetSystemOptions): Result<NetSystem> {
    const { driver, virtRx, virtTx } = options;
    if (driver === virtRx || driver === virtTx || virtRx === virtTx) {
      return fail(ErrorKind.InvalidArgument, 'network driver and virtualisers must be distinct PDs');
    }
    for (const pd of [driver, virtRx, virtTx]) {
      if (!sdf.isLive(pd)) return fail(ErrorKind.UnknownEntity, `network PD '${pd.name}' has been destroyed`);
    }
    const rxBuffers = options.options?.rxBuffers ?? DEFAULT_BUFFERS;
    if (!isBufferCount(rxBuffers)) {
      return fail(ErrorKind.InvalidArgument, `rx buffer count ${rxBuffers} must be in 1..65535`);
    }
    const rxDma = options.options?.rxDma;
    if (rxDma) {
      if (!sdf.isLive(rxDma)) return fail(ErrorKind.UnknownEntity, `MR '${rxDma.name}' does not belong to this system`);
      if (rxDma.size < rxBuffers * NET_BUFFER_SIZE) {
        return fail(
          ErrorKind.InvalidArgument,
          `rx DMA region '${rxDma.name}' holds fewer than ${rxBuffers} buffers of ${NET_BUFFER_SIZE} bytes`,
        );
      }
    }
    return ok(new NetSystem(sdf, options));
  }

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return [this.driver, this.virtRx, this.virtTx];
  }

  /** MAC of every client, in client order. Generated addresses appear once connected. */
  macAddresses(): string[] {
    return this.clientList.map((c, i) => {
      const mac = c.mac ?? this.wired[i]?.mac;
      return mac ? formatMac(mac) : '';
    });
  }

  /**
   * Admit `pd` as a network client with its own RX copier.
   *
   * @param options - copier PD, optional MAC (generated when absent) and
   *                  whether the client transmits
   * @returns DuplicateClient for a repeated client, a shared copier or a MAC
   *          already in use; InvalidClient when the copier is a core PD,
   *          a client or the client itself
   * @see parseMac
   */
  addClient(pd: ProtectionDomain, options: NetClientOptions): Result {
    const { copier } = options;
    const checked = this.checkClient(pd);
    if (!checked.ok) return this.reject(pd, checked);
    if (!this.sdf.isLive(copier)) {
      return this.reject(pd, fail(ErrorKind.UnknownEntity, `copier '${copier.name}' has been destroyed`));
    }
    if (this.corePds().includes(copier)) {
      return this.reject(pd, fail(ErrorKind.InvalidClient, `'${copier.name}' is part of the network subsystem`));
    }
    if (copier === pd) {
      return this.reject(pd, fail(ErrorKind.InvalidClient, `'${pd.name}' cannot be its own copier`));
    }
    if (this.clientList.some((c) => c.copier === pd)) {
      return this.reject(pd, fail(ErrorKind.InvalidClient, `'${pd.name}' is already a copier`));
    }
    if (this.clientList.some((c) => c.pd === copier)) {
      return this.reject(pd, fail(ErrorKind.InvalidClient, `copier '${copier.name}' is already a client`));
    }
    const owner = this.clientList.find((c) => c.copier === copier);
    if (owner) {
      return this.reject(
        pd,
        fail(ErrorKind.DuplicateClient, `copier '${copier.name}' already serves '${owner.pd.name}'`),
      );
    }

    let mac: Uint8Array | undefined;
    if (options.macAddr !== undefined) {
      const parsed = parseMac(options.macAddr);
      if (!parsed.ok) return this.reject(pd, parsed);
      const text = formatMac(parsed.value);
      const clash = this.clientList.find((c) => c.mac && formatMac(c.mac) === text);
      if (clash) {
        return this.reject(
          pd,
          fail(ErrorKind.DuplicateClient, `MAC ${text} is already used by '${clash.pd.name}'`),
        );
      }
      mac = parsed.value;
    }

    const rxBuffers = options.rxBuffers ?? DEFAULT_BUFFERS;
    const txBuffers = options.txBuffers ?? DEFAULT_BUFFERS;
    if (!isBufferCount(rxBuffers) || !isBufferCount(txBuffers)) {
      return this.reject(pd, fail(ErrorKind.InvalidArgument, 'buffer counts must be in 1..65535'));
    }

    this.admit({ pd, copier, mac, rxBuffers, tx: options.tx ?? false, txBuffers });
    return ok();
  }

  private link(
    tx: Wiring,
    server: ProtectionDomain,
    client: ProtectionDomain,
    buffers: number,
  ): Result<Link> {
    const base = `${this.prefix()}/queue/${server.name}/${client.name}`;
    const free = tx.mr(`${base}/free`, queueSize(buffers));
    if (!free.ok) return free;
    const active = tx.mr(`${base}/active`, queueSize(buffers));
    if (!active.ok) return active;
    const serverFree = tx.map(server, free.value, 'rw');
    if (!serverFree.ok) return serverFree;
    const serverActive = tx.map(server, active.value, 'rw');
    if (!serverActive.ok) return serverActive;
    const clientFree = tx.map(client, free.value, 'rw');
    if (!clientFree.ok) return clientFree;
    const clientActive = tx.map(client, active.value, 'rw');
    if (!clientActive.ok) return clientActive;
    const channel = tx.channel(server, client);
    if (!channel.ok) return channel;
    return ok({
      server: {
        freeQueue: regionOf(serverFree.value),
        activeQueue: regionOf(serverActive.value),
        numBuffers: buffers,
        id: channel.value.endA,
      },
      client: {
        freeQueue: regionOf(clientFree.value),
        activeQueue: regionOf(clientActive.value),
        numBuffers: buffers,
        id: channel.value.endB,
      },
    });
  }

  private prefix(): string {
    return `${this.device?.name ?? this.driver.name}/net`;
  }

  /** Supplied MACs, plus generated ones for clients without. */
  private assignMacs(): Uint8Array[] {
    const taken = new Set(
      this.clientList.flatMap((c) => (c.mac ? [formatMac(c.mac)] : [])),
    );
    return this.clientList.map((c) => {
      if (c.mac) return c.mac;
      const generated = generateMac(c.pd.name, taken);
      taken.add(formatMac(generated));
      return generated;
    });
  }

  protected wire(tx: Wiring): Result {
    this.resources = NO_DEVICE;
    this.wired = [];
    const prefix = this.prefix();

    if (this.device) {
      const bound = bindDevice(tx, DeviceClass.Network, this.device, this.driver);
      if (!bound.ok) return bound;
      this.resources = bound.value;
    }

    const driverRx = this.link(tx, this.driver, this.virtRx, this.rxBuffers);
    if (!driverRx.ok) return driverRx;
    this.driverRx = driverRx.value;

    let rxDma = this.rxDma;
    if (!rxDma) {
      const created = tx.mr(`${prefix}/rx/data/device`, roundUp(this.rxBuffers * NET_BUFFER_SIZE, SMALL_PAGE));
      if (!created.ok) return created;
      rxDma = created.value;
    }
    const virtRxData = tx.map(this.virtRx, rxDma, 'r');
    if (!virtRxData.ok) return virtRxData;
    this.rxData = deviceRegionOf(virtRxData.value);
    const metadata = tx.mr(`${prefix}/rx/buffer_metadata`, roundUp(this.rxBuffers * 4, SMALL_PAGE));
    if (!metadata.ok) return metadata;
    const virtMetadata = tx.map(this.virtRx, metadata.value, 'rw');
    if (!virtMetadata.ok) return virtMetadata;
    this.rxMetadata = regionOf(virtMetadata.value);

    const txBuffers = this.clientList.reduce((sum, c) => sum + (c.tx ? c.txBuffers : 0), 0);
    const driverTx = this.link(tx, this.driver, this.virtTx, Math.min(txBuffers, 0xffff));
    if (!driverTx.ok) return driverTx;
    this.driverTx = driverTx.value;

    const macs = this.assignMacs();
    for (const [i, client] of this.clientList.entries()) {
      const virtToCopier = this.link(tx, this.virtRx, client.copier, client.rxBuffers);
      if (!virtToCopier.ok) return virtToCopier;
      const copierToClient = this.link(tx, client.copier, client.pd, client.rxBuffers);
      if (!copierToClient.ok) return copierToClient;
      const copierDevice = tx.map(client.copier, rxDma, 'r');
      if (!copierDevice.ok) return copierDevice;
      const clientData = tx.mr(
        `${prefix}/rx/data/client/${client.pd.name}`,
        roundUp(client.rxBuffers * NET_BUFFER_SIZE, SMALL_PAGE),
      );
      if (!clientData.ok) return clientData;
      const copierClientData = tx.map(client.copier, clientData.value, 'rw');
      if (!copierClientData.ok) return copierClientData;
      const rxData = tx.map(client.pd, clientData.value, 'rw');
      if (!rxData.ok) return rxData;

      let txWiring: ClientWiring['tx'] = undefined;
      if (client.tx) {
        const virtToClient = this.link(tx, this.virtTx, client.pd, client.txBuffers);
        if (!virtToClient.ok) return virtToClient;
        const txData = tx.mr(
          `${prefix}/tx/data/client/${client.pd.name}`,
          roundUp(client.txBuffers * NET_BUFFER_SIZE, SMALL_PAGE),
        );
        if (!txData.ok) return txData;
        const virtData = tx.map(this.virtTx, txData.value, 'r');
        if (!virtData.ok) return virtData;
        const clientTxData = tx.map(client.pd, txData.value, 'rw');
        if (!clientTxData.ok) return clientTxData;
        txWiring = {
          virt: virtToClient.value.server,
          virtData: deviceRegionOf(virtData.value),
          client: virtToClient.value.client,
          data: regionOf(clientTxData.value),
        };
      }

      this.wired.push({
        mac: macs[i] ?? new Uint8Array(6),
        virtRx: virtToCopier.value.server,
        copierRx: virtToCopier.value.client,
        copierDevice: regionOf(copierDevice.value),
        copierClient: copierToClient.value.server,
        copierClientData: regionOf(copierClientData.value),
        rx: copierToClient.value.client,
        rxData: regionOf(rxData.value),
        tx: txWiring,
      });
    }
    return ok();
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    const blobs: ConfigBlob[] = [
      {
        name: blobName(this.kind, 'driver', this.driver),
        data: encodeNetDriver(this.resources, {
          virtRx: this.driverRx?.server ?? EMPTY_NET_CONNECTION,
          virtTx: this.driverTx?.server ?? EMPTY_NET_CONNECTION,
        }),
      },
      {
        name: blobName(this.kind, 'virt_rx', this.virtRx),
        data: encodeNetVirtRx({
          driver: this.driverRx?.client ?? EMPTY_NET_CONNECTION,
          data: this.rxData,
          bufferMetadata: this.rxMetadata,
          clients: this.wired.map((w) => ({ conn: w.virtRx, mac: w.mac })),
        }),
      },
      {
        name: blobName(this.kind, 'virt_tx', this.virtTx),
        data: encodeNetVirtTx({
          driver: this.driverTx?.client ?? EMPTY_NET_CONNECTION,
          clients: this.wired.flatMap((w) => (w.tx ? [{ conn: w.tx.virt, data: w.tx.virtData }] : [])),
        }),
      },
    ];
    this.clientList.forEach((client, i) => {
      const w = this.wired[i];
      if (!w) return;
      blobs.push({
        name: blobName(this.kind, 'copy', client.copier),
        data: encodeNetCopy({
          virtRx: w.copierRx,
          deviceData: w.copierDevice,
          client: w.copierClient,
          clientData: w.copierClientData,
        }),
      });
      blobs.push({
        name: blobName(this.kind, 'client', client.pd),
        data: encodeNetClient({
          rx: w.rx,
          rxData: w.rxData,
          tx: w.tx?.client ?? EMPTY_NET_CONNECTION,
          txData: w.tx?.data ?? EMPTY_REGION,
          mac: w.mac,
        }),
      });
    });
    return blobs;
  }
}
