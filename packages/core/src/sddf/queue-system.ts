/**
 * sdfkit Core: Queue-Based Device Subsystems
 *
 * Block and GPU devices share one topology: driver <-> virtualiser over an
 * info region plus request/response queues, the same again between the
 * virtualiser and each client, and a data region per client that the
 * virtualiser can also reach.
 */

import type { DeviceNode } from '../dtb/device-tree.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { MemoryRegion } from '../graph/memory-region.js';
import {
  EMPTY_DEVICE_REGION,
  EMPTY_REGION,
  NO_DEVICE,
  deviceRegionOf,
  regionOf,
  type DeviceResources,
  type RegionResource,
} from '../config/common.js';
import {
  EMPTY_QUEUE_CONNECTION,
  encodeQueueClient,
  encodeQueueDriver,
  encodeQueueVirt,
  type QueueConnection,
  type VirtClientSide,
  type VirtDriverSide,
} from '../config/blk.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import type { DeviceClass } from './driver-catalog.js';
import { bindDevice } from './driver.js';
import { SubsystemBase, blobName, type ConfigBlob } from './subsystem.js';

export interface QueueClient {
  readonly pd: ProtectionDomain;
  readonly queueCapacity: number;
  readonly dataSize: number;
  readonly partition: number;
}

export interface QueueSystemOptions {
  readonly driver: ProtectionDomain;
  readonly virt: ProtectionDomain;
  readonly device?: DeviceNode | undefined;
}

interface Regions {
  readonly info: MemoryRegion;
  readonly request: MemoryRegion;
  readonly response: MemoryRegion;
}

export abstract class QueueSystem extends SubsystemBase<QueueClient> {
  readonly driver: ProtectionDomain;
  readonly virt: ProtectionDomain;
  readonly device: DeviceNode | undefined;
  protected abstract readonly deviceClass: DeviceClass;
  /** Name of the info region: `storage_info` or `events`. */
  protected abstract readonly infoRegion: string;
  protected abstract readonly infoSize: number;
  protected abstract readonly driverDataSize: number;
  /** Whether the virtualiser config carries per-client partitions. */
  protected abstract readonly partitioned: boolean;
  private resources: DeviceResources = NO_DEVICE;
  private driverSide: QueueConnection = EMPTY_QUEUE_CONNECTION;
  private virtDriver: VirtDriverSide = { conn: EMPTY_QUEUE_CONNECTION, data: EMPTY_DEVICE_REGION };
  private virtClients: VirtClientSide[] = [];
  private clientSides: Array<{ conn: QueueConnection; data: RegionResource }> = [];

  protected constructor(sdf: SystemDescription, options: QueueSystemOptions) {
    super(sdf);
    this.driver = options.driver;
    this.virt = options.virt;
    this.device = options.device;
  }

  protected static check(sdf: SystemDescription, options: QueueSystemOptions, label: string): Result {
    if (options.driver === options.virt) {
      return fail(ErrorKind.InvalidArgument, `${label} driver and virtualiser must be distinct PDs`);
    }
    for (const pd of [options.driver, options.virt]) {
      if (!sdf.isLive(pd)) return fail(ErrorKind.UnknownEntity, `${label} PD '${pd.name}' has been destroyed`);
    }
    return ok();
  }

  /** Size of each request/response queue region for `capacity` entries. */
  protected abstract queueSize(capacity: number): number;

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return [this.driver, this.virt];
  }

  protected addQueueClient(client: QueueClient): Result {
    const checked = this.checkClient(client.pd);
    if (!checked.ok) return this.reject(client.pd, checked);
    if (!Number.isSafeInteger(client.queueCapacity) || client.queueCapacity <= 0 || client.queueCapacity > 0xffff) {
      return this.reject(
        client.pd,
        fail(ErrorKind.InvalidArgument, `queue capacity ${client.queueCapacity} must be in 1..65535`),
      );
    }
    if (!Number.isSafeInteger(client.dataSize) || client.dataSize <= 0 || client.dataSize % 0x1000 !== 0) {
      return this.reject(
        client.pd,
        fail(ErrorKind.InvalidArgument, `data size ${client.dataSize} must be a positive multiple of 0x1000`),
      );
    }
    if (!Number.isSafeInteger(client.partition) || client.partition < 0 || client.partition > 0xffffffff) {
      return this.reject(
        client.pd,
        fail(ErrorKind.InvalidArgument, `partition ${client.partition} must be a non-negative 32-bit integer`),
      );
    }
    this.admit(client);
    return ok();
  }

  private regions(tx: Wiring, base: string, capacity: number): Result<Regions> {
    const info = tx.mr(`${base}/${this.infoRegion}`, this.infoSize);
    if (!info.ok) return info;
    const request = tx.mr(`${base}/request`, this.queueSize(capacity));
    if (!request.ok) return request;
    const response = tx.mr(`${base}/response`, this.queueSize(capacity));
    if (!response.ok) return response;
    return ok({ info: info.value, request: request.value, response: response.value });
  }

  private side(tx: Wiring, pd: ProtectionDomain, regions: Regions, id: number, capacity: number): Result<QueueConnection> {
    const info = tx.map(pd, regions.info, 'rw');
    if (!info.ok) return info;
    const request = tx.map(pd, regions.request, 'rw');
    if (!request.ok) return request;
    const response = tx.map(pd, regions.response, 'rw');
    if (!response.ok) return response;
    return ok({
      info: regionOf(info.value),
      requestQueue: regionOf(request.value),
      responseQueue: regionOf(response.value),
      numBuffers: capacity,
      id,
    });
  }

  protected wire(tx: Wiring): Result {
    this.resources = NO_DEVICE;
    this.virtClients = [];
    this.clientSides = [];
    const prefix = `${this.device?.name ?? this.driver.name}/${this.kind}`;

    if (this.device) {
      const bound = bindDevice(tx, this.deviceClass, this.device, this.driver);
      if (!bound.ok) return bound;
      this.resources = bound.value;
    }

    const total = Math.min(
      0xffff,
      this.clientList.reduce((sum, c) => sum + c.queueCapacity, 0),
    );
    const driverRegions = this.regions(tx, `${prefix}/driver`, Math.max(total, 1));
    if (!driverRegions.ok) return driverRegions;
    const driverChannel = tx.channel(this.driver, this.virt);
    if (!driverChannel.ok) return driverChannel;
    const driverSide = this.side(tx, this.driver, driverRegions.value, driverChannel.value.endA, total);
    if (!driverSide.ok) return driverSide;
    const virtSide = this.side(tx, this.virt, driverRegions.value, driverChannel.value.endB, total);
    if (!virtSide.ok) return virtSide;
    const driverData = tx.mr(`${prefix}/driver/data`, this.driverDataSize);
    if (!driverData.ok) return driverData;
    const virtData = tx.map(this.virt, driverData.value, 'rw');
    if (!virtData.ok) return virtData;
    this.driverSide = driverSide.value;
    this.virtDriver = { conn: virtSide.value, data: deviceRegionOf(virtData.value) };

    for (const client of this.clientList) {
      const base = `${prefix}/client/${client.pd.name}`;
      const regions = this.regions(tx, base, client.queueCapacity);
      if (!regions.ok) return regions;
      const channel = tx.channel(this.virt, client.pd);
      if (!channel.ok) return channel;
      const virtConn = this.side(tx, this.virt, regions.value, channel.value.endA, client.queueCapacity);
      if (!virtConn.ok) return virtConn;
      const clientConn = this.side(tx, client.pd, regions.value, channel.value.endB, client.queueCapacity);
      if (!clientConn.ok) return clientConn;
      const data = tx.mr(`${base}/data`, client.dataSize);
      if (!data.ok) return data;
      const virtMap = tx.map(this.virt, data.value, 'rw');
      if (!virtMap.ok) return virtMap;
      const clientMap = tx.map(client.pd, data.value, 'rw');
      if (!clientMap.ok) return clientMap;
      this.virtClients.push({ conn: virtConn.value, data: deviceRegionOf(virtMap.value), partition: client.partition });
      this.clientSides.push({ conn: clientConn.value, data: regionOf(clientMap.value) });
    }
    return ok();
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    return [
      { name: blobName(this.kind, 'driver', this.driver), data: encodeQueueDriver(this.resources, this.driverSide) },
      {
        name: blobName(this.kind, 'virt', this.virt),
        data: encodeQueueVirt({ driver: this.virtDriver, clients: this.virtClients }, this.partitioned),
      },
      ...this.clientList.map((client, i) => {
        const side = this.clientSides[i];
        return {
          name: blobName(this.kind, 'client', client.pd),
          data: encodeQueueClient({ virt: side?.conn ?? EMPTY_QUEUE_CONNECTION, data: side?.data ?? EMPTY_REGION }),
        };
      }),
    ];
  }
}
