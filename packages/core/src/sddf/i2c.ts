/**
 * sdfkit Core: I2C Subsystem
 *
 * driver <-> virtualiser <-> clients. Each client owns request, response
 * and data regions; the data region is also mapped into the driver so it
 * can move bytes without a copy through the virtualiser.
 */

import type { DeviceNode } from '../dtb/device-tree.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import { EMPTY_REGION, NO_DEVICE, regionOf, type DeviceResources, type RegionResource } from '../config/common.js';
import {
  EMPTY_I2C_CONNECTION,
  encodeI2cClient,
  encodeI2cDriver,
  encodeI2cVirt,
  type I2cConnection,
  type I2cVirtClient,
} from '../config/i2c.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import { DeviceClass } from './driver-catalog.js';
import { bindDevice } from './driver.js';
import { SubsystemBase, blobName, type ConfigBlob } from './subsystem.js';

export interface I2cOptions {
  readonly requestRegionSize?: number;
  readonly responseRegionSize?: number;
  readonly dataRegionSize?: number;
  readonly numBuffers?: number;
}

export interface I2cSystemOptions {
  readonly driver: ProtectionDomain;
  readonly virt: ProtectionDomain;
  readonly device?: DeviceNode | undefined;
  readonly options?: I2cOptions;
}

export interface I2cClient {
  readonly pd: ProtectionDomain;
}

const DEFAULTS: Required<I2cOptions> = {
  requestRegionSize: 0x1000,
  responseRegionSize: 0x1000,
  dataRegionSize: 0x1000,
  numBuffers: 128,
};

export class I2cSystem extends SubsystemBase<I2cClient> {
  readonly kind = 'i2c';
  readonly driver: ProtectionDomain;
  readonly virt: ProtectionDomain;
  readonly device: DeviceNode | undefined;
  readonly options: Required<I2cOptions>;
  private resources: DeviceResources = NO_DEVICE;
  private driverSide: I2cConnection = EMPTY_I2C_CONNECTION;
  private virtSide: I2cConnection = EMPTY_I2C_CONNECTION;
  private virtClients: I2cVirtClient[] = [];
  private clientSides: Array<{ conn: I2cConnection; data: RegionResource }> = [];

  private constructor(sdf: SystemDescription, options: I2cSystemOptions) {
    super(sdf);
    this.driver = options.driver;
    this.virt = options.virt;
    this.device = options.device;
    this.options = { ...DEFAULTS, ...options.options };
  }

  static create(sdf: SystemDescription, options: I2cSystemOptions): Result<I2cSystem> {
    if (options.driver === options.virt) {
      return fail(ErrorKind.InvalidArgument, 'I2C driver and virtualiser must be distinct PDs');
    }
    for (const pd of [options.driver, options.virt]) {
      if (!sdf.isLive(pd)) return fail(ErrorKind.UnknownEntity, `I2C PD '${pd.name}' has been destroyed`);
    }
    return ok(new I2cSystem(sdf, options));
  }

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return [this.driver, this.virt];
  }

  /**
   * Admit `pd` as a client of the I2C virtualiser. Its channel to the
   * virtualiser is a protected-procedure call.
   *
   * @returns DuplicateClient when `pd` is already a client; InvalidClient
   *          for the driver or virtualiser; InvalidState once connected
   */
  addClient(pd: ProtectionDomain): Result {
    const checked = this.checkClient(pd);
    if (!checked.ok) return this.reject(pd, checked);
    this.admit({ pd });
    return ok();
  }

  protected wire(tx: Wiring): Result {
    this.resources = NO_DEVICE;
    this.virtClients = [];
    this.clientSides = [];
    const prefix = `${this.device?.name ?? this.driver.name}/i2c`;
    const { requestRegionSize, responseRegionSize, dataRegionSize, numBuffers } = this.options;

    if (this.device) {
      const bound = bindDevice(tx, DeviceClass.I2c, this.device, this.driver);
      if (!bound.ok) return bound;
      this.resources = bound.value;
    }

    const request = tx.mr(`${prefix}/driver/request`, requestRegionSize);
    if (!request.ok) return request;
    const response = tx.mr(`${prefix}/driver/response`, responseRegionSize);
    if (!response.ok) return response;
    const driverReq = tx.map(this.driver, request.value, 'rw');
    if (!driverReq.ok) return driverReq;
    const driverResp = tx.map(this.driver, response.value, 'rw');
    if (!driverResp.ok) return driverResp;
    const virtReq = tx.map(this.virt, request.value, 'rw');
    if (!virtReq.ok) return virtReq;
    const virtResp = tx.map(this.virt, response.value, 'rw');
    if (!virtResp.ok) return virtResp;
    const driverChannel = tx.channel(this.driver, this.virt);
    if (!driverChannel.ok) return driverChannel;
    this.driverSide = {
      requestQueue: regionOf(driverReq.value),
      responseQueue: regionOf(driverResp.value),
      numBuffers,
      id: driverChannel.value.endA,
    };
    this.virtSide = {
      requestQueue: regionOf(virtReq.value),
      responseQueue: regionOf(virtResp.value),
      numBuffers,
      id: driverChannel.value.endB,
    };

    for (const { pd } of this.clientList) {
      const base = `${prefix}/client/${pd.name}`;
      const req = tx.mr(`${base}/request`, requestRegionSize);
      if (!req.ok) return req;
      const resp = tx.mr(`${base}/response`, responseRegionSize);
      if (!resp.ok) return resp;
      const data = tx.mr(`${base}/data`, dataRegionSize);
      if (!data.ok) return data;

      const driverData = tx.map(this.driver, data.value, 'rw');
      if (!driverData.ok) return driverData;
      const vReq = tx.map(this.virt, req.value, 'rw');
      if (!vReq.ok) return vReq;
      const vResp = tx.map(this.virt, resp.value, 'rw');
      if (!vResp.ok) return vResp;
      const cReq = tx.map(pd, req.value, 'rw');
      if (!cReq.ok) return cReq;
      const cResp = tx.map(pd, resp.value, 'rw');
      if (!cResp.ok) return cResp;
      const cData = tx.map(pd, data.value, 'rw');
      if (!cData.ok) return cData;

      const channel = tx.channel(this.virt, pd, { pp: 'b' });
      if (!channel.ok) return channel;
      this.virtClients.push({
        conn: {
          requestQueue: regionOf(vReq.value),
          responseQueue: regionOf(vResp.value),
          numBuffers,
          id: channel.value.endA,
        },
        dataSize: dataRegionSize,
        driverDataVaddr: driverData.value.vaddr,
        clientDataVaddr: cData.value.vaddr,
      });
      this.clientSides.push({
        conn: {
          requestQueue: regionOf(cReq.value),
          responseQueue: regionOf(cResp.value),
          numBuffers,
          id: channel.value.endB,
        },
        data: regionOf(cData.value),
      });
    }
    return ok();
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    return [
      { name: blobName(this.kind, 'driver', this.driver), data: encodeI2cDriver(this.resources, this.driverSide) },
      {
        name: blobName(this.kind, 'virt', this.virt),
        data: encodeI2cVirt({ driver: this.virtSide, clients: this.virtClients }),
      },
      ...this.clientList.map((client, i) => {
        const side = this.clientSides[i];
        return {
          name: blobName(this.kind, 'client', client.pd),
          data: encodeI2cClient({ virt: side?.conn ?? EMPTY_I2C_CONNECTION, data: side?.data ?? EMPTY_REGION }),
        };
      }),
    ];
  }
}
