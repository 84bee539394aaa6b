/**
 * sdfkit Core: Timer Subsystem
 *
 * A timer driver serves its clients directly; there is no virtualiser.
 * Clients call into the driver, so the driver runs passive and every
 * client must run at a lower priority than it.
 */

import type { DeviceNode } from '../dtb/device-tree.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import { NO_DEVICE, type DeviceResources } from '../config/common.js';
import { encodeTimerClient, encodeTimerDriver } from '../config/timer.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';
import { DeviceClass } from './driver-catalog.js';
import { bindDevice } from './driver.js';
import { SubsystemBase, blobName, type ConfigBlob } from './subsystem.js';

export interface TimerClient {
  readonly pd: ProtectionDomain;
}

export interface TimerSystemOptions {
  readonly driver: ProtectionDomain;
  readonly device?: DeviceNode | undefined;
}

export class TimerSystem extends SubsystemBase<TimerClient> {
  readonly kind = 'timer';
  readonly driver: ProtectionDomain;
  readonly device: DeviceNode | undefined;
  private resources: DeviceResources = NO_DEVICE;
  private clientIds: number[] = [];

  private constructor(sdf: SystemDescription, options: TimerSystemOptions) {
    super(sdf);
    this.driver = options.driver;
    this.device = options.device;
  }

  static create(sdf: SystemDescription, options: TimerSystemOptions): Result<TimerSystem> {
    if (!sdf.isLive(options.driver)) {
      return fail(ErrorKind.UnknownEntity, `timer driver '${options.driver.name}' has been destroyed`);
    }
    options.driver.setPassive(true);
    return ok(new TimerSystem(sdf, options));
  }

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return [this.driver];
  }

  private checkPriority(pd: ProtectionDomain): Result {
    if (pd.effectivePriority >= this.driver.effectivePriority) {
      return fail(
        ErrorKind.InvalidClient,
        `timer client '${pd.name}' (priority ${pd.effectivePriority}) must run below ` +
          `driver '${this.driver.name}' (priority ${this.driver.effectivePriority})`,
      );
    }
    return ok();
  }

  /**
   * Admit `pd` as a timer client.
   *
   * @returns InvalidClient when `pd` does not run below the driver's
   *          priority; DuplicateClient for a repeat
   */
  addClient(pd: ProtectionDomain): Result {
    const checked = this.checkClient(pd);
    if (!checked.ok) return this.reject(pd, checked);
    const priority = this.checkPriority(pd);
    if (!priority.ok) return this.reject(pd, priority);
    this.admit({ pd });
    return ok();
  }

  protected wire(tx: Wiring): Result {
    this.resources = NO_DEVICE;
    this.clientIds = [];
    for (const client of this.clientList) {
      const priority = this.checkPriority(client.pd);
      if (!priority.ok) return priority;
    }
    if (this.device) {
      const bound = bindDevice(tx, DeviceClass.Timer, this.device, this.driver);
      if (!bound.ok) return bound;
      this.resources = bound.value;
    }
    for (const client of this.clientList) {
      const channel = tx.channel(this.driver, client.pd, { pp: 'b', notifyB: false });
      if (!channel.ok) return channel;
      this.clientIds.push(channel.value.endB);
    }
    return ok();
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    return [
      { name: blobName(this.kind, 'driver', this.driver), data: encodeTimerDriver(this.resources) },
      ...this.clientList.map((client, i) => ({
        name: blobName(this.kind, 'client', client.pd),
        data: encodeTimerClient({ driverId: this.clientIds[i] ?? 0 }),
      })),
    ];
  }
}
