/**
 * sdfkit Core: GPU Subsystem
 */

import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { SystemDescription } from '../system/system-description.js';
import { ok, type Result } from '../types/result.js';
import { DeviceClass } from './driver-catalog.js';
import { QueueSystem, type QueueSystemOptions } from './queue-system.js';

export interface GpuClientOptions {
  readonly queueCapacity?: number;
  readonly dataSize?: number;
}

const GPU_REGION_SIZE = 0x200000;

export class GpuSystem extends QueueSystem {
  readonly kind = 'gpu';
  protected readonly deviceClass = DeviceClass.Gpu;
  protected readonly infoRegion = 'events';
  protected readonly infoSize = 0x1000;
  protected readonly driverDataSize = GPU_REGION_SIZE;
  protected readonly partitioned = false;

  private constructor(sdf: SystemDescription, options: QueueSystemOptions) {
    super(sdf, options);
  }

  static create(sdf: SystemDescription, options: QueueSystemOptions): Result<GpuSystem> {
    const checked = QueueSystem.check(sdf, options, 'GPU');
    if (!checked.ok) return checked;
    return ok(new GpuSystem(sdf, options));
  }

  protected queueSize(): number {
    return GPU_REGION_SIZE;
  }

  /**
   * Admit `pd` as a GPU client.
   *
   * @returns DuplicateClient when `pd` is already a client; InvalidState
   *          once connected
   */
  addClient(pd: ProtectionDomain, options: GpuClientOptions = {}): Result {
    return this.addQueueClient({
      pd,
      partition: 0,
      queueCapacity: options.queueCapacity ?? 1024,
      dataSize: options.dataSize ?? GPU_REGION_SIZE,
    });
  }
}
