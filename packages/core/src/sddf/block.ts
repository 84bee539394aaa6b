/**
 * sdfkit Core: Block Subsystem
 *
 * Clients name the partition they use; several clients may share one.
 */

import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { SystemDescription } from '../system/system-description.js';
import { SMALL_PAGE, roundUp } from '../types/arch.js';
import { ok, type Result } from '../types/result.js';
import { DeviceClass } from './driver-catalog.js';
import { QueueSystem, type QueueSystemOptions } from './queue-system.js';

export interface BlockClientOptions {
  readonly partition: number;
  readonly queueCapacity?: number;
  readonly dataSize?: number;
}

/** Bytes per request/response queue entry. */
const QUEUE_ENTRY_SIZE = 128;

export class BlockSystem extends QueueSystem {
  readonly kind = 'blk';
  protected readonly deviceClass = DeviceClass.Blk;
  protected readonly infoRegion = 'storage_info';
  protected readonly infoSize = 0x1000;
  protected readonly driverDataSize = 10 * SMALL_PAGE;
  protected readonly partitioned = true;

  private constructor(sdf: SystemDescription, options: QueueSystemOptions) {
    super(sdf, options);
  }

  static create(sdf: SystemDescription, options: QueueSystemOptions): Result<BlockSystem> {
    const checked = QueueSystem.check(sdf, options, 'block');
    if (!checked.ok) return checked;
    return ok(new BlockSystem(sdf, options));
  }

  protected queueSize(capacity: number): number {
    return roundUp(capacity * QUEUE_ENTRY_SIZE, SMALL_PAGE);
  }

  /**
   * Admit `pd` as a client of one partition.
   *
   * @param options - partition index, optional queue capacity and data size
   * @returns DuplicateClient when `pd` is already a client; InvalidArgument
   *          for an out-of-range capacity, data size or partition
   */
  addClient(pd: ProtectionDomain, options: BlockClientOptions): Result {
    return this.addQueueClient({
      pd,
      partition: options.partition,
      queueCapacity: options.queueCapacity ?? 128,
      dataSize: options.dataSize ?? 0x200000,
    });
  }
}
