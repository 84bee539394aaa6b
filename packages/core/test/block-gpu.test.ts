/**
 * sdfkit Core: Block and GPU Subsystem Tests
 *
 *   BLK-U1: client queue capacity, data size and partition are validated
 *   BLK-U2: queue regions are sized from capacity; the driver side from the sum
 *   BLK-U3: the virtualiser blob records each client's partition
 *   BLK-U4: the client blob describes its queues and data region
 *   GPU-U1: GPU connections use an events region and fixed-size queues
 *   GPU-U2: the GPU virtualiser blob carries no partitions
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BlockSystem,
  ErrorKind,
  GpuSystem,
  type ProtectionDomain,
  type SystemDescription,
} from '../src/index.js';
import { MemoryBlobSink, addPd, errorOf, newSystem, unwrap } from './fixtures.js';

let sdf: SystemDescription;
let driver: ProtectionDomain;
let virt: ProtectionDomain;

beforeEach(() => {
  sdf = newSystem();
  driver = addPd(sdf, 'blk_driver', { priority: 200 });
  virt = addPd(sdf, 'blk_virt', { priority: 199 });
});

function connectedBlock(): BlockSystem {
  const blk = unwrap(BlockSystem.create(sdf, { driver, virt }));
  unwrap(blk.addClient(addPd(sdf, 'client1'), { partition: 0 }));
  unwrap(blk.addClient(addPd(sdf, 'client2'), { partition: 3 }));
  unwrap(blk.connect());
  return blk;
}

describe('BlockSystem', () => {
  it('BLK-U1: validates client options', () => {
    const blk = unwrap(BlockSystem.create(sdf, { driver, virt }));
    const client = addPd(sdf, 'client');
    expect(errorOf(blk.addClient(client, { partition: 0, queueCapacity: 0 }))).toBe(ErrorKind.InvalidArgument);
    expect(errorOf(blk.addClient(client, { partition: 0, queueCapacity: 0x10000 }))).toBe(
      ErrorKind.InvalidArgument,
    );
    expect(errorOf(blk.addClient(client, { partition: 0, dataSize: 0x800 }))).toBe(ErrorKind.InvalidArgument);
    expect(errorOf(blk.addClient(client, { partition: -1 }))).toBe(ErrorKind.InvalidArgument);
    expect(errorOf(blk.addClient(virt, { partition: 0 }))).toBe(ErrorKind.InvalidClient);
    unwrap(blk.addClient(client, { partition: 0 }));
    expect(blk.clients).toEqual([{ pd: client, partition: 0, queueCapacity: 128, dataSize: 0x200000 }]);
  });

  it('BLK-U1: the driver and virtualiser must differ', () => {
    expect(errorOf(BlockSystem.create(sdf, { driver, virt: driver }))).toBe(ErrorKind.InvalidArgument);
  });

  it('BLK-U2: sizes queues from capacity', () => {
    connectedBlock();
    expect(sdf.findMr('blk_driver/blk/driver/request')?.size).toBe(0x8000);
    expect(sdf.findMr('blk_driver/blk/driver/data')?.size).toBe(0xa000);
    expect(sdf.findMr('blk_driver/blk/client/client1/request')?.size).toBe(0x4000);
    expect(sdf.findMr('blk_driver/blk/client/client1/storage_info')?.size).toBe(0x1000);
    expect(sdf.channels).toHaveLength(3);
  });

  it('BLK-U3: the virtualiser blob records partitions', () => {
    const blk = connectedBlock();
    const sink = new MemoryBlobSink();
    expect(unwrap(blk.serializeConfig(sink))).toEqual([
      'blk_driver_blk_driver.data',
      'blk_virt_blk_virt.data',
      'blk_client_client1.data',
      'blk_client_client2.data',
    ]);

    const blob = sink.get('blk_virt_blk_virt.data');
    expect(blob).toHaveLength(5456);
    expect(blob.readUInt16LE(48)).toBe(256);
    expect(blob[80]).toBe(2);
    expect(blob.readUInt16LE(136)).toBe(128);
    expect(blob[138]).toBe(1);
    expect(blob.readUInt32LE(168)).toBe(0);
    expect(blob[226]).toBe(2);
    expect(blob.readUInt32LE(256)).toBe(3);
  });

  it('BLK-U4: the client blob describes its connection', () => {
    const blk = connectedBlock();
    const sink = new MemoryBlobSink();
    unwrap(blk.serializeConfig(sink));

    const blob = sink.get('blk_client_client1.data');
    expect(blob).toHaveLength(72);
    expect(blob.readBigUInt64LE(0)).toBe(BigInt(0x10000000));
    expect(blob.readBigUInt64LE(16)).toBe(BigInt(0x10001000));
    expect(blob.readBigUInt64LE(32)).toBe(BigInt(0x10005000));
    expect(blob.readUInt16LE(48)).toBe(128);
    expect(blob[50]).toBe(0);
    expect(blob.readBigUInt64LE(56)).toBe(BigInt(0x10009000));
    expect(blob.readBigUInt64LE(64)).toBe(BigInt(0x200000));
  });
});

describe('GpuSystem', () => {
  it('GPU-U1: uses an events region and 2 MiB queues', () => {
    const gpu = unwrap(GpuSystem.create(sdf, { driver, virt }));
    unwrap(gpu.addClient(addPd(sdf, 'ui')));
    unwrap(gpu.connect());

    expect(sdf.findMr('blk_driver/gpu/client/ui/events')?.size).toBe(0x1000);
    expect(sdf.findMr('blk_driver/gpu/client/ui/request')?.size).toBe(0x200000);
    expect(sdf.findMr('blk_driver/gpu/driver/data')?.size).toBe(0x200000);
    expect(gpu.clients[0]?.queueCapacity).toBe(1024);
  });

  it('GPU-U2: the virtualiser blob has 80-byte client entries', () => {
    const gpu = unwrap(GpuSystem.create(sdf, { driver, virt }));
    unwrap(gpu.addClient(addPd(sdf, 'ui')));
    unwrap(gpu.connect());
    const sink = new MemoryBlobSink();

    expect(unwrap(gpu.serializeConfig(sink))).toEqual([
      'gpu_driver_blk_driver.data',
      'gpu_virt_blk_virt.data',
      'gpu_client_ui.data',
    ]);
    const blob = sink.get('gpu_virt_blk_virt.data');
    expect(blob).toHaveLength(4968);
    expect(blob[80]).toBe(1);
    expect(blob.readUInt16LE(136)).toBe(1024);
  });
});
