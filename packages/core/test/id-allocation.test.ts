/**
 * sdfkit Core: Local Id Allocation Tests
 *
 *   ID-U1: ids are handed out lowest-first
 *   ID-U2: a released id is reused before higher ids
 *   ID-U3: a fixed id that is taken fails with IdConflict
 *   ID-U4: the 63rd allocation fails with IdExhausted
 *   ID-U5: channels and IRQs share one id space per PD
 *   ID-U6: a failed channel leaves no id allocated on either end
 */

import { describe, it, expect } from 'vitest';
import { ErrorKind, IdAllocator, IrqTrigger, MAX_IDS } from '../src/index.js';
import { addPd, errorOf, newSystem, unwrap } from './fixtures.js';

describe('IdAllocator', () => {
  it('ID-U1: allocates 0, 1, 2 in order', () => {
    const ids = new IdAllocator('test ids');
    expect([ids.allocate(), ids.allocate(), ids.allocate()].map(unwrap)).toEqual([0, 1, 2]);
    expect(ids.allocatedCount).toBe(3);
  });

  it('ID-U2: reuses the lowest released id first', () => {
    const ids = new IdAllocator('test ids');
    for (let i = 0; i < 5; i++) unwrap(ids.allocate());
    ids.release(3);
    ids.release(1);
    expect(unwrap(ids.allocate())).toBe(1);
    expect(unwrap(ids.allocate())).toBe(3);
    expect(unwrap(ids.allocate())).toBe(5);
  });

  it('ID-U3: a fixed id can be taken once', () => {
    const ids = new IdAllocator('test ids');
    expect(unwrap(ids.allocate(7))).toBe(7);
    expect(errorOf(ids.allocate(7))).toBe(ErrorKind.IdConflict);
    expect(errorOf(ids.allocate(MAX_IDS))).toBe(ErrorKind.InvalidArgument);
    // free ids below the fixed one are still handed out first
    expect(unwrap(ids.allocate())).toBe(0);
  });

  it('ID-U4: the id space holds exactly 62 ids', () => {
    const ids = new IdAllocator('test ids');
    for (let i = 0; i < MAX_IDS; i++) unwrap(ids.allocate());
    expect(errorOf(ids.allocate())).toBe(ErrorKind.IdExhausted);
    ids.release(40);
    expect(unwrap(ids.allocate())).toBe(40);
  });
});

describe('protection domain id space', () => {
  it('ID-U5: IRQs and channel ends draw from the same ids', () => {
    const sdf = newSystem();
    const driver = addPd(sdf, 'driver');
    const client = addPd(sdf, 'client');

    const irq = unwrap(driver.addIrq({ irq: 27, trigger: IrqTrigger.Level }));
    const channel = unwrap(sdf.createChannel(driver, client));

    expect(irq.id).toBe(0);
    expect(channel.endA).toBe(1);
    expect(channel.endB).toBe(0);
  });

  it('ID-U6: a channel whose second end fails releases the first', () => {
    const sdf = newSystem();
    const a = addPd(sdf, 'a');
    const b = addPd(sdf, 'b');
    unwrap(b.addIrq({ irq: 5, trigger: IrqTrigger.Edge, id: 4 }));

    const failed = sdf.createChannel(a, b, { idA: 2, idB: 4 });

    expect(errorOf(failed)).toBe(ErrorKind.IdConflict);
    expect(a.channelIds.isAllocated(2)).toBe(false);
    expect(a.channelIds.allocatedCount).toBe(0);
  });
});
