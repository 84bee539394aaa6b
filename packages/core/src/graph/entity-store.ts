/**
 * sdfkit Core: Entity Store
 *
 * Owns every entity created in one system-description session, indexed by a
 * monotonically issued integer id. Ids are never reused, so a reference to a
 * destroyed entity resolves to nothing rather than to a newer entity.
 */

import type { Channel } from './channel.js';
import type { MemoryRegion } from './memory-region.js';
import type { ProtectionDomain } from './protection-domain.js';
import type { VirtualMachine } from './virtual-machine.js';

export type Entity = ProtectionDomain | MemoryRegion | VirtualMachine | Channel;

export class EntityStore {
  private nextId = 1;
  private readonly entities = new Map<number, Entity>();

  /** Reserve the id for an entity about to be constructed. */
  issue(): number {
    return this.nextId++;
  }

  put(entity: Entity): void {
    this.entities.set(entity.id, entity);
  }

  retire(id: number): void {
    this.entities.delete(id);
  }

  has(entity: Entity): boolean {
    return this.entities.get(entity.id) === entity;
  }

  resolve<T extends Entity>(
    id: number,
    kind: abstract new (...args: never[]) => T,
  ): T | undefined {
    const entity = this.entities.get(id);
    return entity instanceof kind ? entity : undefined;
  }

  get size(): number {
    return this.entities.size;
  }
}
