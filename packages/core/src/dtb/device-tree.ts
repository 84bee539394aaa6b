/**
 * sdfkit Core: Device Tree Collaborator Interface
 *
 * The core never parses device trees. A collaborator resolves nodes and
 * exposes their resources through these accessors; register addresses are
 * already translated to physical addresses and interrupts to the numbers
 * the kernel expects for the target architecture.
 */

import type { IrqTrigger } from '../graph/irq.js';

export interface DeviceRegister {
  readonly paddr: number;
  readonly size: number;
}

export interface DeviceInterrupt {
  readonly irq: number;
  readonly trigger: IrqTrigger;
}

export interface DeviceNode {
  readonly name: string;
  compatible(): ReadonlyArray<string>;
  /** The node's `status` property, undefined when absent. */
  status(): string | undefined;
  registers(): ReadonlyArray<DeviceRegister>;
  interrupts(): ReadonlyArray<DeviceInterrupt>;
}

export interface DeviceTree {
  lookup(path: string): DeviceNode | undefined;
}

export function isEnabled(node: DeviceNode): boolean {
  const status = node.status();
  return status === undefined || status === 'okay' || status === 'ok';
}
