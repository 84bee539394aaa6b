/**
 * sdfkit Core: Interrupts
 */

export enum IrqTrigger {
  Edge = 'edge',
  Level = 'level',
}

export interface IrqOptions {
  readonly irq: number;
  readonly trigger: IrqTrigger;
  /** Fixed id in the PD's channel id space. */
  readonly id?: number;
}

/** A hardware interrupt bound into a PD under a local id. */
export interface Irq {
  readonly irq: number;
  readonly trigger: IrqTrigger;
  readonly id: number;
}

export function parseTrigger(value: string): IrqTrigger | undefined {
  if (value === 'edge') return IrqTrigger.Edge;
  if (value === 'level') return IrqTrigger.Level;
  return undefined;
}
