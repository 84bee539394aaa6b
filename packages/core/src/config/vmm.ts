/**
 * sdfkit Core: VMM Config Layout
 */

import { StructWriter } from './struct-writer.js';

export const VMM_NAME_LEN = 64;
export const MAX_VMM_VCPUS = 16;
export const MAX_PASSTHROUGH_REGIONS = 64;
export const MAX_PASSTHROUGH_IRQS = 64;

export interface GuestRam {
  readonly guestPaddr: number;
  readonly size: number;
  /** Where the VMM sees guest RAM. */
  readonly vmmVaddr: number;
}

export interface PassthroughRegion {
  readonly guestPaddr: number;
  readonly size: number;
}

export interface PassthroughIrq {
  /** Channel id the VMM receives the interrupt on. */
  readonly id: number;
  readonly irq: number;
}

export interface VmmConfig {
  readonly vmName: string;
  readonly ram: GuestRam;
  readonly vcpus: ReadonlyArray<number>;
  readonly regions: ReadonlyArray<PassthroughRegion>;
  readonly irqs: ReadonlyArray<PassthroughIrq>;
}

const EMPTY_PASSTHROUGH_REGION: PassthroughRegion = { guestPaddr: 0, size: 0 };
const EMPTY_PASSTHROUGH_IRQ: PassthroughIrq = { id: 0, irq: 0 };

export function encodeVmm(config: VmmConfig): Uint8Array {
  const w = new StructWriter();
  w.struct(8, () => {
    w.cstring(config.vmName, VMM_NAME_LEN);
    w.u64(config.ram.guestPaddr).u64(config.ram.size).u64(config.ram.vmmVaddr);
    w.u8(config.vcpus.length);
    w.array(config.vcpus, MAX_VMM_VCPUS, 0, (out, id) => out.u8(id));
    w.u8(config.regions.length);
    w.array(config.regions, MAX_PASSTHROUGH_REGIONS, EMPTY_PASSTHROUGH_REGION, (out, region) =>
      out.struct(8, () => {
        out.u64(region.guestPaddr).u64(region.size);
      }),
    );
    w.u8(config.irqs.length);
    w.array(config.irqs, MAX_PASSTHROUGH_IRQS, EMPTY_PASSTHROUGH_IRQ, (out, irq) =>
      out.struct(4, () => {
        out.u8(irq.id).u32(irq.irq);
      }),
    );
  });
  return w.finish();
}
