/**
 * sdfkit Core: System Document Writer
 *
 * Renders a SystemDescription as a Microkit system XML document. Output
 * follows insertion order everywhere: MRs, then PDs (with their program
 * image, maps, IRQs, children and VM), then channels. Optional attributes
 * appear only when set, so identical call sequences render identical bytes.
 */

import type { Channel } from '../graph/channel.js';
import { formatPerms, type MemoryMap } from '../graph/memory-region.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { VirtualMachine } from '../graph/virtual-machine.js';
import type { SystemDescription } from '../system/system-description.js';
import { PageSize, hex } from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

type Attr = readonly [name: string, value: string | number | undefined];

const INDENT = '    ';

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

class XmlLines {
  private readonly lines: string[] = [];

  private tag(depth: number, name: string, attrs: ReadonlyArray<Attr>, end: string): void {
    const rendered = attrs
      .filter((a): a is readonly [string, string | number] => a[1] !== undefined)
      .map(([k, v]) => ` ${k}="${escapeXml(String(v))}"`)
      .join('');
    this.lines.push(`${INDENT.repeat(depth)}<${name}${rendered}${end}`);
  }

  raw(line: string): void {
    this.lines.push(line);
  }

  open(depth: number, name: string, attrs: ReadonlyArray<Attr> = []): void {
    this.tag(depth, name, attrs, '>');
  }

  empty(depth: number, name: string, attrs: ReadonlyArray<Attr>): void {
    this.tag(depth, name, attrs, ' />');
  }

  close(depth: number, name: string): void {
    this.lines.push(`${INDENT.repeat(depth)}</${name}>`);
  }

  toString(): string {
    return `${this.lines.join('\n')}\n`;
  }
}

function flag(value: boolean | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

function writeMap(out: XmlLines, sdf: SystemDescription, map: MemoryMap, depth: number): Result {
  const mr = sdf.resolveMr(map.mrId);
  if (!mr) return fail(ErrorKind.UnknownEntity, 'map references a discarded MR');
  out.empty(depth, 'map', [
    ['mr', mr.name],
    ['vaddr', hex(map.vaddr)],
    ['perms', formatPerms(map.perms)],
    ['cached', map.cached ? undefined : 'false'],
    ['setvar_vaddr', map.setvarVaddr],
  ]);
  return ok();
}

function writeVm(out: XmlLines, sdf: SystemDescription, vm: VirtualMachine, depth: number): Result {
  out.open(depth, 'virtual_machine', [
    ['name', vm.name],
    ['priority', vm.priority],
    ['budget', vm.budget],
    ['period', vm.period],
  ]);
  for (const vcpu of vm.vcpus) {
    out.empty(depth + 1, 'vcpu', [
      ['id', vcpu.id],
      ['cpu', vcpu.cpu],
    ]);
  }
  for (const map of vm.maps) {
    const written = writeMap(out, sdf, map, depth + 1);
    if (!written.ok) return written;
  }
  out.close(depth, 'virtual_machine');
  return ok();
}

function writePd(
  out: XmlLines,
  sdf: SystemDescription,
  pd: ProtectionDomain,
  depth: number,
  childId: number | undefined,
): Result {
  if (!sdf.isLive(pd)) {
    return fail(ErrorKind.UnknownEntity, `PD '${pd.name}' has been destroyed`);
  }
  out.open(depth, 'protection_domain', [
    ['name', pd.name],
    ['id', childId],
    ['priority', pd.priority],
    ['budget', pd.budget],
    ['period', pd.period],
    ['passive', flag(pd.passive)],
    ['stack_size', pd.stackSize === undefined ? undefined : hex(pd.stackSize)],
    ['cpu', pd.cpu],
  ]);
  out.empty(depth + 1, 'program_image', [['path', pd.image]]);
  for (const map of pd.maps) {
    const written = writeMap(out, sdf, map, depth + 1);
    if (!written.ok) return written;
  }
  for (const irq of pd.irqs) {
    out.empty(depth + 1, 'irq', [
      ['irq', irq.irq],
      ['trigger', irq.trigger],
      ['id', irq.id],
    ]);
  }
  for (const child of pd.children) {
    const written = writePd(out, sdf, child.pd, depth + 1, child.id);
    if (!written.ok) return written;
  }
  if (pd.vm) {
    const written = writeVm(out, sdf, pd.vm, depth + 1);
    if (!written.ok) return written;
  }
  out.close(depth, 'protection_domain');
  return ok();
}

function writeChannel(out: XmlLines, sdf: SystemDescription, channel: Channel): Result {
  const a = sdf.resolvePd(channel.pdA);
  const b = sdf.resolvePd(channel.pdB);
  if (!a || !b) {
    return fail(ErrorKind.UnknownEntity, 'channel references a destroyed PD');
  }
  out.open(1, 'channel');
  out.empty(2, 'end', [
    ['pd', a.name],
    ['id', channel.endA],
    ['notify', channel.notifyA ? undefined : 'false'],
    ['pp', channel.pp === 'a' ? 'true' : undefined],
  ]);
  out.empty(2, 'end', [
    ['pd', b.name],
    ['id', channel.endB],
    ['notify', channel.notifyB ? undefined : 'false'],
    ['pp', channel.pp === 'b' ? 'true' : undefined],
  ]);
  out.close(1, 'channel');
  return ok();
}

export function renderSystem(sdf: SystemDescription): Result<string> {
  const out = new XmlLines();
  out.raw('<?xml version="1.0" encoding="UTF-8"?>');
  out.open(0, 'system');
  for (const mr of sdf.memoryRegions) {
    out.empty(1, 'memory_region', [
      ['name', mr.name],
      ['size', hex(mr.size)],
      ['page_size', mr.pageSize === undefined || mr.pageSize === PageSize.Small ? undefined : hex(mr.pageBytes)],
      ['phys_addr', mr.paddr === undefined ? undefined : hex(mr.paddr)],
    ]);
  }
  for (const pd of sdf.protectionDomains) {
    const written = writePd(out, sdf, pd, 1, undefined);
    if (!written.ok) return written;
  }
  for (const channel of sdf.channels) {
    const written = writeChannel(out, sdf, channel);
    if (!written.ok) return written;
  }
  out.close(0, 'system');
  return ok(out.toString());
}
