/**
 * sdfkit Core: System Document Reader
 *
 * Parses a rendered system document back into a typed SystemDocument and,
 * from that, rebuilds an equivalent SystemDescription. Used for round-trip
 * checks and for inspecting documents produced elsewhere.
 */

import { XMLParser } from 'fast-xml-parser';
import { IrqTrigger, parseTrigger } from '../graph/irq.js';
import type { MemoryRegion } from '../graph/memory-region.js';
import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { MapTarget } from '../graph/virtual-machine.js';
import { SystemDescription, type SystemDescriptionOptions } from '../system/system-description.js';
import { Arch, PageSize, pageBytes } from '../types/arch.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

// ---------------------------------------------------------------------------
// Document model
// ---------------------------------------------------------------------------

export interface DocMemoryRegion {
  readonly name: string;
  readonly size: number;
  readonly pageSize?: number | undefined;
  readonly paddr?: number | undefined;
}

export interface DocMap {
  readonly mr: string;
  readonly vaddr: number;
  readonly perms: string;
  readonly cached: boolean;
  readonly setvarVaddr?: string | undefined;
}

export interface DocIrq {
  readonly irq: number;
  readonly trigger: IrqTrigger;
  readonly id: number;
}

export interface DocVcpu {
  readonly id: number;
  readonly cpu?: number | undefined;
}

export interface DocVirtualMachine {
  readonly name: string;
  readonly priority?: number | undefined;
  readonly budget?: number | undefined;
  readonly period?: number | undefined;
  readonly vcpus: ReadonlyArray<DocVcpu>;
  readonly maps: ReadonlyArray<DocMap>;
}

export interface DocProtectionDomain {
  readonly name: string;
  readonly id?: number | undefined;
  readonly image: string;
  readonly priority?: number | undefined;
  readonly budget?: number | undefined;
  readonly period?: number | undefined;
  readonly passive?: boolean | undefined;
  readonly stackSize?: number | undefined;
  readonly cpu?: number | undefined;
  readonly maps: ReadonlyArray<DocMap>;
  readonly irqs: ReadonlyArray<DocIrq>;
  readonly children: ReadonlyArray<DocProtectionDomain>;
  readonly vm?: DocVirtualMachine | undefined;
}

export interface DocChannelEnd {
  readonly pd: string;
  readonly id: number;
  readonly notify: boolean;
  readonly pp: boolean;
}

export interface DocChannel {
  readonly a: DocChannelEnd;
  readonly b: DocChannelEnd;
}

export interface SystemDocument {
  readonly memoryRegions: ReadonlyArray<DocMemoryRegion>;
  readonly protectionDomains: ReadonlyArray<DocProtectionDomain>;
  readonly channels: ReadonlyArray<DocChannel>;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const REPEATED = new Set([
  'memory_region',
  'protection_domain',
  'channel',
  'end',
  'map',
  'irq',
  'vcpu',
]);

type Node = Record<string, unknown>;

class ParseError extends Error {}

function isNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: Node, tag: string): Node[] {
  const value = node[tag];
  if (value === undefined) return [];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  // Elements with neither attributes nor children parse as ''.
  return list.map((item) => (isNode(item) ? item : {}));
}

function attr(node: Node, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function requireAttr(node: Node, tag: string, name: string): string {
  const value = attr(node, name);
  if (value === undefined) throw new ParseError(`<${tag}> is missing attribute '${name}'`);
  return value;
}

function toNumber(tag: string, name: string, text: string): number {
  const value = Number(text);
  if (text.trim() === '' || !Number.isSafeInteger(value)) {
    throw new ParseError(`<${tag}> attribute '${name}' is not an integer: "${text}"`);
  }
  return value;
}

function numberAttr(node: Node, tag: string, name: string): number | undefined {
  const text = attr(node, name);
  return text === undefined ? undefined : toNumber(tag, name, text);
}

function requireNumber(node: Node, tag: string, name: string): number {
  return toNumber(tag, name, requireAttr(node, tag, name));
}

function boolAttr(node: Node, tag: string, name: string): boolean | undefined {
  const text = attr(node, name);
  if (text === undefined) return undefined;
  if (text === 'true') return true;
  if (text === 'false') return false;
  throw new ParseError(`<${tag}> attribute '${name}' must be true or false`);
}

function readMap(node: Node): DocMap {
  return {
    mr: requireAttr(node, 'map', 'mr'),
    vaddr: requireNumber(node, 'map', 'vaddr'),
    perms: attr(node, 'perms') ?? 'rw',
    cached: boolAttr(node, 'map', 'cached') ?? true,
    setvarVaddr: attr(node, 'setvar_vaddr'),
  };
}

function readVm(node: Node): DocVirtualMachine {
  return {
    name: requireAttr(node, 'virtual_machine', 'name'),
    priority: numberAttr(node, 'virtual_machine', 'priority'),
    budget: numberAttr(node, 'virtual_machine', 'budget'),
    period: numberAttr(node, 'virtual_machine', 'period'),
    vcpus: children(node, 'vcpu').map((v) => ({
      id: requireNumber(v, 'vcpu', 'id'),
      cpu: numberAttr(v, 'vcpu', 'cpu'),
    })),
    maps: children(node, 'map').map(readMap),
  };
}

function readPd(node: Node): DocProtectionDomain {
  const name = requireAttr(node, 'protection_domain', 'name');
  const image = children(node, 'program_image')[0];
  if (!image) throw new ParseError(`protection domain '${name}' has no <program_image>`);
  const vm = children(node, 'virtual_machine')[0];
  return {
    name,
    id: numberAttr(node, 'protection_domain', 'id'),
    image: requireAttr(image, 'program_image', 'path'),
    priority: numberAttr(node, 'protection_domain', 'priority'),
    budget: numberAttr(node, 'protection_domain', 'budget'),
    period: numberAttr(node, 'protection_domain', 'period'),
    passive: boolAttr(node, 'protection_domain', 'passive'),
    stackSize: numberAttr(node, 'protection_domain', 'stack_size'),
    cpu: numberAttr(node, 'protection_domain', 'cpu'),
    maps: children(node, 'map').map(readMap),
    irqs: children(node, 'irq').map((irq) => {
      const trigger = parseTrigger(attr(irq, 'trigger') ?? IrqTrigger.Level);
      if (trigger === undefined) throw new ParseError(`irq trigger of '${name}' must be edge or level`);
      return {
        irq: requireNumber(irq, 'irq', 'irq'),
        trigger,
        id: requireNumber(irq, 'irq', 'id'),
      };
    }),
    children: children(node, 'protection_domain').map(readPd),
    vm: vm ? readVm(vm) : undefined,
  };
}

function readEnd(node: Node): DocChannelEnd {
  return {
    pd: requireAttr(node, 'end', 'pd'),
    id: requireNumber(node, 'end', 'id'),
    notify: boolAttr(node, 'end', 'notify') ?? true,
    pp: boolAttr(node, 'end', 'pp') ?? false,
  };
}

export function parseSystemDocument(xml: string): Result<SystemDocument> {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    ignoreDeclaration: true,
    parseAttributeValue: false,
    isArray: (name: string, _jpath: string, _leaf: boolean, isAttribute: boolean) =>
      !isAttribute && REPEATED.has(name),
  });
  try {
    const root: unknown = parser.parse(xml);
    if (!isNode(root) || !('system' in root)) {
      return fail(ErrorKind.InvalidArgument, 'document has no <system> element');
    }
    const system = isNode(root['system']) ? root['system'] : {};
    return ok({
      memoryRegions: children(system, 'memory_region').map((mr) => ({
        name: requireAttr(mr, 'memory_region', 'name'),
        size: requireNumber(mr, 'memory_region', 'size'),
        pageSize: numberAttr(mr, 'memory_region', 'page_size'),
        paddr: numberAttr(mr, 'memory_region', 'phys_addr'),
      })),
      protectionDomains: children(system, 'protection_domain').map(readPd),
      channels: children(system, 'channel').map((ch) => {
        const [a, b, extra] = children(ch, 'end');
        if (!a || !b || extra) throw new ParseError('<channel> must have exactly two <end> elements');
        return { a: readEnd(a), b: readEnd(b) };
      }),
    });
  } catch (e) {
    if (e instanceof ParseError) return fail(ErrorKind.InvalidArgument, e.message);
    return fail(ErrorKind.InvalidArgument, `malformed document: ${String(e)}`);
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function pageSizeOf(arch: Arch, bytes: number | undefined): PageSize | undefined {
  if (bytes === undefined) return undefined;
  return [PageSize.Small, PageSize.Large, PageSize.Huge].find((p) => pageBytes(arch, p) === bytes);
}

interface Loader {
  readonly sdf: SystemDescription;
  readonly mrs: Map<string, MemoryRegion>;
  readonly pds: Map<string, ProtectionDomain>;
}

function loadMaps(loader: Loader, target: MapTarget, maps: ReadonlyArray<DocMap>): Result {
  for (const m of maps) {
    const mr = loader.mrs.get(m.mr);
    if (!mr) return fail(ErrorKind.UnknownEntity, `map in '${target.name}' names unknown MR '${m.mr}'`);
    const map = loader.sdf.createMap(mr, m.vaddr, m.perms, {
      cached: m.cached,
      setvarVaddr: m.setvarVaddr,
      allowEmpty: m.perms === '',
    });
    if (!map.ok) return map;
    target.addMap(map.value);
  }
  return ok();
}

function loadPd(loader: Loader, doc: DocProtectionDomain): Result<ProtectionDomain> {
  const pd = loader.sdf.createPd(doc.name, doc.image, doc);
  if (!pd.ok) return pd;
  if (loader.pds.has(doc.name)) {
    return fail(ErrorKind.DuplicateName, `PD '${doc.name}' appears twice`);
  }
  loader.pds.set(doc.name, pd.value);
  const maps = loadMaps(loader, pd.value, doc.maps);
  if (!maps.ok) return maps;
  for (const irq of doc.irqs) {
    const bound = pd.value.addIrq(irq);
    if (!bound.ok) return bound;
  }
  for (const child of doc.children) {
    const loaded = loadPd(loader, child);
    if (!loaded.ok) return loaded;
    const added = loader.sdf.addChild(pd.value, loaded.value, child.id);
    if (!added.ok) return added;
  }
  if (doc.vm) {
    const vm = loader.sdf.createVm(doc.vm.name, doc.vm);
    if (!vm.ok) return vm;
    const vmMaps = loadMaps(loader, vm.value, doc.vm.maps);
    if (!vmMaps.ok) return vmMaps;
    const attached = pd.value.attachVm(vm.value);
    if (!attached.ok) return attached;
  }
  return pd;
}

/**
 * Rebuild a SystemDescription from a rendered document. Every id in the
 * document is requested as a fixed id, so rendering the result reproduces
 * the input.
 */
export function loadSystem(
  xml: string,
  arch: Arch | string,
  paddrTop: number,
  options: SystemDescriptionOptions = {},
): Result<SystemDescription> {
  const parsed = parseSystemDocument(xml);
  if (!parsed.ok) return parsed;
  const created = SystemDescription.create(arch, paddrTop, options);
  if (!created.ok) return created;
  const loader: Loader = { sdf: created.value, mrs: new Map(), pds: new Map() };
  const { sdf } = loader;

  for (const m of parsed.value.memoryRegions) {
    const pageSize = pageSizeOf(sdf.arch, m.pageSize);
    if (m.pageSize !== undefined && pageSize === undefined) {
      return fail(ErrorKind.InvalidArgument, `MR '${m.name}' has an unknown page size ${m.pageSize}`);
    }
    const mr = sdf.createMr(m.name, m.size, { pageSize, paddr: m.paddr });
    if (!mr.ok) return mr;
    const added = sdf.addMr(mr.value);
    if (!added.ok) return added;
    loader.mrs.set(m.name, mr.value);
  }

  for (const doc of parsed.value.protectionDomains) {
    const pd = loadPd(loader, doc);
    if (!pd.ok) return pd;
    const added = sdf.addPd(pd.value);
    if (!added.ok) return added;
  }

  for (const ch of parsed.value.channels) {
    const a = loader.pds.get(ch.a.pd);
    const b = loader.pds.get(ch.b.pd);
    if (!a || !b) return fail(ErrorKind.UnknownEntity, `channel names unknown PD '${a ? ch.b.pd : ch.a.pd}'`);
    const channel = sdf.createChannel(a, b, {
      idA: ch.a.id,
      idB: ch.b.id,
      notifyA: ch.a.notify,
      notifyB: ch.b.notify,
      pp: ch.a.pp ? 'a' : ch.b.pp ? 'b' : undefined,
    });
    if (!channel.ok) return channel;
    const added = sdf.addChannel(channel.value);
    if (!added.ok) return added;
  }

  return ok(sdf);
}
