/**
 * sdfkit Core: Driver Catalog
 *
 * Describes the device drivers available to subsystems: which compatible
 * strings each driver binds to and which regions and interrupts it needs.
 * Entries come from each driver's `config.json`; parseDriverConfig narrows
 * the raw JSON, DriverCatalog.create checks cross-entry rules.
 */

import { ErrorKind, fail, ok, type Result } from '../types/result.js';

export enum DeviceClass {
  Network = 'network',
  Serial = 'serial',
  Timer = 'timer',
  Blk = 'blk',
  I2c = 'i2c',
  Gpu = 'gpu',
}

export interface DriverRegion {
  readonly name: string;
  readonly perms?: string | undefined;
  readonly setvarVaddr?: string | undefined;
  readonly size?: number | undefined;
  readonly cached?: boolean | undefined;
  /** Index into the device node's `reg` entries. */
  readonly dtIndex?: number | undefined;
}

export interface DriverIrq {
  /** Index into the device node's interrupts. */
  readonly dtIndex: number;
  readonly channelId?: number | undefined;
}

export interface DriverConfig {
  readonly compatible: ReadonlyArray<string>;
  readonly regions: ReadonlyArray<DriverRegion>;
  readonly irqs: ReadonlyArray<DriverIrq>;
}

export interface DriverEntry {
  readonly deviceClass: DeviceClass;
  /** Driver directory name, e.g. `arm` or `meson`. */
  readonly name: string;
  readonly config: DriverConfig;
}

// ---------------------------------------------------------------------------
// JSON narrowing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optional<T>(
  record: Record<string, unknown>,
  key: string,
  guard: (v: unknown) => v is T,
): { ok: true; value: T | undefined } | { ok: false } {
  const value = record[key];
  if (value === undefined) return { ok: true, value: undefined };
  return guard(value) ? { ok: true, value } : { ok: false };
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isCount = (v: unknown): v is number =>
  typeof v === 'number' && Number.isSafeInteger(v) && v >= 0;

/**
 * Narrow a parsed `config.json` into a DriverConfig.
 * `source` names the file in error messages.
 */
export function parseDriverConfig(raw: unknown, source: string): Result<DriverConfig> {
  const bad = (what: string): Result<DriverConfig> =>
    fail(ErrorKind.InvalidConfig, `${source}: ${what}`);

  if (!isRecord(raw)) return bad('expected an object');
  const compatible = raw['compatible'];
  if (!Array.isArray(compatible) || !compatible.every(isString)) {
    return bad("'compatible' must be an array of strings");
  }
  const resources = raw['resources'] ?? {};
  if (!isRecord(resources)) return bad("'resources' must be an object");
  const rawRegions = resources['regions'] ?? [];
  const rawIrqs = resources['irqs'] ?? [];
  if (!Array.isArray(rawRegions)) return bad("'resources.regions' must be an array");
  if (!Array.isArray(rawIrqs)) return bad("'resources.irqs' must be an array");

  const regions: DriverRegion[] = [];
  for (const [i, entry] of rawRegions.entries()) {
    const name: unknown = isRecord(entry) ? entry['name'] : undefined;
    if (!isRecord(entry) || !isString(name)) {
      return bad(`region ${i} must be an object with a string 'name'`);
    }
    const perms = optional(entry, 'perms', isString);
    const setvar = optional(entry, 'setvar_vaddr', isString);
    const size = optional(entry, 'size', isCount);
    const cached = optional(entry, 'cached', isBoolean);
    const dtIndex = optional(entry, 'dt_index', isCount);
    if (!perms.ok || !setvar.ok || !size.ok || !cached.ok || !dtIndex.ok) {
      return bad(`region '${name}' has a field of the wrong type`);
    }
    regions.push({
      name,
      perms: perms.value,
      setvarVaddr: setvar.value,
      size: size.value,
      cached: cached.value,
      dtIndex: dtIndex.value,
    });
  }

  const irqs: DriverIrq[] = [];
  for (const [i, entry] of rawIrqs.entries()) {
    const dtIndex: unknown = isRecord(entry) ? entry['dt_index'] : undefined;
    if (!isRecord(entry) || !isCount(dtIndex)) {
      return bad(`irq ${i} must be an object with a numeric 'dt_index'`);
    }
    const channelId = optional(entry, 'channel_id', isCount);
    if (!channelId.ok) return bad(`irq ${i} has a non-numeric 'channel_id'`);
    irqs.push({ dtIndex, channelId: channelId.value });
  }

  return ok({ compatible, regions, irqs });
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

function checkEntry(entry: DriverEntry): Result {
  const where = `${entry.deviceClass}/${entry.name}`;
  const names = new Set<string>();
  const regionIndices = new Set<number>();
  for (const region of entry.config.regions) {
    if (names.has(region.name)) {
      return fail(ErrorKind.InvalidConfig, `duplicate region name '${region.name}'`, where);
    }
    names.add(region.name);
    if (region.dtIndex === undefined && region.size === undefined) {
      return fail(ErrorKind.InvalidConfig, `region '${region.name}' needs a size or a dt_index`, where);
    }
    if (region.dtIndex !== undefined) {
      if (regionIndices.has(region.dtIndex)) {
        return fail(ErrorKind.InvalidConfig, `duplicate region dt_index ${region.dtIndex}`, where);
      }
      regionIndices.add(region.dtIndex);
    }
  }
  const irqIndices = new Set<number>();
  for (const irq of entry.config.irqs) {
    if (irqIndices.has(irq.dtIndex)) {
      return fail(ErrorKind.InvalidConfig, `duplicate irq dt_index ${irq.dtIndex}`, where);
    }
    irqIndices.add(irq.dtIndex);
  }
  return ok();
}

export class DriverCatalog {
  private constructor(private readonly entries: ReadonlyArray<DriverEntry>) {}

  static empty(): DriverCatalog {
    return new DriverCatalog([]);
  }

  static create(entries: ReadonlyArray<DriverEntry>): Result<DriverCatalog> {
    const claimed = new Map<string, string>();
    for (const entry of entries) {
      const checked = checkEntry(entry);
      if (!checked.ok) return checked;
      for (const compatible of entry.config.compatible) {
        const key = `${entry.deviceClass}:${compatible}`;
        const owner = claimed.get(key);
        if (owner !== undefined) {
          return fail(
            ErrorKind.InvalidConfig,
            `compatible '${compatible}' is claimed by both '${owner}' and '${entry.name}'`,
            entry.deviceClass,
          );
        }
        claimed.set(key, entry.name);
      }
    }
    return ok(new DriverCatalog([...entries]));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Driver for a device of the given class. Compatible strings are tried in
   * the order given, most specific first.
   */
  find(deviceClass: DeviceClass, compatible: ReadonlyArray<string>): DriverEntry | undefined {
    for (const wanted of compatible) {
      const hit = this.entries.find(
        (e) => e.deviceClass === deviceClass && e.config.compatible.includes(wanted),
      );
      if (hit) return hit;
    }
    return undefined;
  }
}
