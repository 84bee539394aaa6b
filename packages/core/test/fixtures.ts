/**
 * Shared test fixtures: a fake device tree, an in-memory blob sink and
 * helpers for building small systems. No I/O.
 */

import {
  Arch,
  DriverCatalog,
  type BlobSink,
  type DeviceInterrupt,
  type DeviceNode,
  type DeviceRegister,
  type DeviceTree,
  type DriverEntry,
  type ErrorKind,
  type LogSink,
  type PdOptions,
  type ProtectionDomain,
  type Result,
  GenerationLogger,
  SystemDescription,
} from '../src/index.js';

export const PADDR_TOP = 0x100000000;

/** Value of a successful result; throws with the error otherwise. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

/** Error kind of a failed result, undefined on success. */
export function errorOf(result: Result<unknown>): ErrorKind | undefined {
  return result.ok ? undefined : result.error.kind;
}

export function newSystem(
  options: { arch?: Arch; drivers?: DriverCatalog; sink?: LogSink } = {},
): SystemDescription {
  return unwrap(
    SystemDescription.create(options.arch ?? Arch.Aarch64, PADDR_TOP, {
      drivers: options.drivers,
      logger: options.sink ? new GenerationLogger(options.sink) : undefined,
    }),
  );
}

/** Create and register a top-level PD named `name` running `<name>.elf`. */
export function addPd(sdf: SystemDescription, name: string, options: PdOptions = {}): ProtectionDomain {
  const pd = unwrap(sdf.createPd(name, `${name}.elf`, options));
  unwrap(sdf.addPd(pd));
  return pd;
}

export function catalog(entries: ReadonlyArray<DriverEntry>): DriverCatalog {
  return unwrap(DriverCatalog.create(entries));
}

export interface FakeDeviceProps {
  readonly compatible: ReadonlyArray<string>;
  readonly status?: string;
  readonly registers?: ReadonlyArray<DeviceRegister>;
  readonly interrupts?: ReadonlyArray<DeviceInterrupt>;
}

export class FakeDevice implements DeviceNode {
  constructor(
    readonly name: string,
    private readonly props: FakeDeviceProps,
  ) {}

  compatible(): ReadonlyArray<string> {
    return this.props.compatible;
  }

  status(): string | undefined {
    return this.props.status;
  }

  registers(): ReadonlyArray<DeviceRegister> {
    return this.props.registers ?? [];
  }

  interrupts(): ReadonlyArray<DeviceInterrupt> {
    return this.props.interrupts ?? [];
  }
}

export class FakeTree implements DeviceTree {
  constructor(private readonly nodes: Readonly<Record<string, DeviceNode>>) {}

  lookup(path: string): DeviceNode | undefined {
    return this.nodes[path];
  }
}

/** Collects blobs by name, in write order. */
export class MemoryBlobSink implements BlobSink {
  readonly blobs = new Map<string, Uint8Array>();

  write(name: string, data: Uint8Array): void {
    this.blobs.set(name, data);
  }

  get(name: string): Buffer {
    const data = this.blobs.get(name);
    if (!data) throw new Error(`no blob named ${name}`);
    return Buffer.from(data);
  }
}

export class RecordingLogSink implements LogSink {
  readonly events: string[] = [];

  append(entry: { readonly event: string }): void {
    this.events.push(entry.event);
  }
}
