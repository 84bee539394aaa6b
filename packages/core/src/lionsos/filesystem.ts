/**
 * sdfkit Core: File System Subsystems
 *
 * A file system server PD serves exactly one client over a command queue,
 * a completion queue and a shared data region. The FAT server reads a
 * block device; the NFS server mounts an export over the network and
 * pulls in serial (logging) and timer (retries) as well.
 */

import type { ProtectionDomain } from '../graph/protection-domain.js';
import { regionOf } from '../config/common.js';
import {
  EMPTY_FS_CONNECTION,
  NFS_STRING_LEN,
  encodeFsClient,
  encodeFsServer,
  type FsConnection,
  type NfsConfig,
} from '../config/fs.js';
import type { BlockSystem } from '../sddf/block.js';
import type { NetSystem } from '../sddf/net.js';
import type { MacInput } from '../sddf/mac.js';
import type { SerialSystem } from '../sddf/serial.js';
import type { TimerSystem } from '../sddf/timer.js';
import { SubsystemBase, blobName, type ConfigBlob } from '../sddf/subsystem.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

export interface FsOptions {
  readonly shareSize?: number;
  readonly commandQueueSize?: number;
  readonly completionQueueSize?: number;
  readonly queueLen?: number;
}

export interface FsClient {
  readonly pd: ProtectionDomain;
}

const DEFAULTS: Required<FsOptions> = {
  shareSize: 0x4000000,
  commandQueueSize: 0x8000,
  completionQueueSize: 0x8000,
  queueLen: 512,
};

export abstract class FileSystem extends SubsystemBase<FsClient> {
  readonly fs: ProtectionDomain;
  readonly client: ProtectionDomain;
  readonly options: Required<FsOptions>;
  private serverSide: FsConnection = EMPTY_FS_CONNECTION;
  private clientSide: FsConnection = EMPTY_FS_CONNECTION;

  protected constructor(sdf: SystemDescription, fs: ProtectionDomain, client: ProtectionDomain, options: FsOptions) {
    super(sdf);
    this.fs = fs;
    this.client = client;
    this.options = { ...DEFAULTS, ...options };
  }

  protected static check(sdf: SystemDescription, fs: ProtectionDomain, client: ProtectionDomain): Result {
    if (fs === client) {
      return fail(ErrorKind.InvalidClient, `'${fs.name}' cannot be a client of its own file system`);
    }
    for (const pd of [fs, client]) {
      if (!sdf.isLive(pd)) return fail(ErrorKind.UnknownEntity, `file system PD '${pd.name}' has been destroyed`);
    }
    return ok();
  }

  protected corePds(): ReadonlyArray<ProtectionDomain> {
    return [this.fs];
  }

  /** Queues, share region and the server <-> client channel. */
  protected wireServer(tx: Wiring): Result {
    const prefix = `fs/${this.fs.name}`;
    const { commandQueueSize, completionQueueSize, shareSize, queueLen } = this.options;
    const command = tx.mr(`${prefix}/command_queue`, commandQueueSize);
    if (!command.ok) return command;
    const completion = tx.mr(`${prefix}/completion_queue`, completionQueueSize);
    if (!completion.ok) return completion;
    const share = tx.mr(`${prefix}/share`, shareSize);
    if (!share.ok) return share;

    const sides: FsConnection[] = [];
    const channel = tx.channel(this.fs, this.client);
    if (!channel.ok) return channel;
    for (const [pd, id] of [[this.fs, channel.value.endA], [this.client, channel.value.endB]] as const) {
      const cmd = tx.map(pd, command.value, 'rw');
      if (!cmd.ok) return cmd;
      const cmpl = tx.map(pd, completion.value, 'rw');
      if (!cmpl.ok) return cmpl;
      const data = tx.map(pd, share.value, 'rw');
      if (!data.ok) return data;
      sides.push({
        commandQueue: regionOf(cmd.value),
        completionQueue: regionOf(cmpl.value),
        share: regionOf(data.value),
        queueLen,
        id,
      });
    }
    this.serverSide = sides[0] ?? EMPTY_FS_CONNECTION;
    this.clientSide = sides[1] ?? EMPTY_FS_CONNECTION;
    return ok();
  }

  /** Extra section appended to the server blob. */
  protected nfsConfig(): NfsConfig | undefined {
    return undefined;
  }

  protected blobs(): ReadonlyArray<ConfigBlob> {
    return [
      { name: blobName('fs', 'server', this.fs), data: encodeFsServer(this.serverSide, this.nfsConfig()) },
      { name: blobName('fs', 'client', this.client), data: encodeFsClient(this.clientSide) },
    ];
  }
}

// ---------------------------------------------------------------------------
// FAT
// ---------------------------------------------------------------------------

export interface FatOptions extends FsOptions {
  /** Register the server as a client of this block subsystem. */
  readonly block?: { readonly system: BlockSystem; readonly partition: number };
}

const WORKER_STACK_SIZE = 0x40000;
const WORKER_STACKS = [
  { vaddr: 0xa0000000, symbol: 'worker_thread_stack_one' },
  { vaddr: 0xb0000000, symbol: 'worker_thread_stack_two' },
  { vaddr: 0xc0000000, symbol: 'worker_thread_stack_three' },
  { vaddr: 0xd0000000, symbol: 'worker_thread_stack_four' },
] as const;

export class FatFileSystem extends FileSystem {
  readonly kind = 'fat';
  private readonly block: FatOptions['block'];

  private constructor(sdf: SystemDescription, fs: ProtectionDomain, client: ProtectionDomain, options: FatOptions) {
    super(sdf, fs, client, options);
    this.block = options.block;
  }

  static create(
    sdf: SystemDescription,
    fs: ProtectionDomain,
    client: ProtectionDomain,
    options: FatOptions = {},
  ): Result<FatFileSystem> {
    const checked = FileSystem.check(sdf, fs, client);
    if (!checked.ok) return checked;
    const system = new FatFileSystem(sdf, fs, client, options);
    system.admit({ pd: client });
    return ok(system);
  }

  protected wire(tx: Wiring): Result {
    if (this.block) {
      const { system, partition } = this.block;
      const added = system.addClient(this.fs, { partition });
      if (!added.ok) return added;
      tx.onRollback(() => system.withdraw(this.fs));
    }
    const served = this.wireServer(tx);
    if (!served.ok) return served;
    for (const [i, stack] of WORKER_STACKS.entries()) {
      const mr = tx.mr(`fs/${this.fs.name}/worker_stack_${i + 1}`, WORKER_STACK_SIZE);
      if (!mr.ok) return mr;
      const mapped = tx.map(this.fs, mr.value, 'rw', { vaddr: stack.vaddr, setvarVaddr: stack.symbol });
      if (!mapped.ok) return mapped;
    }
    return ok();
  }
}

// ---------------------------------------------------------------------------
// NFS
// ---------------------------------------------------------------------------

export interface NfsOptions extends FsOptions {
  readonly net: NetSystem;
  /** Copier PD serving the file system server on the network. */
  readonly netCopier: ProtectionDomain;
  readonly macAddr?: MacInput;
  readonly serial: SerialSystem;
  readonly timer: TimerSystem;
  /** NFS server host or address. */
  readonly server: string;
  readonly exportPath: string;
}

export class NfsFileSystem extends FileSystem {
  readonly kind = 'nfs';
  private readonly net: NetSystem;
  private readonly netCopier: ProtectionDomain;
  private readonly macAddr: MacInput | undefined;
  private readonly serial: SerialSystem;
  private readonly timer: TimerSystem;
  private readonly mount: NfsConfig;

  private constructor(sdf: SystemDescription, fs: ProtectionDomain, client: ProtectionDomain, options: NfsOptions) {
    super(sdf, fs, client, options);
    this.net = options.net;
    this.netCopier = options.netCopier;
    this.macAddr = options.macAddr;
    this.serial = options.serial;
    this.timer = options.timer;
    this.mount = { server: options.server, exportPath: options.exportPath };
  }

  static create(
    sdf: SystemDescription,
    fs: ProtectionDomain,
    client: ProtectionDomain,
    options: NfsOptions,
  ): Result<NfsFileSystem> {
    const checked = FileSystem.check(sdf, fs, client);
    if (!checked.ok) return checked;
    for (const [label, value] of [['server', options.server], ['export path', options.exportPath]] as const) {
      const bytes = Buffer.byteLength(value, 'utf8');
      if (bytes === 0 || bytes >= NFS_STRING_LEN) {
        return fail(ErrorKind.InvalidArgument, `NFS ${label} must be 1..${NFS_STRING_LEN - 1} bytes`);
      }
    }
    const system = new NfsFileSystem(sdf, fs, client, options);
    system.admit({ pd: client });
    return ok(system);
  }

  protected embedded(): ReadonlyArray<SubsystemBase<{ readonly pd: ProtectionDomain }>> {
    return [this.net, this.serial, this.timer];
  }

  protected wire(tx: Wiring): Result {
    const net = this.net.addClient(this.fs, { copier: this.netCopier, macAddr: this.macAddr, tx: true });
    if (!net.ok) return net;
    tx.onRollback(() => this.net.withdraw(this.fs));
    const serial = this.serial.addClient(this.fs);
    if (!serial.ok) return serial;
    tx.onRollback(() => this.serial.withdraw(this.fs));
    const timer = this.timer.addClient(this.fs);
    if (!timer.ok) return timer;
    tx.onRollback(() => this.timer.withdraw(this.fs));

    for (const sub of this.embedded()) {
      const connected = sub.connectWithin(tx);
      if (!connected.ok) return connected;
    }
    return this.wireServer(tx);
  }

  protected nfsConfig(): NfsConfig {
    return this.mount;
  }
}
