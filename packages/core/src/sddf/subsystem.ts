/**
 * sdfkit Core: Subsystem Lifecycle
 *
 * Every device class and composite shares one lifecycle:
 *
 *   Created -> Configured -> Connected -> Serialised
 *
 * Clients may be added while Created or Configured. connect() runs once,
 * inside a Wiring transaction: when any step fails the transaction rolls
 * back and the subsystem stays where it was. serializeConfig() emits one
 * blob per participating PD and may be repeated once connected.
 */

import type { ProtectionDomain } from '../graph/protection-domain.js';
import type { SystemDescription } from '../system/system-description.js';
import type { Wiring } from '../system/wiring.js';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

export enum SubsystemState {
  Created = 'created',
  Configured = 'configured',
  Connected = 'connected',
  Serialised = 'serialised',
}

/** Receives configuration blobs. Implementations throw on write failure. */
export interface BlobSink {
  write(name: string, data: Uint8Array): void;
}

export interface ConfigBlob {
  /** File name, including the `.data` suffix. */
  readonly name: string;
  readonly data: Uint8Array;
}

export function blobName(kind: string, role: string, pd: ProtectionDomain): string {
  return `${kind}_${role}_${pd.name}.data`;
}

export abstract class SubsystemBase<TClient extends { readonly pd: ProtectionDomain }> {
  /** Short class name used in blob names and log context, e.g. `i2c`. */
  abstract readonly kind: string;
  protected readonly clientList: TClient[] = [];
  private current = SubsystemState.Created;

  protected constructor(readonly sdf: SystemDescription) {}

  /** Current lifecycle state. */
  get state(): SubsystemState {
    return this.current;
  }

  /** Clients in the order they were added; blobs and channels follow it. */
  get clients(): ReadonlyArray<TClient> {
    return this.clientList;
  }

  /** Driver, virtualisers and other PDs the subsystem is built around. */
  protected abstract corePds(): ReadonlyArray<ProtectionDomain>;

  /** Create every MR, map, channel and IRQ binding. Runs inside `tx`. */
  protected abstract wire(tx: Wiring): Result;

  /** Blobs to emit; only called once connected. */
  protected abstract blobs(): ReadonlyArray<ConfigBlob>;

  /** Embedded subsystems serialised together with this one. */
  protected embedded(): ReadonlyArray<SubsystemBase<{ readonly pd: ProtectionDomain }>> {
    return [];
  }

  // -------------------------------------------------------------------------
  // Clients
  // -------------------------------------------------------------------------

  /** InvalidState unless clients may still be added. */
  protected checkOpen(action: string): Result {
    if (this.current !== SubsystemState.Created && this.current !== SubsystemState.Configured) {
      return fail(
        ErrorKind.InvalidState,
        `cannot ${action} a ${this.kind} subsystem in state '${this.current}'`,
      );
    }
    return ok();
  }

  /**
   * Shared add-client checks: lifecycle, not a core PD, not already a
   * client. Returns the first failure.
   */
  protected checkClient(pd: ProtectionDomain): Result {
    const open = this.checkOpen('add a client to');
    if (!open.ok) return open;
    if (!this.sdf.isLive(pd)) {
      return fail(ErrorKind.UnknownEntity, `client '${pd.name}' has been destroyed`, this.kind);
    }
    if (this.corePds().includes(pd)) {
      return fail(
        ErrorKind.InvalidClient,
        `'${pd.name}' is part of the ${this.kind} subsystem and cannot be its client`,
      );
    }
    if (this.clientList.some((c) => c.pd === pd)) {
      return fail(ErrorKind.DuplicateClient, `'${pd.name}' is already a ${this.kind} client`);
    }
    return ok();
  }

  /** Append a client already validated by the subclass. */
  protected admit(client: TClient): void {
    this.clientList.push(client);
    this.current = SubsystemState.Configured;
    this.sdf.log.debug('subsystem.client_added', `added ${this.kind} client '${client.pd.name}'`, {
      subsystem: this.kind,
      client: client.pd.name,
    });
  }

  /** Log a rejected add-client and pass the failure through. */
  protected reject<T>(pd: ProtectionDomain, failure: Result<T>): Result<T> {
    if (!failure.ok) {
      this.sdf.log.warn('subsystem.client_rejected', failure.error.message, {
        subsystem: this.kind,
        client: pd.name,
        kind: failure.error.kind,
      });
    }
    return failure;
  }

  /**
   * @internal Remove a client during rollback of a composite connect.
   */
  withdraw(pd: ProtectionDomain): void {
    const at = this.clientList.findIndex((c) => c.pd === pd);
    if (at !== -1) this.clientList.splice(at, 1);
  }

  // -------------------------------------------------------------------------
  // Connect
  // -------------------------------------------------------------------------

  connect(): Result {
    const tx = this.sdf.begin();
    const connected = this.connectWithin(tx);
    if (!connected.ok) {
      tx.rollback();
      this.sdf.log.error('subsystem.connect_failed', connected.error.message, {
        subsystem: this.kind,
        kind: connected.error.kind,
      });
      return connected;
    }
    tx.commit();
    this.sdf.log.info('subsystem.connected', `connected ${this.kind} subsystem`, {
      subsystem: this.kind,
      clients: this.clientList.length,
    });
    return ok();
  }

  /**
   * @internal Connect as part of an enclosing transaction. Composites use
   * this for their embedded subsystems.
   */
  connectWithin(tx: Wiring): Result {
    const open = this.checkOpen('connect');
    if (!open.ok) return open;
    const involved = [...this.corePds(), ...this.clientList.map((c) => c.pd)];
    for (const pd of involved) {
      if (!this.sdf.isLive(pd)) {
        return fail(ErrorKind.UnknownEntity, `PD '${pd.name}' has been destroyed`, this.kind);
      }
    }
    const previous = this.current;
    const wired = this.wire(tx);
    if (!wired.ok) return wired;
    this.current = SubsystemState.Connected;
    tx.onRollback(() => {
      this.current = previous;
    });
    return ok();
  }

  // -------------------------------------------------------------------------
  // Serialise
  // -------------------------------------------------------------------------

  /** Write every blob to `sink`. Returns the names written, in order. */
  serializeConfig(sink: BlobSink): Result<ReadonlyArray<string>> {
    if (this.current !== SubsystemState.Connected && this.current !== SubsystemState.Serialised) {
      return fail(
        ErrorKind.InvalidState,
        `${this.kind} subsystem must be connected before serialising (state '${this.current}')`,
      );
    }
    const names: string[] = [];
    for (const sub of this.embedded()) {
      const written = sub.serializeConfig(sink);
      if (!written.ok) return written;
      names.push(...written.value);
    }
    for (const blob of this.blobs()) {
      try {
        sink.write(blob.name, blob.data);
      } catch (e) {
        return fail(
          ErrorKind.IOFailure,
          `failed to write ${blob.name}: ${e instanceof Error ? e.message : String(e)}`,
          this.kind,
        );
      }
      names.push(blob.name);
    }
    this.current = SubsystemState.Serialised;
    this.sdf.log.info('subsystem.serialised', `wrote ${names.length} ${this.kind} config blobs`, {
      subsystem: this.kind,
      blobs: names.length,
    });
    return ok(names);
  }
}
