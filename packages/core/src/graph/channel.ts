/**
 * sdfkit Core: Channels
 */

/** Which end of a channel may make protected procedure calls into the other. */
export type ChannelSide = 'a' | 'b';

export interface ChannelOptions {
  /** Fixed local id on PD A. */
  readonly idA?: number;
  /** Fixed local id on PD B. */
  readonly idB?: number;
  readonly notifyA?: boolean;
  readonly notifyB?: boolean;
  readonly pp?: ChannelSide;
}

/**
 * A notification/IPC link between two PDs. Endpoints are referenced by
 * entity id; the end ids are the local ids allocated in each PD.
 */
export class Channel {
  constructor(
    readonly id: number,
    readonly pdA: number,
    readonly pdB: number,
    readonly endA: number,
    readonly endB: number,
    readonly notifyA: boolean,
    readonly notifyB: boolean,
    readonly pp: ChannelSide | undefined,
  ) {}

  involves(pdId: number): boolean {
    return this.pdA === pdId || this.pdB === pdId;
  }

  /** Local id of the end held by `pdId`. */
  endOf(pdId: number): number | undefined {
    if (this.pdA === pdId) return this.endA;
    if (this.pdB === pdId) return this.endB;
    return undefined;
  }
}
