/**
 * sdfkit Core: File System Config Layout
 */

import { EMPTY_REGION, writeRegion, type RegionResource } from './common.js';
import { StructWriter } from './struct-writer.js';

export const NFS_STRING_LEN = 256;

export interface FsConnection {
  readonly commandQueue: RegionResource;
  readonly completionQueue: RegionResource;
  readonly share: RegionResource;
  readonly queueLen: number;
  readonly id: number;
}

export const EMPTY_FS_CONNECTION: FsConnection = {
  commandQueue: EMPTY_REGION,
  completionQueue: EMPTY_REGION,
  share: EMPTY_REGION,
  queueLen: 0,
  id: 0,
};

export interface NfsConfig {
  readonly server: string;
  readonly exportPath: string;
}

function writeConnection(w: StructWriter, conn: FsConnection): void {
  w.struct(8, () => {
    writeRegion(w, conn.commandQueue);
    writeRegion(w, conn.completionQueue);
    writeRegion(w, conn.share);
    w.u16(conn.queueLen).u8(conn.id);
  });
}

/** Server blob; NFS servers append their mount settings. */
export function encodeFsServer(client: FsConnection, nfs?: NfsConfig): Uint8Array {
  const w = new StructWriter();
  writeConnection(w, client);
  if (nfs) {
    w.struct(8, () => {
      w.cstring(nfs.server, NFS_STRING_LEN).cstring(nfs.exportPath, NFS_STRING_LEN);
    });
  }
  return w.finish();
}

export function encodeFsClient(server: FsConnection): Uint8Array {
  const w = new StructWriter();
  writeConnection(w, server);
  return w.finish();
}
