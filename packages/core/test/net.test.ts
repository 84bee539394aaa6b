/**
 * sdfkit Core: Network Subsystem Tests
 *
 *   NET-U1: MAC addresses parse, format and reject reserved values
 *   NET-U2: generated MACs are locally administered unicast and avoid clashes
 *   NET-U3: copier and MAC uniqueness rules on addClient
 *   NET-U4: connect creates 2 + BigInt(2) channels, plus one per TX client
 *   NET-U5: blobs are named per role and per PD
 *   NET-U6: the client blob holds its RX connection, data region and MAC
 *   NET-U7: the RX virtualiser blob lists client MACs
 *   NET-U8: a caller-provided RX DMA region must hold every buffer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ErrorKind,
  NET_BUFFER_SIZE,
  NetSystem,
  formatMac,
  generateMac,
  parseMac,
  type ProtectionDomain,
  type SystemDescription,
} from '../src/index.js';
import { MemoryBlobSink, addPd, errorOf, newSystem, unwrap } from './fixtures.js';

let sdf: SystemDescription;
let driver: ProtectionDomain;
let virtRx: ProtectionDomain;
let virtTx: ProtectionDomain;

beforeEach(() => {
  sdf = newSystem();
  driver = addPd(sdf, 'eth_driver', { priority: 200 });
  virtRx = addPd(sdf, 'net_virt_rx', { priority: 199 });
  virtTx = addPd(sdf, 'net_virt_tx', { priority: 199 });
});

function newNet(): NetSystem {
  return unwrap(NetSystem.create(sdf, { driver, virtRx, virtTx }));
}

// ---------------------------------------------------------------------------
// MAC addresses
// ---------------------------------------------------------------------------

describe('MAC addresses', () => {
  it('NET-U1: parses text and octets', () => {
    expect([...unwrap(parseMac('AA:bb:0c:dd:ee:01'))]).toEqual([0xaa, 0xbb, 0x0c, 0xdd, 0xee, 0x01]);
    expect(formatMac(unwrap(parseMac([1, 2, 3, 4, 5, 0xff])))).toBe('01:02:03:04:05:ff');
  });

  it('NET-U1: rejects malformed and reserved addresses', () => {
    expect(errorOf(parseMac('aa:bb:cc:dd:ee'))).toBe(ErrorKind.InvalidAddress);
    expect(errorOf(parseMac('aa-bb-cc-dd-ee-ff'))).toBe(ErrorKind.InvalidAddress);
    expect(errorOf(parseMac([1, 2, 3, 4, 5, 256]))).toBe(ErrorKind.InvalidAddress);
    expect(errorOf(parseMac('00:00:00:00:00:00'))).toBe(ErrorKind.InvalidAddress);
    expect(errorOf(parseMac('ff:ff:ff:ff:ff:ff'))).toBe(ErrorKind.InvalidAddress);
  });

  it('NET-U2: generates stable locally administered unicast addresses', () => {
    const mac = generateMac('client1', new Set());
    expect(mac).toHaveLength(6);
    expect((mac[0] ?? 0) & 0x02).toBe(0x02);
    expect((mac[0] ?? 0) & 0x01).toBe(0);
    expect(formatMac(generateMac('client1', new Set()))).toBe(formatMac(mac));
  });

  it('NET-U2: re-derives when the address is taken', () => {
    const first = formatMac(generateMac('client1', new Set()));
    const second = formatMac(generateMac('client1', new Set([first])));
    expect(second).not.toBe(first);
  });
});

// ---------------------------------------------------------------------------
// Clients
// ---------------------------------------------------------------------------

describe('NetSystem clients', () => {
  it('NET-U3: a copier serves exactly one client', () => {
    const net = newNet();
    const copier = addPd(sdf, 'copy');
    unwrap(net.addClient(addPd(sdf, 'client1'), { copier }));
    expect(errorOf(net.addClient(addPd(sdf, 'client2'), { copier }))).toBe(ErrorKind.DuplicateClient);
  });

  it('NET-U3: a PD cannot copy for itself or for the subsystem', () => {
    const net = newNet();
    const client = addPd(sdf, 'client1');
    expect(errorOf(net.addClient(client, { copier: client }))).toBe(ErrorKind.InvalidClient);
    expect(errorOf(net.addClient(client, { copier: virtRx }))).toBe(ErrorKind.InvalidClient);

    const copier = addPd(sdf, 'copy');
    unwrap(net.addClient(client, { copier }));
    expect(errorOf(net.addClient(copier, { copier: addPd(sdf, 'copy2') }))).toBe(ErrorKind.InvalidClient);
  });

  it('NET-U3: MAC addresses are unique across clients', () => {
    const net = newNet();
    unwrap(net.addClient(addPd(sdf, 'client1'), { copier: addPd(sdf, 'copy1'), macAddr: '02:00:00:00:00:01' }));
    const clash = net.addClient(addPd(sdf, 'client2'), {
      copier: addPd(sdf, 'copy2'),
      macAddr: [2, 0, 0, 0, 0, 1],
    });
    expect(errorOf(clash)).toBe(ErrorKind.DuplicateClient);
    expect(net.clients.map((c) => c.pd.name)).toEqual(['client1']);
    expect(
      errorOf(net.addClient(addPd(sdf, 'client3'), { copier: addPd(sdf, 'copy3'), macAddr: 'nope' })),
    ).toBe(ErrorKind.InvalidAddress);
  });

  it('NET-U8: rejects an RX DMA region too small for the buffers', () => {
    const small = unwrap(sdf.createMr('dma', 0x1000));
    const options = { rxBuffers: 4, rxDma: small };
    expect(errorOf(NetSystem.create(sdf, { driver, virtRx, virtTx, options }))).toBe(ErrorKind.InvalidArgument);
    const fits = unwrap(sdf.createMr('dma2', 4 * NET_BUFFER_SIZE));
    unwrap(NetSystem.create(sdf, { driver, virtRx, virtTx, options: { rxBuffers: 4, rxDma: fits } }));
  });
});

// ---------------------------------------------------------------------------
// Wiring and blobs
// ---------------------------------------------------------------------------

describe('NetSystem wiring', () => {
  it('NET-U4: creates channels per client and per TX path', () => {
    const net = newNet();
    unwrap(net.addClient(addPd(sdf, 'client1'), { copier: addPd(sdf, 'copy1'), tx: true }));
    unwrap(net.addClient(addPd(sdf, 'client2'), { copier: addPd(sdf, 'copy2') }));
    unwrap(net.connect());
    expect(sdf.channels).toHaveLength(2 + 2 * 2 + 1);
  });

  it('NET-U5: names each blob by role', () => {
    const net = newNet();
    unwrap(net.addClient(addPd(sdf, 'client1'), { copier: addPd(sdf, 'copy1') }));
    unwrap(net.connect());
    const sink = new MemoryBlobSink();

    expect(unwrap(net.serializeConfig(sink))).toEqual([
      'net_driver_eth_driver.data',
      'net_virt_rx_net_virt_rx.data',
      'net_virt_tx_net_virt_tx.data',
      'net_copy_copy1.data',
      'net_client_client1.data',
    ]);
  });

  it('NET-U6: the client blob holds RX queues, data and the MAC', () => {
    const net = newNet();
    unwrap(
      net.addClient(addPd(sdf, 'client1'), { copier: addPd(sdf, 'copy1'), macAddr: 'aa:bb:cc:dd:ee:01' }),
    );
    unwrap(net.connect());
    const sink = new MemoryBlobSink();
    unwrap(net.serializeConfig(sink));

    const blob = sink.get('net_client_client1.data');
    expect(blob).toHaveLength(120);
    expect(blob.readBigUInt64LE(0)).toBe(BigInt(0x10000000));
    expect(blob.readBigUInt64LE(8)).toBe(BigInt(0x3000));
    expect(blob.readBigUInt64LE(16)).toBe(BigInt(0x10003000));
    expect(blob.readUInt16LE(32)).toBe(512);
    expect(blob[34]).toBe(0);
    expect(blob.readBigUInt64LE(40)).toBe(BigInt(0x10006000));
    expect(blob.readBigUInt64LE(48)).toBe(BigInt(0x100000));
    expect(blob.readBigUInt64LE(56)).toBe(BigInt(0));
    expect([...blob.subarray(112, 118)]).toEqual([0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0x01]);
  });

  it('NET-U6: a TX client gets its transmit connection', () => {
    const net = newNet();
    unwrap(net.addClient(addPd(sdf, 'client1'), { copier: addPd(sdf, 'copy1'), tx: true }));
    unwrap(net.connect());
    const sink = new MemoryBlobSink();
    unwrap(net.serializeConfig(sink));

    const blob = sink.get('net_client_client1.data');
    expect(blob.readBigUInt64LE(56)).toBe(BigInt(0x10106000));
    expect(blob[90]).toBe(1);
    expect(blob.readBigUInt64LE(96)).toBe(BigInt(0x1010c000));
  });

  it('NET-U7: generated MACs appear in the RX virtualiser blob', () => {
    const net = newNet();
    unwrap(net.addClient(addPd(sdf, 'client1'), { copier: addPd(sdf, 'copy1') }));
    expect(net.macAddresses()).toEqual(['']);
    unwrap(net.connect());

    const [mac] = net.macAddresses();
    expect(mac).toBe(formatMac(generateMac('client1', new Set())));
    const sink = new MemoryBlobSink();
    unwrap(net.serializeConfig(sink));
    const blob = sink.get('net_virt_rx_net_virt_rx.data');
    expect(blob[80]).toBe(1);
    expect(formatMac(blob.subarray(128, 134))).toBe(mac);
  });
});
