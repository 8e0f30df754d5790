import { createServer, type Server, Socket } from 'node:net';
import { TransportError } from '@sensor-link/protocol';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TcpTransport } from '../src/transport.js';

function createEvents() {
  return {
    onConnected: vi.fn(),
    onData: vi.fn((_chunk: Uint8Array) => {}),
    onClosed: vi.fn((_error?: TransportError) => {}),
  };
}

describe('TcpTransport', () => {
  let server: Server;
  let port: number;
  let peers: Socket[];
  let received: number[];

  beforeEach(async () => {
    peers = [];
    received = [];
    server = createServer((socket) => {
      peers.push(socket);
      socket.on('data', (chunk: Buffer) => received.push(...chunk));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
  });

  afterEach(async () => {
    for (const peer of peers) peer.destroy();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should connect and exchange bytes', async () => {
    const transport = new TcpTransport();
    const events = createEvents();
    transport.connect('127.0.0.1', port, events);

    await vi.waitFor(() => expect(events.onConnected).toHaveBeenCalledTimes(1));
    transport.write(new Uint8Array([1, 2, 3]));
    await vi.waitFor(() => expect(received).toEqual([1, 2, 3]));

    peers[0]?.write(Buffer.from([4, 5]));
    await vi.waitFor(() => expect(events.onData).toHaveBeenCalled());
    const chunk = events.onData.mock.calls[0]?.[0];
    expect(chunk ? [...chunk] : []).toEqual([4, 5]);

    transport.close();
  });

  it('should report a clean close when the peer ends the stream', async () => {
    const transport = new TcpTransport();
    const events = createEvents();
    transport.connect('127.0.0.1', port, events);
    await vi.waitFor(() => expect(peers).toHaveLength(1));

    peers[0]?.end();

    await vi.waitFor(() => expect(events.onClosed).toHaveBeenCalledTimes(1));
    expect(events.onClosed.mock.calls[0]?.[0]).toBeUndefined();
    expect(transport.isClosed).toBe(true);
  });

  it('should report connect_failed when nothing listens', async () => {
    const closedPort = port;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    const transport = new TcpTransport();
    const events = createEvents();
    transport.connect('127.0.0.1', closedPort, events);

    await vi.waitFor(() => expect(events.onClosed).toHaveBeenCalledTimes(1));
    const error = events.onClosed.mock.calls[0]?.[0];
    expect(error).toBeInstanceOf(TransportError);
    expect(error?.code).toBe('connect_failed');
    expect(events.onConnected).not.toHaveBeenCalled();
  });

  it('should give up with connect_failed when the connect attempt times out', async () => {
    const transport = new TcpTransport({
      connectTimeoutMs: 20,
      createSocket: () => new Socket(),
    });
    const events = createEvents();
    transport.connect('sensor.invalid', 9000, events);

    await vi.waitFor(() => expect(events.onClosed).toHaveBeenCalledTimes(1));
    const error = events.onClosed.mock.calls[0]?.[0];
    expect(error?.code).toBe('connect_failed');
    expect(error?.message).toBe('connect to sensor.invalid:9000 timed out after 20ms');
    expect(events.onConnected).not.toHaveBeenCalled();
    expect(transport.isClosed).toBe(true);
  });

  it('should throw write_failed before the stream is connected', () => {
    const transport = new TcpTransport();
    expect(() => transport.write(new Uint8Array([1]))).toThrow(TransportError);
  });

  it('should refuse to connect twice and close idempotently', async () => {
    const transport = new TcpTransport();
    const events = createEvents();
    transport.connect('127.0.0.1', port, events);

    expect(() => transport.connect('127.0.0.1', port, events)).toThrow(/already used/);

    transport.close();
    transport.close();
    expect(transport.isClosed).toBe(true);
    await vi.waitFor(() => expect(events.onClosed).toHaveBeenCalledTimes(1));
  });
});
