/**
 * @fileoverview Byte-stream transport abstraction and its TCP implementation.
 *
 * A transport delivers raw chunks with no message boundaries. All callbacks
 * run on the Node event loop, the same context that owns the connection
 * state and the session registry, so no locking is involved.
 */

import { createConnection, type Socket } from 'node:net';
import { describeError, TransportError } from '@sensor-link/protocol';

/**
 * Notifications a transport delivers to its owner.
 */
export interface TransportEvents {
  /** The stream is established and writable */
  onConnected(): void;
  /** A chunk of bytes arrived; may hold part of a frame or several frames */
  onData(chunk: Uint8Array): void;
  /** The stream is gone. `error` is set when it ended because of a failure */
  onClosed(error?: TransportError): void;
}

/**
 * Socket-like interface for the link layer.
 * Allows testing without real sockets.
 */
export interface Transport {
  /** Start an asynchronous connect; progress is reported through `events` */
  connect(host: string, port: number, events: TransportEvents): void;
  /**
   * Queue bytes for sending.
   * @throws {TransportError} `write_failed` if the stream is not writable
   */
  write(data: Uint8Array): void;
  /** Release the stream. Safe to call more than once */
  close(): void;
  /** Whether the stream has been released */
  readonly isClosed: boolean;
}

/**
 * Factory so each connection gets its own transport.
 */
export type TransportFactory = () => Transport;

export interface TcpTransportOptions {
  /** Abort the connect attempt after this many milliseconds (0 disables) */
  connectTimeoutMs?: number;
  /** Disable Nagle's algorithm; frames are small and latency-sensitive */
  noDelay?: boolean;
  /** Opens the socket for a connect attempt */
  createSocket?: (host: string, port: number) => Socket;
}

export const DEFAULT_TCP_OPTIONS: Required<TcpTransportOptions> = {
  connectTimeoutMs: 5000,
  noDelay: true,
  createSocket: (host, port) => createConnection({ host, port }),
};

/**
 * Transport over a `node:net` socket.
 */
export class TcpTransport implements Transport {
  private socket: Socket | null = null;
  private closed = false;
  private connected = false;
  private failure: TransportError | undefined;
  private readonly options: Required<TcpTransportOptions>;

  constructor(options: TcpTransportOptions = {}) {
    this.options = { ...DEFAULT_TCP_OPTIONS, ...options };
  }

  connect(host: string, port: number, events: TransportEvents): void {
    if (this.socket || this.closed) {
      throw new TransportError('connect_failed', 'transport already used');
    }

    const socket = this.options.createSocket(host, port);
    this.socket = socket;

    if (this.options.connectTimeoutMs > 0) {
      socket.setTimeout(this.options.connectTimeoutMs);
    }

    socket.on('connect', () => {
      this.connected = true;
      socket.setTimeout(0);
      socket.setNoDelay(this.options.noDelay);
      events.onConnected();
    });

    socket.on('timeout', () => {
      if (!this.connected) {
        this.failure = new TransportError(
          'connect_failed',
          `connect to ${host}:${port} timed out after ${this.options.connectTimeoutMs}ms`
        );
        socket.destroy();
      }
    });

    socket.on('data', (chunk: Buffer) => {
      events.onData(chunk);
    });

    socket.on('error', (err: Error) => {
      this.failure ??= new TransportError(
        this.connected ? 'closed' : 'connect_failed',
        this.connected
          ? `connection error: ${err.message}`
          : `connect to ${host}:${port} failed: ${err.message}`,
        { cause: err }
      );
    });

    socket.on('close', () => {
      this.closed = true;
      this.socket = null;
      events.onClosed(this.failure);
    });
  }

  write(data: Uint8Array): void {
    const socket = this.socket;
    if (!socket || !this.connected || socket.destroyed) {
      throw new TransportError('write_failed', 'cannot write: transport not connected');
    }
    try {
      socket.write(data);
    } catch (err) {
      throw new TransportError('write_failed', `write failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket?.destroy();
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Default factory producing TCP transports.
 */
export function tcpTransportFactory(options: TcpTransportOptions = {}): TransportFactory {
  return () => new TcpTransport(options);
}
