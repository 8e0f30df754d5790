/**
 * @fileoverview TCP server that exposes a SimulatorRuntime.
 */

import { createServer, type Socket } from 'node:net';
import { createLogger } from '@sensor-link/client';
import type { SimulatedSensorConfig } from './config.js';
import { type Peer, SimulatorRuntime, type SimulatorRuntimeOptions } from './SimulatorRuntime.js';

const log = createLogger('simulator');

/**
 * Configuration for creating a simulator server.
 */
export interface SimulatorServerConfig {
  /** Port to listen on; 0 picks a free one */
  readonly port: number;
  /** Interface to bind (default: 0.0.0.0) */
  readonly host?: string;
  /** Sensors the simulation exposes */
  readonly sensors: readonly SimulatedSensorConfig[];
  /** Random source and clock for the runtime */
  readonly runtimeOptions?: SimulatorRuntimeOptions;
}

/**
 * Running simulator server instance.
 */
export interface SimulatorServer {
  /** The underlying SimulatorRuntime */
  readonly runtime: SimulatorRuntime;

  /** Port the server is listening on */
  readonly port: number;

  /** Close every session and stop listening */
  stop(): Promise<void>;
}

/**
 * Adapt a socket to a Peer. close() ends the stream gracefully so frames
 * written just before it still reach the client.
 */
function socketPeer(socket: Socket): Peer {
  return {
    write: (data) => {
      socket.write(data);
    },
    close: () => {
      socket.end();
    },
    get isClosed() {
      return socket.destroyed || socket.writableEnded;
    },
  };
}

/**
 * Create and start a simulator server.
 *
 * @example
 * ```typescript
 * const server = await createSimulatorServer({
 *   port: 8080,
 *   sensors: [{ pin: '4711', intervalMs: 500, generator: { kind: 'constant', value: 21 } }],
 * });
 *
 * // Later: graceful shutdown
 * await server.stop();
 * ```
 */
export async function createSimulatorServer(
  config: SimulatorServerConfig
): Promise<SimulatorServer> {
  const runtime = new SimulatorRuntime(config.sensors, config.runtimeOptions);
  const host = config.host ?? '0.0.0.0';
  const sockets = new Set<Socket>();

  const server = createServer((socket) => {
    sockets.add(socket);
    socket.setNoDelay(true);
    const peer = socketPeer(socket);
    runtime.handleConnection(peer);

    socket.on('data', (chunk: Buffer) => {
      runtime.handleData(peer, chunk);
    });

    socket.on('close', () => {
      sockets.delete(socket);
      runtime.handleDisconnection(peer);
    });

    socket.on('error', (error: Error) => {
      log.warn('Socket error', { error: error.message });
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : config.port;
  log.info('Simulator listening', { host, port, sensors: config.sensors.map((s) => s.pin) });

  return {
    runtime,
    port,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        runtime.stop();
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          log.info('Simulator stopped');
          resolve();
        });
      }),
  };
}
