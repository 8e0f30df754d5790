/**
 * @fileoverview Owner-facing facade over the sensor link.
 *
 * Creates one SensorConnection per requested pin, moves it into the
 * SessionRegistry once the pin is accepted, prunes it when its transport
 * dies, and translates connection outcomes into per-pin callbacks.
 */

import { PinSchema } from '@sensor-link/protocol';
import {
  type ConnectionPhase,
  DEFAULT_CONNECTION_CONFIG,
  type HandshakePolicy,
  type LinkOutcome,
  SensorConnection,
} from './SensorConnection.js';
import { SessionRegistry } from './SessionRegistry.js';
import { tcpTransportFactory, type TransportFactory } from './transport.js';
import { logger } from './utils/logger.js';

/**
 * Sensor monitor event handlers.
 */
export interface SensorMonitorEvents {
  /** The pin was accepted and readings will follow */
  onAuthorized?: (pin: string) => void;

  /** The pin was refused; the attempt is over */
  onRejected?: (pin: string) => void;

  /** A reading arrived for an authorized sensor */
  onSample?: (pin: string, value: number) => void;

  /** The connection failed (transport, protocol or remote error) */
  onError?: (pin: string, message: string) => void;

  /** An established connection went away */
  onConnectionLost?: (pin: string) => void;

  /** Every outcome, after the specific handler above */
  onOutcome?: (pin: string, outcome: LinkOutcome) => void;
}

/**
 * Sensor monitor configuration.
 */
export interface SensorMonitorConfig {
  /** Simulation host */
  host: string;
  /** Simulation port */
  port: number;
  /** Treatment of the first inbound message */
  handshakePolicy: HandshakePolicy;
  /** Readings kept per sensor */
  historyCapacity: number;
  /** Default timeout for requestConnectionAndWait */
  handshakeTimeoutMs: number;
}

/**
 * Default sensor monitor configuration.
 */
export const DEFAULT_MONITOR_CONFIG: SensorMonitorConfig = {
  host: DEFAULT_CONNECTION_CONFIG.host,
  port: DEFAULT_CONNECTION_CONFIG.port,
  handshakePolicy: DEFAULT_CONNECTION_CONFIG.handshakePolicy,
  historyCapacity: DEFAULT_CONNECTION_CONFIG.historyCapacity,
  handshakeTimeoutMs: 10_000,
};

/**
 * Read-only view of one sensor.
 */
export interface SensorSnapshot {
  readonly pin: string;
  readonly phase: ConnectionPhase;
  readonly authorized: boolean;
  readonly lastValue: number | null;
  readonly history: number[];
}

export type ConnectionRequestResult =
  | { readonly status: 'started'; readonly connection: SensorConnection }
  | { readonly status: 'already_exists' }
  | { readonly status: 'invalid_pin'; readonly message: string }
  | { readonly status: 'failed' };

export type ConnectAndWaitResult =
  | { readonly status: 'handshake_complete'; readonly connection: SensorConnection }
  | { readonly status: 'already_exists' }
  | { readonly status: 'invalid_pin'; readonly message: string }
  | { readonly status: 'timeout' }
  | { readonly status: 'failed' };

/**
 * The key a pin is stored under. Pins that would fail validation cannot be
 * stored, so they are looked up unchanged and simply not found.
 */
function normalizePin(pin: string): string {
  const parsed = PinSchema.safeParse(pin);
  return parsed.success ? parsed.data : pin;
}

/**
 * Sensor monitor: the single entry point for the operator-facing layer.
 */
export class SensorMonitor {
  private readonly registry = new SessionRegistry();
  private readonly pending = new Map<string, SensorConnection>();
  private readonly config: SensorMonitorConfig;

  constructor(
    private readonly events: SensorMonitorEvents = {},
    config: Partial<SensorMonitorConfig> = {},
    private readonly transportFactory: TransportFactory = tcpTransportFactory()
  ) {
    this.config = { ...DEFAULT_MONITOR_CONFIG, ...config };
  }

  // ============ Connection Management ============

  /**
   * Start connecting to the sensor behind `pin`. The pin request is sent as
   * soon as the handshake completes; the result arrives via the event handlers.
   */
  requestConnection(rawPin: string): ConnectionRequestResult {
    const parsed = PinSchema.safeParse(rawPin);
    if (!parsed.success) {
      return {
        status: 'invalid_pin',
        message: parsed.error.issues[0]?.message ?? 'invalid pin',
      };
    }

    const pin = parsed.data;
    if (this.registry.has(pin) || this.pending.has(pin)) {
      logger.warn('Sensor already connected', { pin });
      return { status: 'already_exists' };
    }

    const connection: SensorConnection = new SensorConnection(
      pin,
      this.transportFactory(),
      { onOutcome: (outcome) => this.handleOutcome(connection, outcome) },
      {
        host: this.config.host,
        port: this.config.port,
        handshakePolicy: this.config.handshakePolicy,
        historyCapacity: this.config.historyCapacity,
        autoRequestPin: true,
      }
    );

    this.pending.set(pin, connection);
    logger.info('Requesting sensor connection', { pin });
    connection.connect();
    if (connection.isClosed) {
      return { status: 'failed' };
    }

    return { status: 'started', connection };
  }

  /**
   * Procedural variant of requestConnection: resolves once the handshake has
   * completed. On timeout the attempt is closed so the pin can be retried.
   */
  async requestConnectionAndWait(
    pin: string,
    timeoutMs: number = this.config.handshakeTimeoutMs
  ): Promise<ConnectAndWaitResult> {
    const request = this.requestConnection(pin);
    if (request.status !== 'started') {
      return request;
    }

    const { connection } = request;
    const completed = await connection.waitForHandshake(timeoutMs);
    if (completed) {
      return { status: 'handshake_complete', connection };
    }

    if (connection.isClosed) {
      return { status: 'failed' };
    }

    logger.warn('Handshake timed out', { pin: connection.pin, timeoutMs });
    this.pending.delete(connection.pin);
    connection.close();
    return { status: 'timeout' };
  }

  /**
   * Close the connection for `pin`, pending or authorized.
   * @returns false if there was nothing to disconnect
   */
  disconnect(rawPin: string): boolean {
    const pin = normalizePin(rawPin);
    const connection = this.registry.get(pin) ?? this.pending.get(pin);
    if (!connection) {
      return false;
    }

    connection.close();
    this.registry.remove(pin);
    this.pending.delete(pin);
    logger.info('Sensor disconnected', { pin });
    return true;
  }

  /**
   * Whether any authorized sensor still has a live connection.
   */
  isAnyConnected(): boolean {
    return this.registry.anyConnected();
  }

  /**
   * Drop authorized sensors whose transport has closed.
   */
  pruneDead(): string[] {
    const removed = this.registry.removeDead();
    if (removed.length > 0) {
      logger.info('Pruned dead sensors', { pins: removed });
    }
    return removed;
  }

  /**
   * Close every connection.
   */
  dispose(): void {
    for (const connection of this.pending.values()) {
      connection.close();
    }
    this.pending.clear();
    this.registry.closeAll();
  }

  // ============ Queries ============

  getSensor(rawPin: string): SensorSnapshot | undefined {
    const pin = normalizePin(rawPin);
    const connection = this.registry.get(pin) ?? this.pending.get(pin);
    return connection ? this.snapshot(connection) : undefined;
  }

  /**
   * Authorized sensors first (in the order they were authorized), then
   * pending attempts.
   */
  listSensors(): SensorSnapshot[] {
    return [...this.registry.list(), ...this.pending.values()].map((c) => this.snapshot(c));
  }

  // ============ Private Methods ============

  private snapshot(connection: SensorConnection): SensorSnapshot {
    return {
      pin: connection.pin,
      phase: connection.phase,
      authorized: this.registry.get(connection.pin) === connection,
      lastValue: connection.lastValue ?? null,
      history: connection.history.values(),
    };
  }

  private handleOutcome(connection: SensorConnection, outcome: LinkOutcome): void {
    const { pin } = connection;

    switch (outcome.type) {
      case 'authorized': {
        this.pending.delete(pin);
        const result = this.registry.addIfAbsent(pin, () => connection);
        if (result.connection !== connection) {
          logger.warn('Duplicate authorization, closing newer connection', { pin });
          connection.close();
          return;
        }
        logger.info('Sensor authorized', { pin });
        this.events.onAuthorized?.(pin);
        break;
      }

      case 'rejected':
        this.pending.delete(pin);
        logger.warn('Sensor pin rejected', { pin });
        this.events.onRejected?.(pin);
        break;

      case 'sample':
        this.events.onSample?.(pin, outcome.value);
        break;

      case 'error':
        this.dropConnection(connection);
        logger.error('Sensor connection error', { pin, error: outcome.message });
        this.events.onError?.(pin, outcome.message);
        break;

      case 'connection_lost':
        this.dropConnection(connection);
        this.events.onConnectionLost?.(pin);
        break;
    }

    this.events.onOutcome?.(pin, outcome);
  }

  private dropConnection(connection: SensorConnection): void {
    if (this.pending.get(connection.pin) === connection) {
      this.pending.delete(connection.pin);
    }
    this.pruneDead();
  }
}
