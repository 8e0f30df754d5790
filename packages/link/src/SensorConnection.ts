/**
 * @fileoverview Per-sensor connection state machine.
 *
 * Handles:
 * - Transport lifecycle (connect, data, closed)
 * - Handshake (connect sent, first response acknowledges)
 * - Pin authorization (accepted → streaming, rejected → terminal)
 * - Sample delivery and bounded history
 * - Error and close handling local to this one connection
 *
 * Phases:
 *
 *   idle → connecting → awaiting_handshake → authorizing → streaming
 *                                                 └──────→ rejected
 *   any phase ──────────────────────────────────────────→ closed
 */

import {
  connectMessage,
  describeError,
  encodeFrame,
  FrameDecoder,
  isAccepted,
  MAX_MESSAGE_SIZE,
  type Message,
  pinRequest,
  StateError,
  type TransportError,
} from '@sensor-link/protocol';
import { DEFAULT_HISTORY_CAPACITY, SensorHistory } from './SensorHistory.js';
import type { Transport } from './transport.js';
import { createLogger, type Logger } from './utils/logger.js';

/**
 * Lifecycle phase of a sensor connection.
 */
export type ConnectionPhase =
  | 'idle'
  | 'connecting'
  | 'awaiting_handshake'
  | 'authorizing'
  | 'streaming'
  | 'rejected'
  | 'closed';

/**
 * How the first inbound message after connecting is treated.
 * - `lenient`: any message acknowledges the handshake
 * - `strict`: only a pin_response does; anything else closes the connection
 */
export type HandshakePolicy = 'lenient' | 'strict';

/**
 * Outcomes reported to the owner. Control outcomes never share a channel
 * with sensor readings.
 */
export type LinkOutcome =
  | { readonly type: 'authorized' }
  | { readonly type: 'rejected' }
  | { readonly type: 'sample'; readonly value: number }
  | { readonly type: 'error'; readonly message: string }
  | { readonly type: 'connection_lost' };

/**
 * Sensor connection event handlers.
 */
export interface SensorConnectionEvents {
  /** Called for every outcome, in the order they happen */
  onOutcome?: (outcome: LinkOutcome) => void;

  /** Called whenever the phase changes */
  onPhaseChange?: (phase: ConnectionPhase, previous: ConnectionPhase) => void;
}

/**
 * Sensor connection configuration.
 */
export interface SensorConnectionConfig {
  /** Simulation host */
  host: string;
  /** Simulation port */
  port: number;
  /** Treatment of the first inbound message */
  handshakePolicy: HandshakePolicy;
  /** Send the pin request automatically once the handshake completes */
  autoRequestPin: boolean;
  /** Number of readings kept in history */
  historyCapacity: number;
  /** Largest inbound frame accepted */
  maxFrameSize: number;
}

/**
 * Default sensor connection configuration.
 */
export const DEFAULT_CONNECTION_CONFIG: SensorConnectionConfig = {
  host: 'localhost',
  port: 8080,
  handshakePolicy: 'lenient',
  autoRequestPin: false,
  historyCapacity: DEFAULT_HISTORY_CAPACITY,
  maxFrameSize: MAX_MESSAGE_SIZE,
};

const HANDSHAKE_COMPLETE_PHASES: ReadonlySet<ConnectionPhase> = new Set([
  'authorizing',
  'streaming',
  'rejected',
]);

type HandshakeWaiter = (completed: boolean) => void;

/**
 * Connection to one sensor of the simulation, identified by its pin.
 * Owns exactly one transport for its whole lifetime.
 */
export class SensorConnection {
  private currentPhase: ConnectionPhase = 'idle';
  private readonly decoder: FrameDecoder;
  private readonly valueHistory: SensorHistory;
  private readonly waiters = new Set<HandshakeWaiter>();
  private readonly config: SensorConnectionConfig;
  private readonly log: Logger;
  private latestValue: number | undefined;

  constructor(
    readonly pin: string,
    private readonly transport: Transport,
    private readonly events: SensorConnectionEvents = {},
    config: Partial<SensorConnectionConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
    this.decoder = new FrameDecoder(this.config.maxFrameSize);
    this.valueHistory = new SensorHistory(this.config.historyCapacity);
    this.log = createLogger(`link:${pin}`);
  }

  // ============ State ============

  get phase(): ConnectionPhase {
    return this.currentPhase;
  }

  /**
   * Whether the handshake has been acknowledged by the remote end.
   */
  get handshakeComplete(): boolean {
    return HANDSHAKE_COMPLETE_PHASES.has(this.currentPhase);
  }

  get isStreaming(): boolean {
    return this.currentPhase === 'streaming';
  }

  /**
   * Whether this connection will never carry data again (closed or rejected).
   */
  get isClosed(): boolean {
    return this.currentPhase === 'closed' || this.currentPhase === 'rejected';
  }

  get lastValue(): number | undefined {
    return this.latestValue;
  }

  get history(): SensorHistory {
    return this.valueHistory;
  }

  // ============ Operations ============

  /**
   * Start connecting. Frames are only sent once the transport reports connected.
   * @throws {StateError} `not_idle` if called more than once
   */
  connect(): void {
    if (this.currentPhase !== 'idle') {
      throw new StateError('not_idle', `cannot connect from phase ${this.currentPhase}`);
    }

    this.setPhase('connecting');
    this.log.debug('Connecting', { host: this.config.host, port: this.config.port });

    try {
      this.transport.connect(this.config.host, this.config.port, {
        onConnected: () => this.handleConnected(),
        onData: (chunk) => this.handleData(chunk),
        onClosed: (error) => this.handleTransportClosed(error),
      });
    } catch (err) {
      this.fail(`connect failed: ${describeError(err)}`);
    }
  }

  /**
   * Ask the remote end for access to this connection's sensor.
   * @throws {StateError} `not_ready` before the handshake completes or after close
   * @throws {EncodingError} if the pin does not fit the wire format
   */
  sendPinRequest(): void {
    if (this.currentPhase !== 'authorizing' && this.currentPhase !== 'streaming') {
      throw new StateError('not_ready', `cannot send pin request in phase ${this.currentPhase}`);
    }

    const frame = encodeFrame(pinRequest(this.pin));
    this.log.debug('Sending pin request');
    this.writeFrame(frame);
  }

  /**
   * Resolve true once the handshake has completed, false on timeout or close.
   * A timeout leaves the connection as it is; the caller may keep waiting,
   * close it, or start over with a fresh connection.
   */
  waitForHandshake(timeoutMs: number): Promise<boolean> {
    if (this.handshakeComplete) return Promise.resolve(true);
    if (this.isClosed) return Promise.resolve(false);

    return new Promise((resolve) => {
      const settle: HandshakeWaiter = (completed) => {
        clearTimeout(timer);
        this.waiters.delete(settle);
        resolve(completed);
      };
      const timer = setTimeout(() => {
        this.log.debug('Handshake wait timed out', { timeoutMs });
        settle(false);
      }, timeoutMs);
      this.waiters.add(settle);
    });
  }

  /**
   * Release the transport and move to closed. Pending handshake waits resolve
   * false. Closing twice is a no-op.
   */
  close(): void {
    if (this.currentPhase === 'closed') return;
    this.log.debug('Closing');
    this.setPhase('closed');
    this.transport.close();
  }

  // ============ Transport Events ============

  private handleConnected(): void {
    if (this.currentPhase !== 'connecting') return;

    this.log.info('Transport connected, sending handshake');
    this.setPhase('awaiting_handshake');
    this.writeFrame(encodeFrame(connectMessage()));
  }

  private handleData(chunk: Uint8Array): void {
    if (this.isClosed) return;

    this.decoder.append(chunk);
    while (!this.isClosed) {
      let message: Message | undefined;
      try {
        message = this.decoder.next();
      } catch (err) {
        this.fail(`protocol error: ${describeError(err)}`);
        return;
      }
      if (!message) return;
      this.handleMessage(message);
    }
  }

  private handleTransportClosed(error?: TransportError): void {
    if (this.isClosed) return;

    if (this.currentPhase === 'connecting') {
      this.fail(error?.message ?? 'connection closed before it was established');
      return;
    }

    this.log.warn('Connection lost', error ? { error: error.message } : undefined);
    this.setPhase('closed');
    this.emit({ type: 'connection_lost' });
  }

  // ============ Message Handling ============

  private handleMessage(message: Message): void {
    if (message.type === 'error_state') {
      this.fail(message.error || 'remote error');
      return;
    }

    switch (this.currentPhase) {
      case 'awaiting_handshake':
        this.handleHandshake(message);
        break;

      case 'authorizing':
        this.handleAuthorizing(message);
        break;

      case 'streaming':
        this.handleStreaming(message);
        break;

      default:
        this.log.debug('Ignoring message', { type: message.type, phase: this.currentPhase });
    }
  }

  private handleHandshake(message: Message): void {
    if (this.config.handshakePolicy === 'strict' && message.type !== 'pin_response') {
      this.fail(`protocol violation: expected pin_response as handshake, got ${message.type}`);
      return;
    }

    this.log.info('Handshake complete', { via: message.type });
    this.setPhase('authorizing');

    if (this.config.autoRequestPin) {
      try {
        this.sendPinRequest();
      } catch (err) {
        this.fail(`pin request failed: ${describeError(err)}`);
      }
    }
  }

  private handleAuthorizing(message: Message): void {
    if (message.type !== 'pin_response') {
      this.log.debug('Ignoring message before authorization', { type: message.type });
      return;
    }

    if (isAccepted(message)) {
      this.log.info('Pin accepted');
      this.setPhase('streaming');
      this.emit({ type: 'authorized' });
    } else {
      this.log.warn('Pin rejected', { value: message.value });
      this.setPhase('rejected');
      this.transport.close();
      this.emit({ type: 'rejected' });
    }
  }

  private handleStreaming(message: Message): void {
    if (message.type !== 'sensor_data') {
      this.log.debug('Ignoring message while streaming', { type: message.type });
      return;
    }

    this.latestValue = message.value;
    this.valueHistory.push(message.value);
    this.emit({ type: 'sample', value: message.value });
  }

  // ============ Private Methods ============

  private writeFrame(frame: Uint8Array): void {
    try {
      this.transport.write(frame);
    } catch (err) {
      this.fail(`write failed: ${describeError(err)}`);
    }
  }

  /**
   * Close this connection because of an error and report it once.
   */
  private fail(message: string): void {
    if (this.isClosed) return;

    this.log.error('Connection failed', { error: message, phase: this.currentPhase });
    this.setPhase('closed');
    this.transport.close();
    this.emit({ type: 'error', message });
  }

  private setPhase(phase: ConnectionPhase): void {
    const previous = this.currentPhase;
    if (previous === phase) return;

    this.currentPhase = phase;
    this.events.onPhaseChange?.(phase, previous);

    if (HANDSHAKE_COMPLETE_PHASES.has(phase) || phase === 'closed') {
      const completed = phase !== 'closed';
      for (const settle of [...this.waiters]) {
        settle(completed);
      }
    }
  }

  private emit(outcome: LinkOutcome): void {
    this.events.onOutcome?.(outcome);
  }
}
