/**
 * @fileoverview Simulation side of the sensor link.
 *
 * Handles:
 * - Handshake acknowledgement (connect → pin_response 1)
 * - Pin checks against the configured sensors
 * - Periodic sensor_data for an accepted pin
 * - Error injection and session teardown
 *
 * Transport-agnostic: the server feeds it peers and raw chunks, tests feed
 * it mock peers.
 */

import { createLogger } from '@sensor-link/client';
import {
  describeError,
  encodeFrame,
  errorState,
  FrameDecoder,
  type Message,
  pinResponse,
  sensorData,
} from '@sensor-link/protocol';
import type { SimulatedSensorConfig } from './config.js';
import { createGenerator, type ValueGenerator } from './generators.js';

const log = createLogger('simulator');

/**
 * Socket-like interface for the remote end of one link.
 * Allows testing without real sockets.
 */
export interface Peer {
  /** Send raw bytes to the peer */
  write(data: Uint8Array): void;
  /** Close the peer's stream */
  close(): void;
  /** Whether the stream has been closed */
  readonly isClosed: boolean;
}

export type SimulatorSessionPhase = 'awaiting_connect' | 'awaiting_pin' | 'streaming';

/**
 * Read-only view of one simulator session.
 */
export interface SimulatorSession {
  readonly id: number;
  readonly phase: SimulatorSessionPhase;
  readonly pin: string | undefined;
  readonly samplesSent: number;
}

export interface SimulatorRuntimeOptions {
  /** Random source for `random` generators */
  random?: () => number;
  /** Clock used for elapsed time in generators */
  now?: () => number;
}

interface SimulatedSensor {
  readonly intervalMs: number;
  readonly generate: ValueGenerator;
}

interface SessionState {
  readonly id: number;
  readonly peer: Peer;
  readonly decoder: FrameDecoder;
  phase: SimulatorSessionPhase;
  pin: string | undefined;
  timer: ReturnType<typeof setInterval> | null;
  startedAt: number;
  samplesSent: number;
}

export class SimulatorRuntime {
  private readonly sessions = new Map<Peer, SessionState>();
  private readonly sensors = new Map<string, SimulatedSensor>();
  private readonly now: () => number;
  private nextSessionId = 1;

  constructor(sensors: readonly SimulatedSensorConfig[], options: SimulatorRuntimeOptions = {}) {
    this.now = options.now ?? Date.now;
    for (const sensor of sensors) {
      this.sensors.set(sensor.pin, {
        intervalMs: sensor.intervalMs,
        generate: createGenerator(sensor.generator, options.random),
      });
    }
  }

  // ============ Connection Lifecycle ============

  handleConnection(peer: Peer): SimulatorSession {
    const session: SessionState = {
      id: this.nextSessionId++,
      peer,
      decoder: new FrameDecoder(),
      phase: 'awaiting_connect',
      pin: undefined,
      timer: null,
      startedAt: 0,
      samplesSent: 0,
    };
    this.sessions.set(peer, session);
    log.info('Session opened', { session: session.id });
    return this.view(session);
  }

  handleData(peer: Peer, chunk: Uint8Array): void {
    const session = this.sessions.get(peer);
    if (!session) return;

    session.decoder.append(chunk);
    while (this.sessions.get(peer) === session) {
      let message: Message | undefined;
      try {
        message = session.decoder.next();
      } catch (err) {
        log.warn('Invalid frame, closing session', {
          session: session.id,
          error: describeError(err),
        });
        this.endSession(session);
        return;
      }
      if (!message) return;
      this.handleMessage(session, message);
    }
  }

  handleDisconnection(peer: Peer): void {
    const session = this.sessions.get(peer);
    if (session) {
      this.endSession(session);
    }
  }

  /**
   * Send an error_state to every streaming session of `pin` and close them.
   * @returns number of sessions that were notified
   */
  injectError(pin: string, error: string): number {
    const targets = [...this.sessions.values()].filter(
      (s) => s.phase === 'streaming' && s.pin === pin
    );
    for (const session of targets) {
      log.info('Injecting error', { session: session.id, pin, error });
      this.send(session, errorState(error));
      this.endSession(session);
    }
    return targets.length;
  }

  /**
   * Close every session and stop all streams.
   */
  stop(): void {
    for (const session of [...this.sessions.values()]) {
      this.endSession(session);
    }
  }

  // ============ Queries ============

  getSessions(): SimulatorSession[] {
    return [...this.sessions.values()].map((s) => this.view(s));
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  // ============ Message Handling ============

  private handleMessage(session: SessionState, message: Message): void {
    if (message.type === 'error_state') {
      log.warn('Peer reported an error', { session: session.id, error: message.error });
      this.endSession(session);
      return;
    }

    switch (session.phase) {
      case 'awaiting_connect':
        if (message.type !== 'connect') {
          log.warn('Expected connect', { session: session.id, got: message.type });
          this.send(session, errorState(`expected connect, got ${message.type}`));
          this.endSession(session);
          return;
        }
        session.phase = 'awaiting_pin';
        this.send(session, pinResponse(1));
        break;

      case 'awaiting_pin':
        if (message.type === 'pin_request') {
          this.handlePinRequest(session, message.pin);
        } else {
          log.debug('Ignoring message while awaiting pin', {
            session: session.id,
            type: message.type,
          });
        }
        break;

      case 'streaming':
        log.debug('Ignoring message while streaming', {
          session: session.id,
          type: message.type,
        });
        break;
    }
  }

  private handlePinRequest(session: SessionState, pin: string): void {
    const sensor = this.sensors.get(pin);
    if (!sensor) {
      log.info('Unknown pin, rejecting', { session: session.id, pin });
      this.send(session, pinResponse(-1));
      this.endSession(session);
      return;
    }

    log.info('Pin accepted, streaming', {
      session: session.id,
      pin,
      intervalMs: sensor.intervalMs,
    });
    session.phase = 'streaming';
    session.pin = pin;
    session.startedAt = this.now();
    if (!this.send(session, pinResponse(1))) return;

    session.timer = setInterval(() => {
      const value = sensor.generate(this.now() - session.startedAt);
      if (this.send(session, sensorData(value))) {
        session.samplesSent++;
      }
    }, sensor.intervalMs);
  }

  // ============ Private Methods ============

  /**
   * Write one frame. A dead peer ends the session.
   * @returns whether the frame was written
   */
  private send(session: SessionState, message: Message): boolean {
    if (session.peer.isClosed) {
      this.endSession(session);
      return false;
    }
    try {
      session.peer.write(encodeFrame(message));
      return true;
    } catch (err) {
      log.warn('Write failed, closing session', {
        session: session.id,
        error: describeError(err),
      });
      this.endSession(session);
      return false;
    }
  }

  private endSession(session: SessionState): void {
    if (session.timer) {
      clearInterval(session.timer);
      session.timer = null;
    }
    if (this.sessions.get(session.peer) !== session) return;

    this.sessions.delete(session.peer);
    if (!session.peer.isClosed) {
      session.peer.close();
    }
    log.info('Session closed', { session: session.id, samplesSent: session.samplesSent });
  }

  private view(session: SessionState): SimulatorSession {
    return {
      id: session.id,
      phase: session.phase,
      pin: session.pin,
      samplesSent: session.samplesSent,
    };
  }
}
