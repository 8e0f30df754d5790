/**
 * @fileoverview Broadcasts sensor outcomes to WebSocket clients.
 */

import { createLogger, type LinkOutcome } from '@sensor-link/client';

const log = createLogger('live-feed');

/**
 * WebSocket-like interface for connection abstraction.
 * Allows testing without real WebSocket connections.
 */
export interface Connection {
  /** Send a message to this connection */
  send(data: string): void;
  /** Close this connection */
  close(): void;
  /** Connection state (1 = OPEN) */
  readonly readyState: number;
  /** WebSocket OPEN constant */
  readonly OPEN: number;
}

/**
 * One outcome as it goes out on the feed: the link outcome tagged with its pin.
 */
export type LiveFeedEvent = LinkOutcome & { readonly pin: string };

export function toLiveFeedEvent(pin: string, outcome: LinkOutcome): LiveFeedEvent {
  return { ...outcome, pin };
}

export class LiveFeed {
  private readonly connections = new Set<Connection>();

  add(conn: Connection): void {
    this.connections.add(conn);
    log.debug('Subscriber added', { subscribers: this.connections.size });
  }

  remove(conn: Connection): void {
    this.connections.delete(conn);
    log.debug('Subscriber removed', { subscribers: this.connections.size });
  }

  /**
   * Send an event to every open connection. Connections that are no longer
   * open are dropped.
   */
  broadcast(event: LiveFeedEvent): void {
    const data = JSON.stringify(event);
    for (const conn of this.connections) {
      if (conn.readyState !== conn.OPEN) {
        this.connections.delete(conn);
        continue;
      }
      conn.send(data);
    }
  }

  get size(): number {
    return this.connections.size;
  }

  closeAll(): void {
    for (const conn of this.connections) {
      conn.close();
    }
    this.connections.clear();
  }
}
