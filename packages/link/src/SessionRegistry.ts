import type { SensorConnection } from './SensorConnection.js';

/**
 * Result of adding a connection to the registry.
 */
export type RegistryAddResult =
  | { readonly status: 'added'; readonly connection: SensorConnection }
  | { readonly status: 'already_exists'; readonly connection: SensorConnection };

/**
 * Registry of authorized sensor connections, keyed by pin.
 *
 * Mutated only from the event loop that delivers transport events, so there
 * is no locking. Iteration follows insertion order.
 */
export class SessionRegistry {
  private readonly connections = new Map<string, SensorConnection>();

  /**
   * Add a connection for `pin` unless one is already registered.
   * `create` is only invoked when the pin is free.
   */
  addIfAbsent(pin: string, create: () => SensorConnection): RegistryAddResult {
    const existing = this.connections.get(pin);
    if (existing) {
      return { status: 'already_exists', connection: existing };
    }

    const connection = create();
    this.connections.set(pin, connection);
    return { status: 'added', connection };
  }

  /**
   * Get a connection by pin.
   */
  get(pin: string): SensorConnection | undefined {
    return this.connections.get(pin);
  }

  has(pin: string): boolean {
    return this.connections.has(pin);
  }

  /**
   * Remove a connection without touching its transport.
   */
  remove(pin: string): boolean {
    return this.connections.delete(pin);
  }

  /**
   * Drop every connection whose transport is closed.
   * @returns pins that were removed
   */
  removeDead(): string[] {
    const removed: string[] = [];

    for (const [pin, connection] of this.connections) {
      if (connection.isClosed) {
        this.connections.delete(pin);
        removed.push(pin);
      }
    }

    return removed;
  }

  /**
   * Whether at least one registered connection is still live.
   */
  anyConnected(): boolean {
    for (const connection of this.connections.values()) {
      if (!connection.isClosed) return true;
    }
    return false;
  }

  /**
   * All registered connections, in insertion order.
   */
  list(): SensorConnection[] {
    return [...this.connections.values()];
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Close every connection and empty the registry.
   */
  closeAll(): void {
    for (const connection of this.connections.values()) {
      connection.close();
    }
    this.connections.clear();
  }
}
