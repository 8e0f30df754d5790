/**
 * Default number of readings kept per sensor.
 */
export const DEFAULT_HISTORY_CAPACITY = 100;

/**
 * Fixed-capacity ring buffer of sensor readings.
 * When full, a push overwrites the oldest reading.
 */
export class SensorHistory {
  private readonly slots: number[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`history capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<number>(capacity).fill(0);
  }

  push(value: number): void {
    const index = (this.start + this.count) % this.capacity;
    this.slots[index] = value;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /**
   * Readings ordered oldest to newest.
   */
  values(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.count; i++) {
      out.push(this.slots[(this.start + i) % this.capacity] ?? 0);
    }
    return out;
  }

  get latest(): number | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.start + this.count - 1) % this.capacity];
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.start = 0;
    this.count = 0;
  }
}
