import { InvalidPriceError, OutOfOrderSampleError } from "../utils/errors";

export interface PriceSample {
  readonly timestamp: Date;
  readonly price: number;
}

/**
 * Fixed-capacity FIFO. Once full, each push overwrites the oldest slot.
 */
class RingBuffer<T> {
  private items: T[] = [];
  private start = 0;

  constructor(private readonly capacity: number) {}

  get length(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return;
    }
    this.items[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
  }

  last(): T | undefined {
    if (this.items.length === 0) {
      return undefined;
    }
    const index = (this.start + this.items.length - 1) % this.items.length;
    return this.items[index];
  }

  /** Most recent `count` items, oldest first. */
  tail(count: number): T[] {
    const n = Math.min(Math.max(0, count), this.items.length);
    const out: T[] = [];
    for (let i = this.items.length - n; i < this.items.length; i++) {
      out.push(this.items[(this.start + i) % this.items.length]);
    }
    return out;
  }
}

function keyOf(asset: string, venue: string): string {
  return `${asset}@${venue}`;
}

/**
 * Timestamped prices per (asset, venue). Samples for one key are kept in
 * non-decreasing timestamp order; the oldest are evicted past `capacity`.
 */
export class PriceHistoryBuffer {
  private series: Map<string, RingBuffer<PriceSample>> = new Map();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  append(asset: string, venue: string, sample: PriceSample): void {
    if (!Number.isFinite(sample.price) || sample.price <= 0) {
      throw new InvalidPriceError(asset, venue, sample.price);
    }

    const key = keyOf(asset, venue);
    let buffer = this.series.get(key);
    if (!buffer) {
      buffer = new RingBuffer<PriceSample>(this.capacity);
      this.series.set(key, buffer);
    }

    const previous = buffer.last();
    if (previous && sample.timestamp.getTime() < previous.timestamp.getTime()) {
      throw new OutOfOrderSampleError(asset, venue, sample.timestamp, previous.timestamp);
    }

    buffer.push(Object.freeze({ timestamp: new Date(sample.timestamp.getTime()), price: sample.price }));
  }

  recent(asset: string, venue: string, count: number): PriceSample[] {
    const buffer = this.series.get(keyOf(asset, venue));
    return buffer ? buffer.tail(count) : [];
  }

  size(asset: string, venue: string): number {
    return this.series.get(keyOf(asset, venue))?.length ?? 0;
  }
}
