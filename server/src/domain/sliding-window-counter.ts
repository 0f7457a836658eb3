import type { CounterStateStore } from '../db/state-file.js';
import { WINDOW_BUCKETS, type PersistedState } from '../types/state.js';

export interface CounterSnapshot extends PersistedState {
  currentBucketCount: number;
}

/**
 * Counts requests over the trailing window using one bucket per second.
 *
 * `increment()` only touches the open bucket; `rotate()` closes it, evicts the
 * oldest bucket and keeps `windowTotal` equal to the sum of the closed buckets,
 * so both reads and writes are O(1).
 *
 * Every method is synchronous. Node runs each one to completion on the event
 * loop, so no two calls can observe each other half-way through.
 */
export class SlidingWindowCounter {
  private currentBucketCount = 0;
  private bucketHistory: number[] = new Array<number>(WINDOW_BUCKETS).fill(0);
  private cursor = 0;
  private total = 0;

  constructor(private readonly store: CounterStateStore) {}

  increment(): void {
    this.currentBucketCount++;
  }

  rotate(): void {
    // A snapshot taken right after the 60th rotation of an older release
    // stores cursor 60; fold it back before indexing.
    if (this.cursor === WINDOW_BUCKETS) {
      this.cursor = 0;
    }

    this.total = this.total - this.bucketHistory[this.cursor] + this.currentBucketCount;
    this.bucketHistory[this.cursor] = this.currentBucketCount;
    this.currentBucketCount = 0;
    this.cursor = (this.cursor + 1) % WINDOW_BUCKETS;
  }

  /** Closed buckets plus the one still filling up. */
  windowTotal(): number {
    return this.total + this.currentBucketCount;
  }

  /** Replaces the in-memory state with the stored snapshot, if any. */
  load(): void {
    const state = this.store.read();
    this.currentBucketCount = 0;
    if (!state) {
      this.bucketHistory = new Array<number>(WINDOW_BUCKETS).fill(0);
      this.cursor = 0;
      this.total = 0;
      return;
    }
    this.bucketHistory = [...state.bucketHistory];
    this.cursor = state.cursor;
    this.total = state.windowTotal;
  }

  /** Writes the closed buckets; the open bucket is never persisted. */
  flush(): void {
    this.store.write({
      cursor: this.cursor,
      bucketHistory: [...this.bucketHistory],
      windowTotal: this.total
    });
  }

  snapshot(): CounterSnapshot {
    return {
      cursor: this.cursor,
      bucketHistory: [...this.bucketHistory],
      windowTotal: this.total,
      currentBucketCount: this.currentBucketCount
    };
  }
}
