/**
 * Bounded audio queue between the frame ingestor (producer) and the stream
 * consumer. Circular buffer, O(1) enqueue/dequeue.
 *
 * Unlike a drop-oldest frame queue, a full queue rejects the NEW item: audio
 * already queued is older and must reach the recognizer first.
 * The producer never waits. The single consumer may wait, with a timeout.
 */

import { createDeferred } from "./utils/deferred.js";
import type { Deferred } from "./types.js";

interface PendingTake {
  deferred: Deferred<Float32Array | null>;
  timer: ReturnType<typeof setTimeout>;
}

export class AudioQueue {
  private buffer: (Float32Array | null)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly capacity: number;
  private droppedWhenFull: number;
  private pending: PendingTake | null;

  constructor(capacity: number = 50) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Audio queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<Float32Array | null>(capacity).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.droppedWhenFull = 0;
    this.pending = null;
  }

  /**
   * Enqueue without blocking. Returns false (and counts the drop) when the
   * queue is at capacity. A consumer already waiting in take() receives the
   * item directly.
   */
  tryEnqueue(samples: Float32Array): boolean {
    if (this.pending) {
      // A waiter implies an empty queue, so handing off keeps FIFO order.
      const { deferred, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      deferred.resolve(samples);
      return true;
    }

    if (this.count === this.capacity) {
      this.droppedWhenFull++;
      return false;
    }

    this.buffer[this.tail] = samples;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return true;
  }

  /** Dequeue the oldest item, or null if empty. */
  dequeue(): Float32Array | null {
    if (this.count === 0) {
      return null;
    }

    const item = this.buffer[this.head];
    this.buffer[this.head] = null; // release reference
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  /**
   * Wait up to `timeoutMs` for the next item. Resolves null on timeout or
   * when wake() is called. Only one take() may be outstanding.
   */
  take(timeoutMs: number): Promise<Float32Array | null> {
    const item = this.dequeue();
    if (item) {
      return Promise.resolve(item);
    }
    if (this.pending) {
      throw new Error("AudioQueue supports a single waiting consumer");
    }

    const deferred = createDeferred<Float32Array | null>();
    const timer = setTimeout(() => {
      if (this.pending?.deferred === deferred) {
        this.pending = null;
      }
      deferred.resolve(null);
    }, Math.max(0, timeoutMs));
    this.pending = { deferred, timer };
    return deferred.promise;
  }

  /** Remove up to `maxItems` items in FIFO order without waiting. */
  drain(maxItems: number = Number.POSITIVE_INFINITY): Float32Array[] {
    const items: Float32Array[] = [];
    while (items.length < maxItems) {
      const item = this.dequeue();
      if (!item) break;
      items.push(item);
    }
    return items;
  }

  /** Release a waiting consumer immediately with null. */
  wake(): void {
    if (!this.pending) return;
    const { deferred, timer } = this.pending;
    this.pending = null;
    clearTimeout(timer);
    deferred.resolve(null);
  }

  /** Items rejected because the queue was at capacity. */
  get framesDroppedWhenFull(): number {
    return this.droppedWhenFull;
  }

  /** Current queue depth. */
  get size(): number {
    return this.count;
  }

  get maxSize(): number {
    return this.capacity;
  }

  /** Clear queued items, reset pointers and the drop counter, and wake any waiter. */
  clear(): void {
    for (let i = 0; i < this.capacity; i++) {
      this.buffer[i] = null;
    }
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.droppedWhenFull = 0;
    this.wake();
  }
}
