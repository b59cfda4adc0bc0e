/**
 * Traversal Frontier
 *
 * FIFO queue of (image, depth) with a seen-set. An image is enqueued at
 * most once per run. Depth is non-decreasing as the queue is consumed,
 * because every entry is enqueued at (dequeued depth + 1).
 *
 * `capacity` bounds the number of images ever enqueued, not the current
 * queue length. Once it is reached no further image is accepted.
 */

import type { ImageId } from '../core/types.js';

export interface FrontierEntry {
  readonly imageId: ImageId;
  readonly depth: number;
}

export class Frontier {
  private readonly queue: FrontierEntry[] = [];
  private readonly seen = new Set<ImageId>();
  private head = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  /**
   * @returns true when the image was enqueued
   */
  enqueue(imageId: ImageId, depth: number): boolean {
    if (this.seen.has(imageId) || this.isFull) {
      return false;
    }
    this.seen.add(imageId);
    this.queue.push({ imageId, depth });
    return true;
  }

  dequeue(): FrontierEntry | null {
    if (this.head >= this.queue.length) {
      return null;
    }
    const entry = this.queue[this.head] ?? null;
    this.head++;

    // Compact occasionally so a long run does not keep every entry alive
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return entry;
  }

  hasSeen(imageId: ImageId): boolean {
    return this.seen.has(imageId);
  }

  /** Images ever enqueued */
  get enqueuedCount(): number {
    return this.seen.size;
  }

  /** Entries waiting */
  get size(): number {
    return this.queue.length - this.head;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  get isFull(): boolean {
    return this.seen.size >= this.capacity;
  }
}
