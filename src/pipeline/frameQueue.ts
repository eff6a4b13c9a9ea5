import type { FrameInput } from '../video/utils.js';

export type QueuedFrame = {
  frame: FrameInput;
  /** Capture time, epoch milliseconds. */
  ts: number;
};

export const DEFAULT_QUEUE_SIZE = 20;

/**
 * Bounded FIFO ring buffer. When full, the oldest frame is dropped to make
 * room for the new one.
 */
export class FrameQueue {
  private readonly buffer: Array<QueuedFrame | null>;
  private head = 0;
  private tail = 0;
  private count = 0;
  private dropped = 0;

  constructor(private readonly maxSize = DEFAULT_QUEUE_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new Error(`Frame queue size must be a positive integer (received ${maxSize})`);
    }
    this.buffer = new Array<QueuedFrame | null>(maxSize).fill(null);
  }

  enqueue(frame: FrameInput, ts: number) {
    if (this.count === this.maxSize) {
      this.dropped += 1;
      this.buffer[this.head] = null;
      this.head = (this.head + 1) % this.maxSize;
      this.count -= 1;
    }

    this.buffer[this.tail] = { frame, ts };
    this.tail = (this.tail + 1) % this.maxSize;
    this.count += 1;
  }

  dequeue(): QueuedFrame | null {
    if (this.count === 0) {
      return null;
    }

    const entry = this.buffer[this.head];
    this.buffer[this.head] = null;
    this.head = (this.head + 1) % this.maxSize;
    this.count -= 1;
    return entry;
  }

  get framesDropped() {
    return this.dropped;
  }

  get size() {
    return this.count;
  }

  get capacity() {
    return this.maxSize;
  }

  clear() {
    this.buffer.fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
