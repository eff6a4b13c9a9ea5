import { describe, expect, it } from 'vitest';
import { FrameQueue } from '../src/pipeline/frameQueue.js';
import type { RawFrame } from '../src/video/utils.js';

function rawFrame(value: number): RawFrame {
  return { width: 1, height: 1, data: new Uint8Array([value]), channels: 1 };
}

describe('FrameQueue', () => {
  it('QueueOrder returns frames in arrival order', () => {
    const queue = new FrameQueue(3);
    queue.enqueue(rawFrame(1), 100);
    queue.enqueue(rawFrame(2), 200);

    expect(queue.dequeue()?.ts).toBe(100);
    expect(queue.dequeue()?.ts).toBe(200);
    expect(queue.dequeue()).toBeNull();
  });

  it('QueueOverflow drops the oldest frames', () => {
    const queue = new FrameQueue(3);
    for (let ts = 1; ts <= 5; ts += 1) {
      queue.enqueue(rawFrame(ts), ts);
    }

    expect(queue.framesDropped).toBe(2);
    expect(queue.size).toBe(3);
    expect(queue.capacity).toBe(3);
    expect([queue.dequeue()?.ts, queue.dequeue()?.ts, queue.dequeue()?.ts]).toEqual([3, 4, 5]);
  });

  it('QueueWrap keeps order across the ring boundary', () => {
    const queue = new FrameQueue(2);
    queue.enqueue(rawFrame(1), 1);
    queue.dequeue();
    queue.enqueue(rawFrame(2), 2);
    queue.enqueue(rawFrame(3), 3);

    expect([queue.dequeue()?.ts, queue.dequeue()?.ts]).toEqual([2, 3]);
    expect(queue.framesDropped).toBe(0);
  });

  it('QueueClear empties the queue but keeps the drop count', () => {
    const queue = new FrameQueue(1);
    queue.enqueue(rawFrame(1), 1);
    queue.enqueue(rawFrame(2), 2);
    queue.clear();

    expect(queue.size).toBe(0);
    expect(queue.dequeue()).toBeNull();
    expect(queue.framesDropped).toBe(1);
  });

  it('QueueCapacity rejects invalid sizes', () => {
    expect(() => new FrameQueue(0)).toThrow('Frame queue size must be a positive integer (received 0)');
    expect(() => new FrameQueue(1.5)).toThrow('Frame queue size must be a positive integer (received 1.5)');
  });
});
