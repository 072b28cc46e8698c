import { describe, it, expect } from 'vitest';
import { PriorityQueue } from '../priority-queue.js';

describe('PriorityQueue', () => {
  it('dequeues in comparator order', () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 2, 3, 0]) queue.enqueue(n);

    expect(queue.size).toBe(6);
    expect(queue.peek()).toBe(0);
    const out: number[] = [];
    let next = queue.dequeue();
    while (next !== undefined) {
      out.push(next);
      next = queue.dequeue();
    }
    expect(out).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('returns undefined when empty', () => {
    const queue = new PriorityQueue<string>((a, b) => a.localeCompare(b));
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
  });

  it('clear removes and returns everything', () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);
    queue.enqueue(2);
    queue.enqueue(1);

    expect(queue.clear().sort()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });
});
