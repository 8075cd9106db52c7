import type { Heap, TopKSelector } from "../heap.js";

export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    let i = a.length;
    a.push(item);
    // sift up: move parents down until item's slot is found
    while (i > 0) {
      const p = (i - 1) >> 1;
      const parent = a[p]!;
      if (!this.less(item, parent)) break;
      a[i] = parent;
      i = p;
    }
    a[i] = item;
  }

  pop(): T | undefined {
    const a = this.data;
    const top = a[0];
    const last = a.pop();
    if (a.length > 0 && last !== undefined) this.siftDown(last);
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftDown(item: T): void {
    const a = this.data;
    const n = a.length;
    let i = 0;

    while (true) {
      const l = i * 2 + 1;
      if (l >= n) break;
      const r = l + 1;
      let child = l;
      let best = a[l]!;
      if (r < n) {
        const right = a[r]!;
        if (this.less(right, best)) {
          child = r;
          best = right;
        }
      }
      if (!this.less(best, item)) break;
      a[i] = best;
      i = child;
    }
    a[i] = item;
  }
}

/**
 * Keeps a fixed-size min-heap of the best K items.
 *
 * "Best" follows the comparator (a before b if <0), so the heap root is the
 * worst of the best and gets evicted first. O(n log k) time, O(k) memory.
 * The comparator must be a total order for the result to be deterministic.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    // less(a,b) means a is WORSE than b
    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    const arr = heap.toArray();
    arr.sort(comparator);
    return arr;
  }
}
