/**
 * Binary heap ordered by a `less` predicate; the root is the least item.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Heap contents in storage order. */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns the K best items, best first.
   * Comparator follows Array.sort: <0 means a ranks before b.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
