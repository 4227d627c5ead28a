/** Sort-style comparator: a negative result puts `a` first. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Minimal heap contract used for top-K selection.
 * The heap keeps the entry that sorts last under its comparator at the top.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Heap contents in implementation-defined order. */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns the first `k` items in comparator order.
   * Items that compare equal keep no particular order, so comparators
   * should be total (e.g. tie-break on first occurrence).
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
