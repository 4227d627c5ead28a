import type { Comparator, Heap, TopKSelector } from "../heap.js";

/**
 * Binary heap whose top is the item that sorts LAST under `comparator`,
 * i.e. the weakest of the items kept so far.
 */
class BoundedHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly comparator: Comparator<T>) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (this.data.length && last !== undefined) {
      this.data[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  /** true when the item at `i` belongs above the item at `j` */
  private above(i: number, j: number): boolean {
    const a = this.data[i];
    const b = this.data[j];
    if (a === undefined || b === undefined) return false;
    return this.comparator(a, b) > 0;
  }

  private swap(i: number, j: number): void {
    const a = this.data[i];
    const b = this.data[j];
    if (a === undefined || b === undefined) return;
    this.data[i] = b;
    this.data[j] = a;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.above(i, parent)) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.data.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let top = i;

      if (l < n && this.above(l, top)) top = l;
      if (r < n && this.above(r, top)) top = r;
      if (top === i) return;

      this.swap(i, top);
      i = top;
    }
  }
}

/**
 * Keeps the best K items in a bounded heap, then sorts them.
 * O(n log k) over the input, which stays a single pass over the frequency table.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new BoundedHeap<T>(comparator);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const weakest = heap.peek();
      if (weakest !== undefined && comparator(item, weakest) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.toArray().sort(comparator);
  }
}
