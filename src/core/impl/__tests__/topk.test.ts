import { describe, expect, it } from "vitest";
import { MinHeapTopKSelector } from "../minHeapTopK.js";
import { byCountThenFirstSeen } from "../memoryFrequencyAnalyzer.js";
import type { FrequencyEntry } from "../../types.js";

describe("MinHeapTopKSelector", () => {
  it("returns best K by comparator", () => {
    const sel = new MinHeapTopKSelector<number>();
    const out = sel.topK([5, 1, 3, 2, 4], 3, (a, b) => b - a); // descending
    expect(out).toEqual([5, 4, 3]);
  });

  it("returns everything sorted when k exceeds the input", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([2, 9, 4], 10, (a, b) => a - b)).toEqual([2, 4, 9]);
  });

  it("returns nothing for k <= 0", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([1, 2, 3], 0, (a, b) => a - b)).toEqual([]);
    expect(sel.topK([1, 2, 3], -1, (a, b) => a - b)).toEqual([]);
  });

  it("breaks count ties by first occurrence", () => {
    const entries: FrequencyEntry[] = [
      { term: "c", count: 2, firstIndex: 4 },
      { term: "a", count: 2, firstIndex: 0 },
      { term: "d", count: 1, firstIndex: 6 },
      { term: "b", count: 3, firstIndex: 2 },
      { term: "e", count: 2, firstIndex: 1 },
    ];
    const out = new MinHeapTopKSelector<FrequencyEntry>().topK(entries, 3, byCountThenFirstSeen);
    expect(out.map((e) => e.term)).toEqual(["b", "a", "e"]);
  });
});
