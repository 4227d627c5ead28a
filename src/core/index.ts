import type { AnalyzeOptions } from "./analyzer.js";
import type { SegmentOptions } from "./segmenter.js";
import type { AnalysisResult, Token } from "./types.js";
import {
  BoundarySegmenter,
  MemoryFrequencyAnalyzer,
  MinHeapTopKSelector,
  SubstringPhraseDetector,
} from "./impl/index.js";

export * from "./types.js";
export * from "./boundary.js";
export type { Segmenter, SegmentOptions } from "./segmenter.js";
export type { FrequencyAnalyzer, AnalyzeOptions } from "./analyzer.js";
export type { PhraseDetector, PhraseOptions } from "./phrases.js";
export type { TextVerifier } from "./verifier.js";
export type { Interpreter, InterpretationTable } from "./interpreter.js";
export type { Comparator, Heap, TopKSelector } from "./heap.js";
export * from "./impl/index.js";

const defaultSegmenter = new BoundarySegmenter();
const defaultAnalyzer = new MemoryFrequencyAnalyzer({
  topK: new MinHeapTopKSelector(),
  phrases: new SubstringPhraseDetector(),
});

export function segment(text: string, options?: SegmentOptions): Token[] {
  return defaultSegmenter.segment(text, options);
}

export function analyze(tokens: readonly Token[], options?: AnalyzeOptions): AnalysisResult {
  return defaultAnalyzer.analyze(tokens, options);
}
