import type { AnalysisResult, Token } from "./types.js";

export interface AnalyzeOptions {
  /** Number of ranked entries in `mostCommonWords`. Defaults to 5. */
  topK?: number;
  /** Word count of the phrases checked for repetition. Defaults to 2. */
  phraseLength?: number;
}

/**
 * Aggregates a token sequence into frequency statistics.
 *
 * Punctuation tokens are dropped before counting, so callers may pass the
 * segmenter output as-is.
 */
export interface FrequencyAnalyzer {
  analyze(tokens: readonly Token[], options?: AnalyzeOptions): AnalysisResult;
}
