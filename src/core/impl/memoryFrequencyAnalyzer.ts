import type { AnalyzeOptions, FrequencyAnalyzer } from "../analyzer.js";
import type { TopKSelector } from "../heap.js";
import type { PhraseDetector } from "../phrases.js";
import type { AnalysisResult, FrequencyEntry, Term, Token } from "../types.js";

export interface AnalyzerDeps {
  topK: TopKSelector<FrequencyEntry>;
  phrases: PhraseDetector;
}

export const DEFAULT_TOP_K = 5;

/** count descending, then first occurrence ascending */
export function byCountThenFirstSeen(a: FrequencyEntry, b: FrequencyEntry): number {
  return b.count - a.count || a.firstIndex - b.firstIndex;
}

export class MemoryFrequencyAnalyzer implements FrequencyAnalyzer {
  constructor(private readonly deps: AnalyzerDeps) {}

  analyze(tokens: readonly Token[], options?: AnalyzeOptions): AnalysisResult {
    const topK = options?.topK ?? DEFAULT_TOP_K;

    const words = tokens.filter((t) => t.kind === "word");
    const terms: Term[] = words.map((t) => t.text);

    // Map keeps insertion order, so iteration follows first occurrence
    const entries = new Map<Term, FrequencyEntry>();
    terms.forEach((term, i) => {
      const entry = entries.get(term);
      if (entry) entry.count++;
      else entries.set(term, { term, count: 1, firstIndex: i });
    });

    const frequencies = new Map<Term, number>();
    for (const [term, entry] of entries) frequencies.set(term, entry.count);

    const totalWords = terms.length;
    const uniqueWords = entries.size;

    return {
      tokens: words,
      totalWords,
      uniqueWords,
      frequencies,
      typeTokenRatio: totalWords > 0 ? uniqueWords / totalWords : 0,
      mostCommonWords: this.deps.topK.topK(entries.values(), topK, byCountThenFirstSeen),
      repeatedPhrases: this.deps.phrases.detect(terms, { length: options?.phraseLength }),
    };
  }
}
