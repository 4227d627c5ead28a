/** Shared core types used by module contracts. */

export type Term = string;

export type TokenKind = "word" | "punctuation";

/** A token produced by the segmenter. */
export interface Token {
  readonly text: string;
  readonly kind: TokenKind;
  /** 0-based position within the token sequence (token index, not offset). */
  readonly position: number;
  /** UTF-16 offsets into the source text; `endOffset` is exclusive. */
  readonly startOffset: number;
  readonly endOffset: number;
}

/** Term -> occurrence count, iterated in first-occurrence order. */
export type FrequencyTable = ReadonlyMap<Term, number>;

export interface FrequencyEntry {
  term: Term;
  count: number;
  /** index of the first occurrence within the word-only sequence */
  firstIndex: number;
}

export interface RepeatedPhrase {
  phrase: string;
  count: number;
  firstIndex: number;
}

export interface AnalysisResult {
  /** word tokens only; punctuation is filtered before counting */
  readonly tokens: readonly Token[];
  readonly totalWords: number;
  readonly uniqueWords: number;
  readonly frequencies: FrequencyTable;
  /** unique / total, 0 when there are no words */
  readonly typeTokenRatio: number;
  readonly mostCommonWords: readonly FrequencyEntry[];
  readonly repeatedPhrases: readonly RepeatedPhrase[];
}

export interface VerificationReport {
  valid: boolean;
  encoding: "UTF-8";
  /** length in code points */
  lengthChars: number;
  lengthBytes: number;
  lineCount: number;
  /** code points in the Arabic block (U+0600..U+06FF), which covers Urdu */
  arabicScriptChars: number;
  arabicScriptPercentage: number;
  /** byte offset of the first malformed sequence, when `valid` is false */
  invalidByteOffset?: number;
}

export interface Interpretation {
  term: Term;
  count: number;
  meaning: string;
}
