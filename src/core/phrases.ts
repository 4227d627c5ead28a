import type { RepeatedPhrase, Term } from "./types.js";

export interface PhraseOptions {
  /** Words per phrase; values below 2 disable detection. Defaults to 2. */
  length?: number;
}

/**
 * Finds multi-word phrases that occur more than once.
 *
 * The in-memory implementation counts phrases as substrings of the
 * space-joined words, not as token windows: a phrase also matches where it
 * sits inside longer words (`"ب ج"` is found in `"اب جد"`). Results reflect
 * that textual count.
 */
export interface PhraseDetector {
  detect(words: readonly Term[], options?: PhraseOptions): RepeatedPhrase[];
}
