import type { PhraseDetector, PhraseOptions } from "../phrases.js";
import type { RepeatedPhrase, Term } from "../types.js";

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle.length) return 0;
  let count = 0;
  let from = 0;
  while (true) {
    const at = haystack.indexOf(needle, from);
    if (at < 0) return count;
    count++;
    from = at + needle.length;
  }
}

/**
 * Repetition check over the space-joined text.
 *
 * Each adjacent window of words becomes a candidate phrase; its count is the
 * number of times the phrase appears as a substring of the joined text.
 */
export class SubstringPhraseDetector implements PhraseDetector {
  detect(words: readonly Term[], options?: PhraseOptions): RepeatedPhrase[] {
    const length = options?.length ?? 2;
    if (length < 2 || words.length < length) return [];

    const joined = words.join(" ");
    const seen = new Set<string>();
    const out: RepeatedPhrase[] = [];

    for (let i = 0; i + length <= words.length; i++) {
      const phrase = words.slice(i, i + length).join(" ");
      if (seen.has(phrase)) continue;
      seen.add(phrase);

      const count = countOccurrences(joined, phrase);
      if (count > 1) out.push({ phrase, count, firstIndex: i });
    }

    return out;
  }
}
