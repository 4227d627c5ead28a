import { DEFAULT_BOUNDARY_SET, isWhitespace, type BoundarySet } from "../boundary.js";
import type { SegmentOptions, Segmenter } from "../segmenter.js";
import type { Token, TokenKind } from "../types.js";

export function classify(text: string, boundarySet: BoundarySet = DEFAULT_BOUNDARY_SET): TokenKind {
  return boundarySet.has(text) ? "punctuation" : "word";
}

export function wordsOnly(tokens: readonly Token[]): Token[] {
  return tokens.filter((t) => t.kind === "word");
}

/**
 * Single-pass segmenter over code points:
 * - whitespace runs end the current word and are dropped
 * - boundary punctuation ends the current word and is either kept as its own
 *   token or dropped, depending on `retainPunctuation`
 * - offsets are UTF-16 indices, so astral characters advance by two
 */
export class BoundarySegmenter implements Segmenter {
  constructor(private readonly defaults: SegmentOptions = {}) {}

  segment(text: string, options?: SegmentOptions): Token[] {
    const retainPunctuation = options?.retainPunctuation ?? this.defaults.retainPunctuation ?? true;
    const boundarySet = options?.boundarySet ?? this.defaults.boundarySet ?? DEFAULT_BOUNDARY_SET;

    const out: Token[] = [];
    let wordStart = -1;
    let offset = 0;

    const flush = (end: number): void => {
      if (wordStart < 0) return;
      out.push({ text: text.slice(wordStart, end), kind: "word", position: out.length, startOffset: wordStart, endOffset: end });
      wordStart = -1;
    };

    for (const ch of text) {
      const start = offset;
      offset += ch.length;

      if (isWhitespace(ch)) {
        flush(start);
        continue;
      }

      if (boundarySet.has(ch)) {
        flush(start);
        if (retainPunctuation) {
          out.push({ text: ch, kind: "punctuation", position: out.length, startOffset: start, endOffset: offset });
        }
        continue;
      }

      if (wordStart < 0) wordStart = start;
    }

    flush(offset);
    return out;
  }
}
