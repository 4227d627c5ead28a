import type { BoundarySet } from "./boundary.js";
import type { Token } from "./types.js";

export interface SegmentOptions {
  /** If true, boundary punctuation is emitted as single-character tokens. Defaults to true. */
  retainPunctuation?: boolean;
  boundarySet?: BoundarySet;
}

/**
 * Splits text into word and punctuation tokens.
 *
 * Contract notes:
 * - total: any string is valid input, empty input gives an empty sequence
 * - tokens are never empty and keep the storage order of the input
 */
export interface Segmenter {
  segment(text: string, options?: SegmentOptions): Token[];
}
