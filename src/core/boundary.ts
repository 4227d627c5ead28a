/**
 * Punctuation code points that terminate a token.
 *
 * Whitespace is always a boundary and is never stored in the set; the set only
 * carries the punctuation that can optionally be kept as tokens.
 */
export interface BoundarySet {
  readonly size: number;
  has(char: string): boolean;
  /** Members in insertion order. */
  chars(): string[];
}

const WHITESPACE = /^\s$/u;

export function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

class CodePointBoundarySet implements BoundarySet {
  private readonly members: ReadonlySet<string>;

  constructor(members: Iterable<string>) {
    const set = new Set<string>();
    for (const entry of members) {
      // strings of several characters contribute each of their code points
      for (const ch of entry) {
        if (!isWhitespace(ch)) set.add(ch);
      }
    }
    this.members = set;
  }

  get size(): number {
    return this.members.size;
  }

  has(char: string): boolean {
    return this.members.has(char);
  }

  chars(): string[] {
    return Array.from(this.members);
  }
}

export function createBoundarySet(chars: Iterable<string>): BoundarySet {
  return new CodePointBoundarySet(chars);
}

export const URDU_FULL_STOP = "\u06D4"; // ۔
export const ARABIC_COMMA = "\u060C"; // ،
export const ARABIC_SEMICOLON = "\u061B"; // ؛
export const ARABIC_QUESTION_MARK = "\u061F"; // ؟

/** Urdu/Arabic sentence and clause punctuation plus their ASCII counterparts. */
export const DEFAULT_BOUNDARY_SET: BoundarySet = createBoundarySet([
  URDU_FULL_STOP,
  ARABIC_COMMA,
  ARABIC_SEMICOLON,
  ARABIC_QUESTION_MARK,
  "!",
  ":",
  ".",
]);
