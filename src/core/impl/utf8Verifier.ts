import type { TextVerifier } from "../verifier.js";
import type { VerificationReport } from "../types.js";

const ARABIC_BLOCK_START = 0x0600;
const ARABIC_BLOCK_END = 0x06ff;

const encoder = new TextEncoder();

function inRange(b: number | undefined, lo: number, hi: number): boolean {
  return b !== undefined && b >= lo && b <= hi;
}

/**
 * Returns the offset of the first malformed UTF-8 sequence, or -1.
 *
 * Follows the well-formed byte sequences table of Unicode 15 §3.9: no
 * overlongs, no surrogates, nothing past U+10FFFF.
 */
export function findInvalidUtf8(bytes: Uint8Array): number {
  let i = 0;
  const n = bytes.length;

  while (i < n) {
    const b0 = bytes[i] ?? 0;
    if (b0 < 0x80) {
      i++;
      continue;
    }

    let lo = 0x80;
    let hi = 0xbf;
    let trailing: number;

    if (b0 >= 0xc2 && b0 <= 0xdf) {
      trailing = 1;
    } else if (b0 >= 0xe0 && b0 <= 0xef) {
      trailing = 2;
      if (b0 === 0xe0) lo = 0xa0;
      if (b0 === 0xed) hi = 0x9f;
    } else if (b0 >= 0xf0 && b0 <= 0xf4) {
      trailing = 3;
      if (b0 === 0xf0) lo = 0x90;
      if (b0 === 0xf4) hi = 0x8f;
    } else {
      return i;
    }

    if (!inRange(bytes[i + 1], lo, hi)) return i;
    for (let k = 2; k <= trailing; k++) {
      if (!inRange(bytes[i + k], 0x80, 0xbf)) return i;
    }
    i += trailing + 1;
  }

  return -1;
}

/** UTF-16 index of the first unpaired surrogate, or -1. */
export function findLoneSurrogate(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c >= 0xd800 && c <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      return i;
    }
    if (c >= 0xdc00 && c <= 0xdfff) return i;
  }
  return -1;
}

function describe(text: string, lengthBytes: number, invalidByteOffset?: number): VerificationReport {
  let lengthChars = 0;
  let arabicScriptChars = 0;
  for (const ch of text) {
    lengthChars++;
    const cp = ch.codePointAt(0) ?? 0;
    if (cp >= ARABIC_BLOCK_START && cp <= ARABIC_BLOCK_END) arabicScriptChars++;
  }

  let lineCount = 0;
  if (text.length) {
    lineCount = 1;
    for (const ch of text) if (ch === "\n") lineCount++;
  }

  const report: VerificationReport = {
    valid: invalidByteOffset === undefined,
    encoding: "UTF-8",
    lengthChars,
    lengthBytes,
    lineCount,
    arabicScriptChars,
    arabicScriptPercentage: lengthChars > 0 ? (arabicScriptChars / lengthChars) * 100 : 0,
  };
  if (invalidByteOffset !== undefined) report.invalidByteOffset = invalidByteOffset;
  return report;
}

export class Utf8Verifier implements TextVerifier {
  verify(input: string | Uint8Array): VerificationReport {
    if (typeof input === "string") return this.verifyString(input);

    const bad = findInvalidUtf8(input);
    const end = bad < 0 ? input.length : bad;
    // ignoreBOM keeps a leading U+FEFF in the character count, matching what was stored
    const text = new TextDecoder("utf-8", { ignoreBOM: true }).decode(input.subarray(0, end));
    return describe(text, input.length, bad < 0 ? undefined : bad);
  }

  private verifyString(text: string): VerificationReport {
    const lengthBytes = encoder.encode(text).length;
    const lone = findLoneSurrogate(text);
    if (lone < 0) return describe(text, lengthBytes);

    const prefix = text.slice(0, lone);
    return describe(prefix, lengthBytes, encoder.encode(prefix).length);
  }
}
