import { describe, expect, it } from "vitest";
import { LexiconInterpreter, Utf8Verifier, analyze, countOccurrences, findInvalidUtf8, segment } from "../../index.js";

describe("Utf8Verifier", () => {
  const verifier = new Utf8Verifier();

  it("reports code points, bytes and Arabic-script share of a string", () => {
    const r = verifier.verify("غم ہیں");
    expect(r.valid).toBe(true);
    expect(r.encoding).toBe("UTF-8");
    expect(r.lengthChars).toBe(6);
    expect(r.lengthBytes).toBe(11);
    expect(r.lineCount).toBe(1);
    expect(r.arabicScriptChars).toBe(5);
    expect(r.arabicScriptPercentage).toBeCloseTo((5 / 6) * 100, 10);
    expect(r.invalidByteOffset).toBeUndefined();
  });

  it("accepts well-formed bytes", () => {
    const r = verifier.verify(new TextEncoder().encode("abc\nغم"));
    expect(r).toEqual({
      valid: true,
      encoding: "UTF-8",
      lengthChars: 6,
      lengthBytes: 8,
      lineCount: 2,
      arabicScriptChars: 2,
      arabicScriptPercentage: (2 / 6) * 100,
    });
  });

  it("flags malformed bytes with the offending offset", () => {
    const r = verifier.verify(Uint8Array.from([0x61, 0xff, 0x62]));
    expect(r.valid).toBe(false);
    expect(r.invalidByteOffset).toBe(1);
    expect(r.lengthChars).toBe(1);
    expect(r.lengthBytes).toBe(3);
  });

  it("flags a lone surrogate in a string", () => {
    const r = verifier.verify("ab\uD800c");
    expect(r.valid).toBe(false);
    expect(r.invalidByteOffset).toBe(2);
    expect(r.lengthChars).toBe(2);
    expect(r.lengthBytes).toBe(6);
  });

  it("reports empty text as valid with zero counts", () => {
    expect(verifier.verify("")).toEqual({
      valid: true,
      encoding: "UTF-8",
      lengthChars: 0,
      lengthBytes: 0,
      lineCount: 0,
      arabicScriptChars: 0,
      arabicScriptPercentage: 0,
    });
  });
});

describe("findInvalidUtf8", () => {
  it("accepts multi-byte sequences", () => {
    expect(findInvalidUtf8(new TextEncoder().encode("a ہے 😀"))).toBe(-1);
  });

  it.each([
    { name: "overlong two-byte", bytes: [0xc0, 0x80], offset: 0 },
    { name: "truncated sequence", bytes: [0x61, 0xd8], offset: 1 },
    { name: "encoded surrogate", bytes: [0xed, 0xa0, 0x80], offset: 0 },
    { name: "beyond U+10FFFF", bytes: [0xf4, 0x90, 0x80, 0x80], offset: 0 },
    { name: "stray continuation", bytes: [0x61, 0x62, 0x80], offset: 2 },
  ])("rejects $name", ({ bytes, offset }) => {
    expect(findInvalidUtf8(Uint8Array.from(bytes))).toBe(offset);
  });
});

describe("countOccurrences", () => {
  it("counts non-overlapping matches", () => {
    expect(countOccurrences("aaaa", "aa")).toBe(2);
    expect(countOccurrences("غم ہے غم ہے", "غم ہے")).toBe(2);
    expect(countOccurrences("abc", "")).toBe(0);
  });
});

describe("LexiconInterpreter", () => {
  it("looks up terms present in the frequency table", () => {
    const interpreter = new LexiconInterpreter(
      new Map([
        ["دل", "Heart"],
        ["ہے", "Being"],
        ["غم", "Sorrow"],
      ]),
    );
    const r = analyze(segment("غم ہے غم"));
    expect(interpreter.interpret(r.frequencies)).toEqual([
      { term: "غم", count: 2, meaning: "Sorrow" },
      { term: "ہے", count: 1, meaning: "Being" },
    ]);
  });
});
