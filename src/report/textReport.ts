import type { CorpusStats } from "../corpus/pipeline.js";
import type { AnalysisResult, Interpretation, Token, VerificationReport } from "../core/types.js";

const WIDE_RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);
const NARROW_RULE = "=".repeat(50);
const CORPUS_RULE = "=".repeat(60);

export interface AnalysisReportOptions {
  title?: string;
  interpretations?: readonly Interpretation[];
}

/**
 * Plain-text rendering of an analysis run.
 *
 * Terms are written in storage order; bidi display is left to the terminal
 * or editor showing the report.
 */
export function renderAnalysisReport(result: AnalysisResult, opts: AnalysisReportOptions = {}): string {
  const lines: string[] = [
    WIDE_RULE,
    opts.title ?? "URDU TEXT ANALYSIS REPORT",
    WIDE_RULE,
    "",
    `Total words analyzed: ${result.totalWords}`,
    `Unique vocabulary: ${result.uniqueWords}`,
    `Lexical richness (TTR): ${result.typeTokenRatio.toFixed(3)}`,
    "",
    "WORD FREQUENCY DISTRIBUTION:",
    THIN_RULE,
  ];

  // stable sort: equal counts stay in first-occurrence order
  const ranked = Array.from(result.frequencies).sort((a, b) => b[1] - a[1]);
  for (const [term, count] of ranked) {
    lines.push(`  ${term.padEnd(15)} ${String(count).padStart(3)}`);
  }

  lines.push("", `MOST FREQUENT WORDS (top ${result.mostCommonWords.length}):`);
  for (const e of result.mostCommonWords) lines.push(`  '${e.term}': ${e.count}x`);

  lines.push("", "REPEATED PHRASES:");
  if (result.repeatedPhrases.length === 0) lines.push("  none");
  for (const p of result.repeatedPhrases) lines.push(`  "${p.phrase}": ${p.count} times`);

  if (opts.interpretations?.length) {
    lines.push("", "INTERPRETATIONS:");
    for (const i of opts.interpretations) lines.push(`  ${i.term} (${i.count}): ${i.meaning}`);
  }

  return lines.join("\n");
}

export function renderTokenReport(text: string, tokens: readonly Token[]): string {
  const lines: string[] = [
    THIN_RULE,
    "DETAILED TOKENIZATION REPORT",
    THIN_RULE,
    `Original text: ${text}`,
    `Character count: ${Array.from(text).length}`,
    `Token count: ${tokens.length}`,
    "",
    "Token-by-token analysis:",
  ];

  tokens.forEach((t, i) => {
    lines.push(`  Token ${String(i + 1).padStart(2)}: '${t.text}' (${t.kind.toUpperCase()})`);
  });

  return lines.join("\n");
}

export function renderVerificationReport(report: VerificationReport): string {
  const status = report.valid
    ? "valid UTF-8"
    : `invalid UTF-8 at byte ${report.invalidByteOffset ?? 0}`;

  return [
    NARROW_RULE,
    "TEXT VERIFICATION REPORT",
    NARROW_RULE,
    `Characters: ${report.lengthChars}`,
    `Bytes (UTF-8): ${report.lengthBytes}`,
    `Lines: ${report.lineCount}`,
    `Encoding: ${status}`,
    `Arabic-script characters: ${report.arabicScriptChars} (${report.arabicScriptPercentage.toFixed(1)}%)`,
    NARROW_RULE,
  ].join("\n");
}

export function renderCorpusReport(stats: CorpusStats): string {
  return [
    CORPUS_RULE,
    "URDU CORPUS PIPELINE REPORT",
    CORPUS_RULE,
    `Lines read: ${stats.linesRead}`,
    `Cleaned lines: ${stats.totalLines}`,
    `Total words: ${stats.totalWords}`,
    `Unique words: ${stats.uniqueWords}`,
    `Average line length: ${stats.avgLineLength.toFixed(1)} characters`,
    CORPUS_RULE,
  ].join("\n");
}
