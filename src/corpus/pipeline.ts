import { readTextLines, writeReport, type ReadTextOptions } from "../io/textSource.js";

export interface CorpusStats {
  /** Lines in the file before cleaning. */
  linesRead: number;
  totalLines: number;
  totalWords: number;
  uniqueWords: number;
  /** Mean cleaned-line length in code points; 0 for an empty corpus. */
  avgLineLength: number;
}

export interface CorpusResult {
  lines: string[];
  stats: CorpusStats;
}

export interface PipelineOptions extends ReadTextOptions {
  /** Where the cleaned corpus is written, one line per row. */
  out?: string;
}

/** Trims each line and drops the ones left empty. */
export function cleanLines(lines: readonly string[]): string[] {
  const clean: string[] = [];
  for (const line of lines) {
    const t = line.trim();
    if (t.length) clean.push(t);
  }
  return clean;
}

export function corpusStats(raw: readonly string[], clean: readonly string[]): CorpusStats {
  let totalWords = 0;
  let chars = 0;
  const vocabulary = new Set<string>();

  for (const line of clean) {
    chars += Array.from(line).length;
    // cleaned lines are trimmed, so the split yields no empty words
    for (const w of line.split(/\s+/u)) {
      totalWords++;
      vocabulary.add(w);
    }
  }

  return {
    linesRead: raw.length,
    totalLines: clean.length,
    totalWords,
    uniqueWords: vocabulary.size,
    avgLineLength: clean.length ? chars / clean.length : 0,
  };
}

/** Reads a corpus file, cleans its lines, and optionally writes the cleaned corpus back out. */
export async function runPipeline(path: string, opts: PipelineOptions = {}): Promise<CorpusResult> {
  const raw = await readTextLines(path, { encoding: opts.encoding });
  const lines = cleanLines(raw);
  const stats = corpusStats(raw, lines);

  if (opts.out !== undefined) {
    await writeReport(opts.out, lines.map((l) => l + "\n").join(""));
  }
  return { lines, stats };
}
