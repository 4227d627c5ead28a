import { parseArgs } from "node:util";

import { ConfigError, loadConfig } from "../config.js";
import { runPipeline } from "../corpus/pipeline.js";
import { createInMemoryEngine, type Engine } from "../engine.js";
import { loadInterpretations } from "../io/interpretations.js";
import { readBytes, readTextFile, TextSourceError, writeReport, type TextEncodingName } from "../io/textSource.js";
import { renderCorpusReport, renderTokenReport, renderVerificationReport } from "../report/textReport.js";

export const USAGE = [
  "usage: urdu-text <command> <file> [options]",
  "",
  "commands:",
  "  analyze   frequency analysis report",
  "  tokens    token-by-token listing",
  "  verify    UTF-8 verification report",
  "  pipeline  clean a line-per-verse corpus and report its statistics",
  "",
  "options:",
  "  --top N             most frequent words to list (analyze)",
  "  --phrase-length N   words per repeated phrase (analyze, default 2)",
  "  --no-punctuation    drop punctuation instead of keeping it as tokens (analyze, tokens)",
  "  --encoding NAME     utf-8 (default) or utf-16le (analyze, tokens, pipeline)",
  "  --out PATH          also write the report to PATH; for pipeline, the cleaned corpus",
].join("\n");

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_SOURCE = 2;

class UsageError extends Error {}

type Command = "analyze" | "tokens" | "verify" | "pipeline";

const COMMAND_OPTIONS: Record<Command, readonly string[]> = {
  analyze: ["top", "phrase-length", "no-punctuation", "encoding", "out"],
  tokens: ["no-punctuation", "encoding", "out"],
  verify: ["out"],
  pipeline: ["encoding", "out"],
};

function isCommand(v: string | undefined): v is Command {
  return v !== undefined && Object.hasOwn(COMMAND_OPTIONS, v);
}

interface Invocation {
  command: Command;
  file: string;
  top?: number;
  phraseLength?: number;
  retainPunctuation?: boolean;
  encoding: TextEncodingName;
  out?: string;
}

function positiveInt(raw: string | undefined, name: string, min: number, max: number): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) throw new UsageError(`--${name} must be an integer between ${min} and ${max}`);
  return n;
}

function encodingOf(raw: string | undefined): TextEncodingName {
  if (raw === undefined || raw === "utf-8" || raw === "utf8") return "utf-8";
  if (raw === "utf-16le") return "utf-16le";
  throw new UsageError("--encoding must be utf-8 or utf-16le");
}

export async function runCli(
  argv: string[],
  io: CliIO,
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  let inv: Invocation;
  try {
    inv = parse(argv);
  } catch (e) {
    io.err(`${e instanceof Error ? e.message : String(e)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  try {
    const config = loadConfig(env);
    const { command, file, encoding } = inv;

    if (command === "verify") {
      const bytes = await readBytes(file);
      return emit(renderVerificationReport(createInMemoryEngine().verify(bytes)), inv.out, io);
    }

    if (command === "pipeline") {
      const { stats } = await runPipeline(file, { encoding, out: inv.out });
      io.out(renderCorpusReport(stats));
      if (inv.out !== undefined) io.err(`cleaned corpus saved to: ${inv.out}`);
      return EXIT_OK;
    }

    const text = await readTextFile(file, { encoding });
    const engine: Engine = createInMemoryEngine(
      { retainPunctuation: config.retainPunctuation, boundarySet: config.boundarySet, topK: config.topK },
      command === "analyze" ? await loadInterpretations(config.interpretationsPath) : new Map(),
    );

    if (command === "tokens") {
      const { tokens } = engine.segment({ text, retainPunctuation: inv.retainPunctuation });
      return emit(renderTokenReport(text, tokens), inv.out, io);
    }

    const report = engine.report({
      text,
      retainPunctuation: inv.retainPunctuation,
      topK: inv.top,
      phraseLength: inv.phraseLength,
    });
    return emit(report, inv.out, io);
  } catch (e) {
    if (e instanceof ConfigError) {
      io.err(e.message);
      return EXIT_USAGE;
    }
    if (e instanceof TextSourceError) {
      io.err(`${e.code}: ${e.message}`);
      return EXIT_SOURCE;
    }
    throw e;
  }
}

/** Every argument problem surfaces here, before any file is touched. */
function parse(argv: string[]): Invocation {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      top: { type: "string" },
      "phrase-length": { type: "string" },
      "no-punctuation": { type: "boolean" },
      encoding: { type: "string" },
      out: { type: "string" },
    },
  });

  const [command, file, ...rest] = positionals;
  if (!isCommand(command)) throw new UsageError(`unknown command: ${command ?? "(none)"}`);
  if (file === undefined) throw new UsageError(`${command} needs a file`);
  if (rest.length) throw new UsageError(`unexpected argument: ${rest.join(" ")}`);

  const allowed = COMMAND_OPTIONS[command];
  for (const name of Object.keys(values)) {
    if (!allowed.includes(name)) throw new UsageError(`--${name} does not apply to ${command}`);
  }

  return {
    command,
    file,
    top: positiveInt(values.top, "top", 1, 100),
    phraseLength: positiveInt(values["phrase-length"], "phrase-length", 2, 8),
    retainPunctuation: values["no-punctuation"] ? false : undefined,
    encoding: encodingOf(values.encoding),
    out: values.out,
  };
}

async function emit(report: string, out: string | undefined, io: CliIO): Promise<number> {
  io.out(report);
  if (out !== undefined) {
    await writeReport(out, report + "\n");
    io.err(`report saved to: ${out}`);
  }
  return EXIT_OK;
}
