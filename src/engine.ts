import {
  BoundarySegmenter,
  LexiconInterpreter,
  MemoryFrequencyAnalyzer,
  MinHeapTopKSelector,
  SubstringPhraseDetector,
  Utf8Verifier,
  DEFAULT_BOUNDARY_SET,
  DEFAULT_TOP_K,
  type AnalysisResult,
  type BoundarySet,
  type FrequencyAnalyzer,
  type Interpretation,
  type InterpretationTable,
  type Interpreter,
  type Segmenter,
  type TextVerifier,
  type Token,
  type VerificationReport,
} from "./core/index.js";
import { renderAnalysisReport } from "./report/textReport.js";

export interface TextRequest {
  text: string;
  retainPunctuation?: boolean;
  boundarySet?: BoundarySet;
  topK?: number;
  phraseLength?: number;
}

export interface SegmentResponse {
  tokens: Token[];
  wordCount: number;
  punctuationCount: number;
}

export interface AnalyzeResponse {
  result: AnalysisResult;
  interpretations: Interpretation[];
}

export interface Engine {
  segment(req: TextRequest): SegmentResponse;
  analyze(req: TextRequest): AnalyzeResponse;
  report(req: TextRequest): string;
  verify(input: string | Uint8Array): VerificationReport;
}

export interface EngineDefaults {
  retainPunctuation: boolean;
  boundarySet: BoundarySet;
  topK: number;
}

export interface EngineParts {
  segmenter?: Segmenter;
  analyzer?: FrequencyAnalyzer;
  verifier?: TextVerifier;
  interpreter?: Interpreter;
}

/** JSON shape of an analysis; the frequency Map becomes an ordered entry list. */
export function analysisToJson(res: AnalyzeResponse): Record<string, unknown> {
  const r = res.result;
  return {
    tokens: r.tokens.map((t) => t.text),
    totalWords: r.totalWords,
    uniqueWords: r.uniqueWords,
    typeTokenRatio: r.typeTokenRatio,
    frequencies: Array.from(r.frequencies, ([term, count]) => ({ term, count })),
    mostCommonWords: r.mostCommonWords.map((e) => ({ term: e.term, count: e.count })),
    repeatedPhrases: r.repeatedPhrases.map((p) => ({ phrase: p.phrase, count: p.count })),
    interpretations: res.interpretations,
  };
}

export function createInMemoryEngine(
  defaults: Partial<EngineDefaults> = {},
  table: InterpretationTable = new Map(),
  parts: EngineParts = {},
): Engine {
  const segmenter = parts.segmenter ?? new BoundarySegmenter();
  const analyzer =
    parts.analyzer ??
    new MemoryFrequencyAnalyzer({ topK: new MinHeapTopKSelector(), phrases: new SubstringPhraseDetector() });
  const verifier = parts.verifier ?? new Utf8Verifier();
  const interpreter = parts.interpreter ?? new LexiconInterpreter(table);

  const base: EngineDefaults = {
    retainPunctuation: defaults.retainPunctuation ?? true,
    boundarySet: defaults.boundarySet ?? DEFAULT_BOUNDARY_SET,
    topK: defaults.topK ?? DEFAULT_TOP_K,
  };

  const tokensFor = (req: TextRequest): Token[] =>
    segmenter.segment(req.text, {
      retainPunctuation: req.retainPunctuation ?? base.retainPunctuation,
      boundarySet: req.boundarySet ?? base.boundarySet,
    });

  const analyzeReq = (req: TextRequest): AnalyzeResponse => {
    const result = analyzer.analyze(tokensFor(req), {
      topK: req.topK ?? base.topK,
      phraseLength: req.phraseLength,
    });
    return { result, interpretations: interpreter.interpret(result.frequencies) };
  };

  return {
    segment(req) {
      const tokens = tokensFor(req);
      const wordCount = tokens.filter((t) => t.kind === "word").length;
      return { tokens, wordCount, punctuationCount: tokens.length - wordCount };
    },
    analyze: analyzeReq,
    report(req) {
      const { result, interpretations } = analyzeReq(req);
      return renderAnalysisReport(result, { interpretations });
    },
    verify(input) {
      return verifier.verify(input);
    },
  };
}
