export { BoundarySegmenter, classify, wordsOnly } from "./boundarySegmenter.js";
export { MemoryFrequencyAnalyzer, DEFAULT_TOP_K, byCountThenFirstSeen, type AnalyzerDeps } from "./memoryFrequencyAnalyzer.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { SubstringPhraseDetector, countOccurrences } from "./substringPhraseDetector.js";
export { Utf8Verifier, findInvalidUtf8, findLoneSurrogate } from "./utf8Verifier.js";
export { LexiconInterpreter } from "./lexiconInterpreter.js";
