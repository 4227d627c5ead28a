import { fileURLToPath } from "node:url";

import { DEFAULT_BOUNDARY_SET, createBoundarySet, type BoundarySet } from "./core/boundary.js";
import { DEFAULT_TOP_K } from "./core/impl/memoryFrequencyAnalyzer.js";

export const DEFAULT_INTERPRETATIONS_PATH = fileURLToPath(new URL("../data/interpretations.json", import.meta.url));

export interface AppConfig {
  port: number;
  topK: number;
  retainPunctuation: boolean;
  boundarySet: BoundarySet;
  interpretationsPath: string;
  logRequests: boolean;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function flag(env: Env, name: string, fallback: boolean, problems: string[]): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  problems.push(`${name} must be 0, 1, true or false`);
  return fallback;
}

function int(env: Env, name: string, fallback: number, min: number, max: number, problems: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    problems.push(`${name} must be an integer between ${min} and ${max}`);
    return fallback;
  }
  return n;
}

/** Reads the process environment once; every bad variable is reported together. */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const port = int(env, "PORT", 3000, 0, 65535, problems);
  const topK = int(env, "DEFAULT_TOP_K", DEFAULT_TOP_K, 1, 100, problems);
  const retainPunctuation = flag(env, "RETAIN_PUNCTUATION", true, problems);
  const logRequests = flag(env, "LOG_REQUESTS", false, problems);

  let boundarySet = DEFAULT_BOUNDARY_SET;
  const boundaryChars = env.BOUNDARY_CHARS;
  if (boundaryChars !== undefined && boundaryChars !== "") {
    boundarySet = createBoundarySet([boundaryChars]);
    if (boundarySet.size === 0) problems.push("BOUNDARY_CHARS must contain at least one non-whitespace character");
  }

  const interpretationsPath = env.INTERPRETATIONS_PATH || DEFAULT_INTERPRETATIONS_PATH;

  if (problems.length) throw new ConfigError(problems);
  return { port, topK, retainPunctuation, boundarySet, interpretationsPath, logRequests };
}
