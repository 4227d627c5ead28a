import { readTextFile, TextSourceError } from "./textSource.js";
import type { InterpretationTable } from "../core/interpreter.js";

export function parseInterpretations(raw: unknown, source: string): InterpretationTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new TextSourceError("INVALID_FORMAT", source, `${source} must hold a JSON object of term -> meaning`);
  }
  const table = new Map<string, string>();
  for (const [term, meaning] of Object.entries(raw)) {
    if (typeof meaning !== "string") {
      throw new TextSourceError("INVALID_FORMAT", source, `${source}: meaning of "${term}" must be a string`);
    }
    table.set(term, meaning);
  }
  return table;
}

export async function loadInterpretations(path: string): Promise<InterpretationTable> {
  const text = await readTextFile(path);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new TextSourceError("INVALID_FORMAT", path, `${path} is not valid JSON`, { cause: e });
  }
  return parseInterpretations(raw, path);
}
