import { createBoundarySet } from "../core/boundary.js";
import type { TextRequest } from "../engine.js";
import type { FieldError } from "./problem.js";

export const MAX_TEXT_LENGTH = 200_000;
export const MAX_BOUNDARY_LENGTH = 64;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function asBoolean(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** `text` may be empty: the core is total over empty input. */
export function readText(body: Record<string, unknown>, errors: FieldError[]): string {
  const text = asString(body.text);
  if (text === undefined) {
    pushErr(errors, "$.text", "must be a string");
    return "";
  }
  if (text.length > MAX_TEXT_LENGTH) pushErr(errors, "$.text", "too long");
  return text;
}

/**
 * Validates `$.options` for /segment, /analyze and /report.
 * Absent fields stay undefined so engine defaults apply.
 */
export function readTextRequest(body: Record<string, unknown>, errors: FieldError[]): TextRequest {
  const req: TextRequest = { text: readText(body, errors) };
  if (body.options === undefined) return req;
  if (!isRecord(body.options)) {
    pushErr(errors, "$.options", "must be an object");
    return req;
  }
  const o = body.options;

  if (o.retainPunctuation !== undefined) {
    const v = asBoolean(o.retainPunctuation);
    if (v === undefined) pushErr(errors, "$.options.retainPunctuation", "must be a boolean");
    else req.retainPunctuation = v;
  }

  if (o.boundary !== undefined) {
    const v = asString(o.boundary);
    // counted in code points, as the boundary set stores them
    if (v === undefined || Array.from(v).length > MAX_BOUNDARY_LENGTH) {
      pushErr(errors, "$.options.boundary", `must be a string of at most ${MAX_BOUNDARY_LENGTH} characters`);
    } else {
      req.boundarySet = createBoundarySet([v]);
    }
  }

  if (o.topK !== undefined) {
    const v = asInt(o.topK);
    if (v === undefined || v < 1 || v > 100) pushErr(errors, "$.options.topK", "must be between 1 and 100");
    else req.topK = v;
  }

  if (o.phraseLength !== undefined) {
    const v = asInt(o.phraseLength);
    if (v === undefined || v < 2 || v > 8) pushErr(errors, "$.options.phraseLength", "must be between 2 and 8");
    else req.phraseLength = v;
  }

  return req;
}
