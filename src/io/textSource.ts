import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export type TextEncodingName = "utf-8" | "utf-16le";

export type TextSourceErrorCode = "NOT_FOUND" | "INVALID_ENCODING" | "INVALID_FORMAT" | "READ_FAILED";

export class TextSourceError extends Error {
  constructor(
    readonly code: TextSourceErrorCode,
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TextSourceError";
  }
}

export interface ReadTextOptions {
  encoding?: TextEncodingName;
}

function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      throw new TextSourceError("NOT_FOUND", path, `file not found: ${path}`, { cause: e });
    }
    throw new TextSourceError("READ_FAILED", path, `could not read ${path}`, { cause: e });
  }
}

/**
 * Reads a file and decodes it strictly. A leading byte order mark is dropped;
 * malformed input is an error rather than U+FFFD replacement.
 */
export async function readTextFile(path: string, opts: ReadTextOptions = {}): Promise<string> {
  const encoding = opts.encoding ?? "utf-8";
  const bytes = await readBytes(path);
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch (e) {
    throw new TextSourceError("INVALID_ENCODING", path, `${path} is not valid ${encoding}`, { cause: e });
  }
}

export async function readTextLines(path: string, opts: ReadTextOptions = {}): Promise<string[]> {
  const text = await readTextFile(path, opts);
  if (!text.length) return [];
  const lines = text.split(/\r?\n/);
  // a final newline terminates the last line rather than starting a new one
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export async function writeReport(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, { encoding: "utf8" });
}
