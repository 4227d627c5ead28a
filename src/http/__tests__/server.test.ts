import type http from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import { createInMemoryEngine, type Engine } from "../../engine.js";
import type { Logger } from "../../log.js";
import { startServer } from "../server.js";

const COUPLET = "غم ہے یا مسیحا کا نشہ ہے کوئی بات ہے غم ہے یا مسیحا کا نشہ ہے";

let server: http.Server;
let base: string;

beforeAll(async () => {
  const engine = createInMemoryEngine({}, new Map([["غم", "Sorrow"]]));
  const started = await startServer({ port: 0, engine });
  server = started.server;
  base = `http://127.0.0.1:${started.port}`;
});

afterAll(() => stop(server));

async function stop(s: http.Server): Promise<void> {
  s.closeAllConnections();
  await new Promise<void>((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
}

function post(path: string, body: unknown, contentType = "application/json", origin = base): Promise<Response> {
  return fetch(origin + path, {
    method: "POST",
    headers: { "content-type": contentType },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("HTTP service", () => {
  it("reports health", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", service: "urdu_text_engine", version: "0.1.0" });
  });

  it("segments text with punctuation kept", async () => {
    const res = await post("/segment", { text: "کیا حال ہے؟" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      tokens: [
        { text: "کیا", kind: "word" },
        { text: "حال", kind: "word" },
        { text: "ہے", kind: "word" },
        { text: "؟", kind: "punctuation", position: 3, startOffset: 10, endOffset: 11 },
      ],
      wordCount: 3,
      punctuationCount: 1,
    });
  });

  it("applies request options", async () => {
    const res = await post("/segment", { text: "a-b؟", options: { retainPunctuation: false, boundary: "-" } });
    expect(await res.json()).toMatchObject({ tokens: [{ text: "a" }, { text: "b؟" }], wordCount: 2 });
  });

  it("analyzes text", async () => {
    const res = await post("/analyze", { text: COUPLET, options: { topK: 2 } });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      totalWords: 17,
      uniqueWords: 8,
      mostCommonWords: [
        { term: "ہے", count: 5 },
        { term: "غم", count: 2 },
      ],
      interpretations: [{ term: "غم", count: 2, meaning: "Sorrow" }],
    });
  });

  it("lists frequencies and phrases in first-occurrence order", async () => {
    const res = await post("/analyze", { text: "غم ہے غم ہے" });
    expect(await res.json()).toMatchObject({
      frequencies: [
        { term: "غم", count: 2 },
        { term: "ہے", count: 2 },
      ],
      repeatedPhrases: [{ phrase: "غم ہے", count: 2 }],
      typeTokenRatio: 0.5,
    });
  });

  it("accepts empty text", async () => {
    const res = await post("/analyze", { text: "" });
    expect(await res.json()).toMatchObject({ totalWords: 0, typeTokenRatio: 0, frequencies: [], repeatedPhrases: [] });
  });

  it("renders a plain-text report", async () => {
    const res = await post("/report", { text: "دل دل غم" });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    const lines = (await res.text()).split("\n");
    expect(lines[0]).toBe("=".repeat(70));
    expect(lines[6]).toBe("Lexical richness (TTR): 0.667");
  });

  it("verifies raw bytes and strings", async () => {
    const bad = await post("/verify", { base64: Buffer.from([0x61, 0xff]).toString("base64") });
    expect(await bad.json()).toMatchObject({ valid: false, invalidByteOffset: 1, lengthBytes: 2 });

    const good = await post("/verify", { text: "غم" });
    expect(await good.json()).toMatchObject({ valid: true, lengthChars: 2, lengthBytes: 4 });
  });

  it("rejects invalid fields with problem details", async () => {
    const res = await post("/analyze", { text: "غم", options: { topK: 0, phraseLength: 1 } });
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await res.json()).toMatchObject({
      code: "INVALID_ARGUMENT",
      title: "Invalid argument",
      status: 400,
      instance: "/analyze",
      errors: [
        { path: "$.options.topK", message: "must be between 1 and 100" },
        { path: "$.options.phraseLength", message: "must be between 2 and 8" },
      ],
    });
  });

  it("requires a text field", async () => {
    const res = await post("/segment", {});
    expect(await res.json()).toMatchObject({ errors: [{ path: "$.text", message: "must be a string" }] });
  });

  it("rejects malformed base64", async () => {
    const res = await post("/verify", { base64: "not base64!" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: [{ path: "$.base64", message: "must be standard padded base64" }] });
  });

  it("rejects malformed JSON", async () => {
    const res = await post("/analyze", "{");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ detail: "body is not valid JSON" });
  });

  it("rejects non-JSON bodies", async () => {
    const res = await post("/analyze", "غم", "text/plain");
    expect(res.status).toBe(415);
    expect(await res.json()).toMatchObject({ code: "UNSUPPORTED_MEDIA_TYPE" });
  });

  it("answers wrong methods and unknown routes", async () => {
    const wrong = await fetch(`${base}/analyze`);
    expect(wrong.status).toBe(405);
    expect(wrong.headers.get("allow")).toBe("POST");
    await wrong.arrayBuffer();

    const missing = await fetch(`${base}/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ code: "NOT_FOUND" });
  });

  it("rejects bodies over 1 MiB", async () => {
    const res = await post("/analyze", { text: "غ".repeat(1024 * 1024) });
    expect(res.status).toBe(413);
    expect(await res.json()).toMatchObject({ code: "PAYLOAD_TOO_LARGE", status: 413 });
  });

  it("limits text length", async () => {
    const res = await post("/analyze", { text: "a".repeat(200_001) });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: [{ path: "$.text", message: "too long" }] });
  });

  it("limits the boundary to 64 code points", async () => {
    const long = await post("/segment", { text: "a", options: { boundary: "-".repeat(65) } });
    expect(long.status).toBe(400);
    expect(await long.json()).toMatchObject({
      errors: [{ path: "$.options.boundary", message: "must be a string of at most 64 characters" }],
    });

    // 40 astral characters are 80 UTF-16 units
    const astral = await post("/segment", { text: "a😀b", options: { boundary: "😀".repeat(40) } });
    expect(astral.status).toBe(200);
    expect(await astral.json()).toMatchObject({
      tokens: [{ text: "a" }, { text: "😀", kind: "punctuation" }, { text: "b" }],
    });
  });

  it("rejects verify bodies carrying both text and base64", async () => {
    const res = await post("/verify", { text: "غم", base64: "YQ==" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: [{ path: "$", message: "give either text or base64, not both" }] });
  });
});

describe("HTTP request logging", () => {
  const infos: string[] = [];
  const errors: Array<{ message: string; err: unknown }> = [];
  const logger: Logger = {
    info: (message) => infos.push(message),
    error: (message, err) => errors.push({ message, err }),
  };

  let logged: http.Server;
  let origin: string;

  beforeAll(async () => {
    const engine: Engine = {
      ...createInMemoryEngine(),
      analyze() {
        throw new Error("analyzer exploded");
      },
    };
    const started = await startServer({ port: 0, engine, logger, logRequests: true });
    logged = started.server;
    origin = `http://127.0.0.1:${started.port}`;
  });

  afterAll(() => stop(logged));

  it("writes one line per request", async () => {
    const res = await fetch(`${origin}/health`);
    await res.arrayBuffer();
    await vi.waitFor(() => expect(infos).toHaveLength(1));
    expect(infos[0]).toMatch(/^GET \/health 200 \d+ms$/);
  });

  it("logs the failure behind a 500", async () => {
    const res = await post("/analyze", { text: "غم" }, "application/json", origin);
    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ code: "INTERNAL", detail: "internal error" });

    await vi.waitFor(() => expect(infos).toHaveLength(2));
    expect(infos[1]).toMatch(/^POST \/analyze 500 \d+ms$/);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.message).toMatch(/^request [0-9a-f-]{36} failed$/);
    expect(errors[0]?.err).toBeInstanceOf(Error);
  });
});
