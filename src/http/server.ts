import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asString, isRecord, pushErr, readText, readTextRequest, MAX_TEXT_LENGTH } from "./validation.js";
import { analysisToJson, createInMemoryEngine, type Engine } from "../engine.js";
import { silentLogger, type Logger } from "../log.js";

const SERVICE = "urdu_text_engine";
const VERSION = "0.1.0";

export const MAX_BODY_BYTES = 1024 * 1024;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const ROUTES: Record<string, string> = {
  "/health": "GET",
  "/segment": "POST",
  "/analyze": "POST",
  "/report": "POST",
  "/verify": "POST",
};

export interface ServerOptions {
  port?: number;
  engine?: Engine;
  logger?: Logger;
  logRequests?: boolean;
}

class BodyError extends Error {
  constructor(readonly problemCode: "PAYLOAD_TOO_LARGE" | "INVALID_ARGUMENT", message: string) {
    super(message);
  }
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine();
  const logger = opts.logger ?? silentLogger;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const started = Date.now();

    const fail = (p: Omit<Problem, "type" | "title" | "instance" | "requestId">): void =>
      sendProblem(res, problem({ ...p, instance: url.pathname, requestId }));

    if (opts.logRequests) {
      res.once("finish", () => {
        logger.info(`${req.method ?? "-"} ${url.pathname} ${res.statusCode} ${Date.now() - started}ms`);
      });
    }

    try {
      const method = ROUTES[url.pathname];
      if (!method) {
        return fail({ status: 404, code: "NOT_FOUND", detail: "not found" });
      }
      if (req.method !== method) {
        res.setHeader("allow", method);
        return fail({ status: 405, code: "METHOD_NOT_ALLOWED", detail: `use ${method}` });
      }

      if (url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (!isJson(req)) {
        return fail({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json" });
      }

      let body: unknown;
      try {
        body = await readJson(req);
      } catch (e) {
        if (e instanceof BodyError) {
          return fail({ status: e.problemCode === "PAYLOAD_TOO_LARGE" ? 413 : 400, code: e.problemCode, detail: e.message });
        }
        throw e;
      }
      if (!isRecord(body)) {
        return fail({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object" });
      }

      const errors: FieldError[] = [];

      if (url.pathname === "/verify") {
        const input = readVerifyInput(body, errors);
        if (errors.length) {
          return fail({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors });
        }
        return sendJson(res, 200, engine.verify(input));
      }

      const textReq = readTextRequest(body, errors);
      if (errors.length) {
        return fail({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors });
      }

      if (url.pathname === "/segment") {
        const r = engine.segment(textReq);
        return sendJson(res, 200, {
          tokens: r.tokens,
          wordCount: r.wordCount,
          punctuationCount: r.punctuationCount,
          tookMs: Date.now() - started,
        });
      }

      if (url.pathname === "/analyze") {
        return sendJson(res, 200, { ...analysisToJson(engine.analyze(textReq)), tookMs: Date.now() - started });
      }

      res.statusCode = 200;
      res.setHeader("content-type", "text/plain; charset=utf-8");
      res.end(engine.report(textReq) + "\n");
      return;
    } catch (e) {
      logger.error(`request ${requestId} failed`, e);
      return fail({ status: 500, code: "INTERNAL", detail: "internal error" });
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

/** `{ text }` is checked as a string, `{ base64 }` as raw bytes; never both. */
function readVerifyInput(body: Record<string, unknown>, errors: FieldError[]): string | Uint8Array {
  if (body.base64 === undefined) return readText(body, errors);
  if (body.text !== undefined) {
    pushErr(errors, "$", "give either text or base64, not both");
    return new Uint8Array();
  }

  const b64 = asString(body.base64);
  if (b64 === undefined || !BASE64.test(b64) || b64.length % 4 !== 0) {
    pushErr(errors, "$.base64", "must be standard padded base64");
    return new Uint8Array();
  }
  const bytes = Buffer.from(b64, "base64");
  if (bytes.length > MAX_TEXT_LENGTH * 4) pushErr(errors, "$.base64", "too long");
  return bytes;
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const c of req) {
    const chunk = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    size += chunk.length;
    if (size > MAX_BODY_BYTES) throw new BodyError("PAYLOAD_TOO_LARGE", `body exceeds ${MAX_BODY_BYTES} bytes`);
    chunks.push(chunk);
  }
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BodyError("INVALID_ARGUMENT", "body is not valid JSON");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}
