import http from "node:http";
import { randomUUID } from "node:crypto";

import { createLogger, errorMeta, type Logger } from "../logger.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asBoolean, asString, asStringArray, isRecord, pushErr } from "./validation.js";
import { createPhraseSearchEngine, type Engine } from "./engine.js";

const SERVICE = "phrase-search";
const VERSION = "0.1.0";

export interface ServerLimits {
  maxTextLength: number;
  maxPhrases: number;
}

export interface ServerOptions {
  port?: number;
  engine?: Engine;
  logger?: Logger;
  limits?: Partial<ServerLimits>;
  /** Flags used when a request leaves them out. */
  defaults?: { parallelSearching?: boolean; parallelPhrases?: boolean };
}

const DEFAULT_LIMITS: ServerLimits = { maxTextLength: 5_000_000, maxPhrases: 10_000 };

class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

class InvalidJsonError extends Error {
  constructor() {
    super("request body is not valid JSON");
    this.name = "InvalidJsonError";
  }
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createPhraseSearchEngine();
  const logger = opts.logger ?? createLogger();
  const limits: ServerLimits = { ...DEFAULT_LIMITS, ...opts.limits };
  const defaultSearching = opts.defaults?.parallelSearching ?? true;
  const defaultPhrases = opts.defaults?.parallelPhrases ?? true;
  // UTF-8 worst case for the text plus room for phrases and JSON framing
  const maxBodyBytes = limits.maxTextLength * 4 + limits.maxPhrases * 1024 + 64 * 1024;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const fail = (p: Problem) => sendProblem(res, p.status, p);

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          parallelism: engine.parallelism,
        });
      }

      if (req.method === "POST" && url.pathname === "/search") {
        if (!isJson(req)) {
          return fail(problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const started = Date.now();
        const body = await readJson(req, maxBodyBytes);
        if (!isRecord(body)) {
          return fail(problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const text = asString(body.text);
        if (text === undefined) pushErr(errors, "$.text", "must be a string");
        if (text !== undefined && text.length > limits.maxTextLength) pushErr(errors, "$.text", "too long");

        const phrases = asStringArray(body.phrases);
        if (!phrases) pushErr(errors, "$.phrases", "must be an array of strings");
        if (phrases && phrases.length < 1) pushErr(errors, "$.phrases", "must contain at least 1 item");
        if (phrases && phrases.length > limits.maxPhrases) pushErr(errors, "$.phrases", `must contain at most ${limits.maxPhrases} items`);

        const parallelSearching = body.parallelSearching == null ? defaultSearching : asBoolean(body.parallelSearching);
        if (parallelSearching === undefined) pushErr(errors, "$.parallelSearching", "must be a boolean");
        const parallelPhrases = body.parallelPhrases == null ? defaultPhrases : asBoolean(body.parallelPhrases);
        if (parallelPhrases === undefined) pushErr(errors, "$.parallelPhrases", "must be a boolean");

        if (errors.length || text === undefined || !phrases || parallelSearching === undefined || parallelPhrases === undefined) {
          return fail(problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const r = await engine.search({ text, phrases, parallelSearching, parallelPhrases });
        const tookMs = Date.now() - started;
        logger.info("search completed", { requestId, ...r.stats, parallelSearching, parallelPhrases, tookMs });
        return sendJson(res, 200, { results: r.results, stats: r.stats, tookMs });
      }

      return fail(problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof BodyTooLargeError) {
        return fail(problem({ status: 413, code: "PAYLOAD_TOO_LARGE", detail: e.message, instance: url.pathname, requestId }));
      }
      if (e instanceof InvalidJsonError) {
        return fail(problem({ status: 400, code: "INVALID_ARGUMENT", detail: e.message, instance: url.pathname, requestId }));
      }
      logger.error("request failed", { requestId, path: url.pathname, error: errorMeta(e) });
      return fail(problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
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

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const c of req) {
    const chunk = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    size += chunk.length;
    if (size > maxBytes) throw new BodyTooLargeError(maxBytes);
    chunks.push(chunk);
  }
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new InvalidJsonError();
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
