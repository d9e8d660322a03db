import { CorpusError, type MatchOptions, type MatchType, type GlobMethod, type ContextSize, type TokenSet } from "../core/index.js";
import type { Logger } from "../logger.js";
import type { CorpusService, ServiceDocumentInput } from "./corpusService.js";
import { PROBLEM_CONTENT_TYPE, problem, statusForError, type FieldError } from "./problem.js";
import { asBool, asInt, asString, asStringArray, isRecord, oneOf, pushErr } from "./validation.js";

export const SERVICE = "corpus_engine";
export const VERSION = "0.1.0";

const MAX_LABEL_LENGTH = 256;
const MAX_TEXT_LENGTH = 200_000;

const MATCH_TYPES: readonly MatchType[] = ["exact", "regex", "glob"];
const GLOB_METHODS: readonly GlobMethod[] = ["match", "search"];

export interface RouteContext {
  service: CorpusService;
  logger: Logger;
  startedAt: number;
  maxDocuments: number;
}

export interface RouteRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  /** Media type without parameters, lower-cased. */
  contentType?: string;
  body: unknown;
  requestId: string;
}

export interface RouteResponse {
  status: number;
  contentType: string;
  body: unknown;
}

type Handler = (ctx: RouteContext, req: RouteRequest) => RouteResponse;

function json(status: number, body: unknown): RouteResponse {
  return { status, contentType: "application/json", body };
}

function fail(req: RouteRequest, status: number, code: string, detail: string, errors?: FieldError[]): RouteResponse {
  return {
    status,
    contentType: PROBLEM_CONTENT_TYPE,
    body: problem({ status, code, detail, instance: req.path, requestId: req.requestId, errors }),
  };
}

function invalid(req: RouteRequest, errors: FieldError[]): RouteResponse {
  return fail(req, 400, "INVALID_ARGUMENT", "invalid request", errors);
}

function readMatchOptions(body: Record<string, unknown>, errors: FieldError[]): MatchOptions {
  const out: MatchOptions = {};

  const matchType = asString(body.matchType);
  if (body.matchType !== undefined) {
    if (matchType !== undefined && oneOf(matchType, MATCH_TYPES)) out.matchType = matchType;
    else pushErr(errors, "$.matchType", `must be one of: ${MATCH_TYPES.join(", ")}`);
  }

  const globMethod = asString(body.globMethod);
  if (body.globMethod !== undefined) {
    if (globMethod !== undefined && oneOf(globMethod, GLOB_METHODS)) out.globMethod = globMethod;
    else pushErr(errors, "$.globMethod", `must be one of: ${GLOB_METHODS.join(", ")}`);
  }

  out.ignoreCase = readBool(body, "ignoreCase", errors);
  return out;
}

function readBool(body: Record<string, unknown>, key: string, errors: FieldError[]): boolean | undefined {
  if (body[key] === undefined) return undefined;
  const v = asBool(body[key]);
  if (v === undefined) pushErr(errors, `$.${key}`, "must be a boolean");
  return v;
}

function readInt(body: Record<string, unknown>, key: string, errors: FieldError[]): number | undefined {
  if (body[key] === undefined) return undefined;
  const v = asInt(body[key]);
  if (v === undefined) pushErr(errors, `$.${key}`, "must be an integer");
  return v;
}

function readString(body: Record<string, unknown>, key: string, errors: FieldError[]): string | undefined {
  if (body[key] === undefined) return undefined;
  const v = asString(body[key]);
  if (v === undefined) pushErr(errors, `$.${key}`, "must be a string");
  return v;
}

function readPatterns(body: Record<string, unknown>, errors: FieldError[]): string[] {
  const single = asString(body.patterns);
  if (single !== undefined) return [single];
  const list = asStringArray(body.patterns);
  if (!list || list.length === 0) {
    pushErr(errors, "$.patterns", "must be a string or a non-empty array of strings");
    return [];
  }
  return list;
}

function readContextSize(body: Record<string, unknown>, errors: FieldError[]): ContextSize | undefined {
  const v = body.contextSize;
  if (v === undefined) return undefined;
  const n = asInt(v);
  if (n !== undefined) return n;
  if (Array.isArray(v) && v.length === 2) {
    const left = asInt(v[0]);
    const right = asInt(v[1]);
    if (left !== undefined && right !== undefined) return [left, right];
  }
  pushErr(errors, "$.contextSize", "must be an integer or a [left, right] pair of integers");
  return undefined;
}

function readTokenOption(body: Record<string, unknown>, key: string, errors: FieldError[]): boolean | TokenSet | undefined {
  const v = body[key];
  if (v === undefined) return undefined;
  const flag = asBool(v);
  if (flag !== undefined) return flag;
  const list = asStringArray(v);
  if (list !== undefined) return list;
  pushErr(errors, `$.${key}`, "must be a boolean or an array of strings");
  return undefined;
}

type BodyResult = { ok: true; body: Record<string, unknown> } | { ok: false; response: RouteResponse };

function requireJsonObject(req: RouteRequest): BodyResult {
  if (req.contentType !== "application/json") {
    return { ok: false, response: fail(req, 415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json") };
  }
  if (!isRecord(req.body)) {
    return { ok: false, response: fail(req, 400, "INVALID_ARGUMENT", "body must be an object") };
  }
  return { ok: true, body: req.body };
}

/** Wraps a JSON body handler with the media type and object checks. */
function withBody(fn: (ctx: RouteContext, req: RouteRequest, body: Record<string, unknown>) => RouteResponse): Handler {
  return (ctx, req) => {
    const parsed = requireJsonObject(req);
    return parsed.ok ? fn(ctx, req, parsed.body) : parsed.response;
  };
}

const ingest = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  const docsVal = body.documents;
  if (!Array.isArray(docsVal)) pushErr(errors, "$.documents", "must be an array");
  const docs: unknown[] = Array.isArray(docsVal) ? docsVal : [];
  if (Array.isArray(docsVal) && docsVal.length < 1) pushErr(errors, "$.documents", "must contain at least 1 item");
  if (docs.length > ctx.maxDocuments) pushErr(errors, "$.documents", `must contain at most ${ctx.maxDocuments} items`);

  const onDuplicate = isRecord(body.options) ? asString(body.options.onDuplicate) ?? "replace" : "replace";
  if (onDuplicate !== "replace" && onDuplicate !== "skip") {
    pushErr(errors, "$.options.onDuplicate", "must be one of: replace, skip");
  }

  if (errors.length) return invalid(req, errors);

  let ingested = 0;
  const failures: Array<{ index: number; label: string | null; code: string; message: string }> = [];

  docs.forEach((d, index) => {
    if (!isRecord(d)) {
      failures.push({ index, label: null, code: "INVALID_ARGUMENT", message: "document must be an object" });
      return;
    }

    const label = asString(d.label);
    if (!label) {
      failures.push({ index, label: null, code: "INVALID_ARGUMENT", message: "label must be non-empty" });
      return;
    }
    if (label.length > MAX_LABEL_LENGTH) {
      failures.push({ index, label: null, code: "INVALID_ARGUMENT", message: "label too long" });
      return;
    }

    let input: ServiceDocumentInput;
    const text = asString(d.text);
    const tokens = asStringArray(d.tokens);
    if (text !== undefined) input = { label, text };
    else if (tokens !== undefined) input = { label, tokens };
    else {
      failures.push({ index, label, code: "INVALID_ARGUMENT", message: "document needs `text` or `tokens`" });
      return;
    }

    const size = "text" in input ? input.text.length : input.tokens.reduce((n, t) => n + t.length, 0);
    if (size > MAX_TEXT_LENGTH) {
      failures.push({ index, label, code: "INVALID_ARGUMENT", message: "text too long" });
      return;
    }

    if (onDuplicate === "skip" && ctx.service.has(label)) return;

    ctx.service.upsert(input);
    ingested++;
  });

  const failed = failures.length;
  return json(failed > 0 ? 207 : 200, { ingested, failed, failures });
});

const ngrams = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  const n = readInt(body, "n", errors) ?? 2;
  const joinStr = readString(body, "joinStr", errors) ?? " ";
  if (errors.length) return invalid(req, errors);
  return json(200, { ngrams: ctx.service.ngrams(n, joinStr) });
});

const kwic = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  const patterns = readPatterns(body, errors);
  const match = readMatchOptions(body, errors);
  const contextSize = readContextSize(body, errors);
  const inverse = readBool(body, "inverse", errors);
  const highlightKeyword = readString(body, "highlightKeyword", errors);
  const glue = readString(body, "glue", errors);
  if (errors.length) return invalid(req, errors);

  const table = ctx.service.kwic(patterns, { ...match, contextSize, inverse, highlightKeyword, glue });
  return json(200, table);
});

const filter = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  const patterns = readPatterns(body, errors);
  const match = readMatchOptions(body, errors);
  const inverse = readBool(body, "inverse", errors);
  const byAttr = readString(body, "byAttr", errors);
  if (errors.length) return invalid(req, errors);

  return json(200, { documents: ctx.service.filter(patterns, { ...match, inverse, byAttr }) });
});

const clean = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  const removePunct = readTokenOption(body, "removePunct", errors);
  const removeStopwords = readTokenOption(body, "removeStopwords", errors);
  const removeEmpty = readBool(body, "removeEmpty", errors);
  const removeNumbers = readBool(body, "removeNumbers", errors);
  const removeShorterThan = readInt(body, "removeShorterThan", errors);
  const removeLongerThan = readInt(body, "removeLongerThan", errors);
  if (errors.length) return invalid(req, errors);

  const documents = ctx.service.clean({
    removePunct,
    removeStopwords,
    removeEmpty,
    removeNumbers,
    removeShorterThan,
    removeLongerThan,
  });
  return json(200, { documents });
});

const glue = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  const patterns = readPatterns(body, errors);
  const match = readMatchOptions(body, errors);
  const glueStr = readString(body, "glue", errors);
  if (errors.length) return invalid(req, errors);

  return json(200, { glued: ctx.service.glue(patterns, { ...match, glue: glueStr }) });
});

const expand = withBody((ctx, req, body) => {
  const errors: FieldError[] = [];
  let splitChars: string[] | undefined;
  if (body.splitChars !== undefined) {
    splitChars = asStringArray(body.splitChars);
    if (!splitChars) pushErr(errors, "$.splitChars", "must be an array of strings");
  }

  let minPartLength: number | null | undefined;
  if (body.minPartLength === null) minPartLength = null;
  else minPartLength = readInt(body, "minPartLength", errors);

  const splitOnCaseChange = readBool(body, "splitOnCaseChange", errors);
  if (errors.length) return invalid(req, errors);

  return json(200, { documents: ctx.service.expandCompounds({ splitChars, minPartLength, splitOnCaseChange }) });
});

const routes: Record<string, Handler> = {
  "GET /health": (ctx) =>
    json(200, { status: "ok", service: SERVICE, version: VERSION, uptimeMs: Date.now() - ctx.startedAt }),
  "GET /documents": (ctx) => json(200, { documents: ctx.service.list() }),
  "POST /documents": ingest,
  "GET /vocabulary": (ctx) => json(200, { vocabulary: ctx.service.vocabulary() }),
  "GET /doc-frequencies": (ctx, req) =>
    json(200, { frequencies: ctx.service.docFrequencies(req.query.get("proportions") === "true") }),
  "POST /ngrams": ngrams,
  "POST /kwic": kwic,
  "POST /filter": filter,
  "POST /clean": clean,
  "POST /compact": (ctx) => json(200, { documents: ctx.service.compact() }),
  "POST /glue": glue,
  "POST /expand-compounds": expand,
};

/**
 * Routes one parsed request. Engine errors become problem documents; anything
 * else is logged and answered with 500.
 */
export function handleRequest(ctx: RouteContext, req: RouteRequest): RouteResponse {
  const handler = routes[`${req.method} ${req.path}`];
  if (!handler) return fail(req, 404, "NOT_FOUND", "not found");

  try {
    return handler(ctx, req);
  } catch (e) {
    if (e instanceof CorpusError) {
      return fail(req, statusForError(e), e.code, e.message);
    }
    ctx.logger.error({ err: e, requestId: req.requestId }, "unhandled error");
    return fail(req, 500, "INTERNAL", "internal error");
  }
}
