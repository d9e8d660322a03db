import http from "node:http";
import { randomUUID } from "node:crypto";

import type { Logger } from "../logger.js";
import { createCorpusService, type CorpusService } from "./corpusService.js";
import { handleRequest, type RouteResponse } from "./routes.js";
import { PROBLEM_CONTENT_TYPE, problem } from "./problem.js";

export interface ServerOptions {
  port?: number;
  logger: Logger;
  service?: CorpusService;
  language?: string;
  maxDocuments?: number;
}

export function createServer(opts: ServerOptions): http.Server {
  const startedAt = Date.now();
  const service = opts.service ?? createCorpusService({ context: { language: opts.language } });
  const ctx = { service, logger: opts.logger, startedAt, maxDocuments: opts.maxDocuments ?? 1000 };

  return http.createServer((req, res) => {
    const requestId = randomUUID();
    const log = opts.logger.child({ requestId });
    const began = Date.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    void readBody(req)
      .then((raw) => {
        const contentType = mediaType(req);
        let body: unknown = null;
        if (raw.length && contentType === "application/json") {
          try {
            body = JSON.parse(raw);
          } catch {
            return send(res, {
              status: 400,
              contentType: PROBLEM_CONTENT_TYPE,
              body: problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance: url.pathname, requestId }),
            });
          }
        }
        send(res, handleRequest(ctx, { method, path: url.pathname, query: url.searchParams, contentType, body, requestId }));
      })
      .catch((err: unknown) => {
        log.error({ err }, "request failed");
        send(res, {
          status: 500,
          contentType: PROBLEM_CONTENT_TYPE,
          body: problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }),
        });
      })
      .finally(() => {
        log.info({ method, path: url.pathname, status: res.statusCode, durationMs: Date.now() - began }, "request");
      });
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
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

function mediaType(req: http.IncomingMessage): string | undefined {
  const ct = req.headers["content-type"];
  if (!ct) return undefined;
  return (ct.split(";")[0] ?? "").trim().toLowerCase();
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  return Buffer.concat(chunks).toString("utf8");
}

function send(res: http.ServerResponse, r: RouteResponse): void {
  res.statusCode = r.status;
  res.setHeader("content-type", r.contentType);
  res.end(JSON.stringify(r.body));
}
