import { invalidArgument } from "./core/errors.js";
import { asIntString } from "./http/validation.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  port: number;
  logLevel: LogLevel;
  /** Stopword language for `cleanTokens`. */
  language: string;
  /** Upper bound on documents per ingest request. */
  maxDocuments: number;
}

function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

function intVar(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = asIntString(raw);
  if (n === undefined || n < min || n > max) {
    throw invalidArgument(`${name} must be an integer between ${min} and ${max}`, { [name]: raw });
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw invalidArgument(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`, { LOG_LEVEL: logLevel });
  }

  const language = env.CORPUS_LANGUAGE || "en";
  if (!/^[a-z]{2}$/.test(language)) {
    throw invalidArgument("CORPUS_LANGUAGE must be a two-letter ISO 639-1 code", { CORPUS_LANGUAGE: language });
  }

  return {
    port: intVar(env, "PORT", 3000, 0, 65535),
    logLevel,
    language,
    maxDocuments: intVar(env, "MAX_DOCUMENTS", 1000, 1, 1_000_000),
  };
}
