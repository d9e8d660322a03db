import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

/** Decimal integer from a string (env vars, query parameters). */
export function asIntString(v: string): number | undefined {
  return /^-?\d+$/.test(v.trim()) ? Number.parseInt(v, 10) : undefined;
}

export function asBool(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

export function asStringArray(v: unknown): string[] | undefined {
  return Array.isArray(v) && v.every((x): x is string => typeof x === "string") ? v : undefined;
}

export function oneOf<T extends string>(v: string, allowed: readonly T[]): v is T {
  return allowed.some((a) => a === v);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
