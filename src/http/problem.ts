import { CorpusError } from "../core/errors.js";

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title"> & { code: string }): Problem {
  const type = `https://errors.corpus-engine.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

export function statusForError(e: CorpusError): number {
  switch (e.code) {
    case "INVALID_ARGUMENT":
      return 400;
    case "SHAPE_MISMATCH":
    case "NOT_COMPACT":
      return 422;
    case "DUPLICATE_LABEL":
      return 409;
    case "UNKNOWN_DOCUMENT":
      return 404;
  }
}

function codeToTitle(code: string): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "SHAPE_MISMATCH":
      return "Shape mismatch";
    case "NOT_COMPACT":
      return "Document not compact";
    case "DUPLICATE_LABEL":
      return "Duplicate label";
    case "UNKNOWN_DOCUMENT":
      return "Unknown document";
    case "NOT_FOUND":
      return "Not found";
    default:
      return "Internal error";
  }
}
