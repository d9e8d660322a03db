import type { Pattern, TokenAttrValue } from "../types.js";
import type { TokenDocument } from "../document.js";
import type { TokenMatcher } from "../matcher.js";
import type { WindowBuilder } from "../window.js";
import type { ContextSize, KwicDocument, KwicOptions, KwicWindow, Table, TableCell } from "../corpus.js";
import { BASE_TOKEN_ATTRS } from "../types.js";
import { invalidArgument } from "../errors.js";

export interface KwicDeps {
  matcher: TokenMatcher;
  windows: WindowBuilder;
}

/** `contextSize` as `[left, right]`. */
export function contextRadii(contextSize: ContextSize = 2): [number, number] {
  if (typeof contextSize === "number") return [contextSize, contextSize];
  if (contextSize.length !== 2) {
    throw invalidArgument("`contextSize` must be a number or a [left, right] pair", { contextSize });
  }
  return [contextSize[0], contextSize[1]];
}

const BASE: ReadonlySet<string> = new Set(BASE_TOKEN_ATTRS);

/** Base attributes first, then extended ones; each group sorted by name. */
export function orderAttrNames(names: Iterable<string>): string[] {
  const base: string[] = [];
  const ext: string[] = [];
  for (const n of new Set(names)) (BASE.has(n) ? base : ext).push(n);
  return [...base.sort(), ...ext.sort()];
}

export function kwicDocument(doc: TokenDocument, patterns: Pattern | readonly Pattern[], options: KwicOptions, deps: KwicDeps): KwicDocument {
  const [left, right] = contextRadii(options.contextSize);
  const tokens = doc.logicalTokens();

  let matches = deps.matcher.matchAny(patterns, tokens, options);
  if (options.inverse) matches = matches.map((m) => !m);

  const centers: number[] = [];
  matches.forEach((m, i) => {
    if (m) centers.push(i);
  });

  const names = options.withAttrs ? orderAttrNames(doc.attrNames()) : [];
  const values = new Map<string, TokenAttrValue[]>();
  for (const name of names) values.set(name, doc.logicalAttr(name));

  const windows = deps.windows.around(matches, left, right).map((positions, context): KwicWindow => {
    const center = centers[context]!;
    const win: KwicWindow = {
      context,
      positions,
      tokens: positions.map((k) => {
        const t = tokens[k]!;
        return options.highlightKeyword !== undefined && k === center ? `${options.highlightKeyword}${t}${options.highlightKeyword}` : t;
      }),
    };

    if (options.withAttrs) {
      const attrs: Record<string, TokenAttrValue[]> = {};
      for (const [name, vals] of values) attrs[name] = positions.map((k) => vals[k] ?? null);
      win.attrs = attrs;
    }
    return win;
  });

  return { doc: doc.label, windows };
}

function compareCells(a: TableCell, b: TableCell): number {
  if (a === b) return 0;
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a) < String(b) ? -1 : 1;
}

function sortRows(rows: TableCell[][], keyColumns: number): TableCell[][] {
  return rows.sort((x, y) => {
    for (let c = 0; c < keyColumns; c++) {
      const d = compareCells(x[c] ?? null, y[c] ?? null);
      if (d !== 0) return d;
    }
    return 0;
  });
}

/** One row per token: doc, context, position, token, then attribute columns. */
export function kwicFrame(results: readonly KwicDocument[]): Table {
  const names = orderAttrNames(results.flatMap((r) => r.windows.flatMap((w) => Object.keys(w.attrs ?? {}))));
  const rows: TableCell[][] = [];

  for (const r of results) {
    for (const w of r.windows) {
      w.positions.forEach((pos, i) => {
        const row: TableCell[] = [r.doc, w.context, pos, w.tokens[i] ?? null];
        for (const name of names) row.push(w.attrs?.[name]?.[i] ?? null);
        rows.push(row);
      });
    }
  }

  return { columns: ["doc", "context", "position", "token", ...names], rows: sortRows(rows, 3) };
}

/** One row per window: doc, context, glued window text. */
export function kwicTable(results: readonly KwicDocument[], glue: string): Table {
  const rows: TableCell[][] = [];
  for (const r of results) {
    for (const w of r.windows) rows.push([r.doc, w.context, w.tokens.join(glue)]);
  }
  return { columns: ["doc", "context", "kwic"], rows: sortRows(rows, 2) };
}
