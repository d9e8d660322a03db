import type { WindowBuilder, WindowOptions } from "../window.js";
import { requireNonNegativeInt } from "../errors.js";

export class IndexWindowBuilder implements WindowBuilder {
  around(matches: readonly boolean[], left: number, right: number): number[][] {
    requireNonNegativeInt(left, "left");
    requireNonNegativeInt(right, "right");

    const n = matches.length;
    const windows: number[][] = [];

    for (let i = 0; i < n; i++) {
      if (!matches[i]) continue;
      const from = Math.max(0, i - left);
      const to = Math.min(n - 1, i + right);
      const win: number[] = [];
      for (let k = from; k <= to; k++) win.push(k);
      windows.push(win);
    }

    return windows;
  }

  flattened(matches: readonly boolean[], left: number, right: number, removeOverlaps: boolean = true): number[] {
    const flat = this.around(matches, left, right).flat();
    if (!removeOverlaps) return flat;

    // windows are produced in ascending order of their match, so a presence
    // table over the vector length dedups and sorts in one pass
    const seen = new Array<boolean>(matches.length).fill(false);
    for (const k of flat) seen[k] = true;

    const out: number[] = [];
    for (let k = 0; k < seen.length; k++) {
      if (seen[k]) out.push(k);
    }
    return out;
  }
}

const defaultBuilder = new IndexWindowBuilder();

export function windowsAround(matches: readonly boolean[], left: number, right: number, options: WindowOptions & { flatten: true }): number[];
export function windowsAround(matches: readonly boolean[], left: number, right: number, options?: WindowOptions & { flatten?: false }): number[][];
export function windowsAround(matches: readonly boolean[], left: number, right: number, options?: WindowOptions): number[][] | number[];
export function windowsAround(matches: readonly boolean[], left: number, right: number, options?: WindowOptions): number[][] | number[] {
  if (options?.flatten) {
    return defaultBuilder.flattened(matches, left, right, options.removeOverlaps ?? true);
  }
  return defaultBuilder.around(matches, left, right);
}

/** Turns flattened window indices back into a keep-mask of length `n`. */
export function indicesToMask(indices: readonly number[], n: number): boolean[] {
  const mask = new Array<boolean>(n).fill(false);
  for (const k of indices) mask[k] = true;
  return mask;
}
