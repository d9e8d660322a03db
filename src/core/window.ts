/**
 * Builds index windows around the `true` entries of a match vector.
 *
 * A window for match `i` covers `[i - left, i + right]`, clipped to the
 * vector's bounds. `left` and `right` must be integers >= 0.
 */
export interface WindowBuilder {
  /** One ascending window per match, in match order. Windows may overlap. */
  around(matches: readonly boolean[], left: number, right: number): number[][];

  /**
   * All windows concatenated. With `removeOverlaps` (default) the indices are
   * deduplicated and sorted; otherwise they are returned as produced.
   */
  flattened(matches: readonly boolean[], left: number, right: number, removeOverlaps?: boolean): number[];
}

export interface WindowOptions {
  flatten?: boolean;
  removeOverlaps?: boolean;
}
