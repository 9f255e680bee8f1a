import type { Comparator } from "./metrics";

export interface RankOptions {
  /**
   * The input is already in the comparator's order, as returned by a search
   * that sorted on the same field. Sorting is skipped.
   */
  presorted?: boolean;
}

/**
 * Orders `snapshots` by `compare` and keeps the first `n`. Ties keep their
 * input order; no secondary key is applied.
 */
export function rankSnapshots<T>(
  snapshots: readonly T[],
  compare: Comparator<T>,
  n: number,
  options: RankOptions = {}
): T[] {
  const limit = Math.max(0, Math.min(n, snapshots.length));
  const ordered = options.presorted ? snapshots : [...snapshots].sort(compare);
  return ordered.slice(0, limit);
}
