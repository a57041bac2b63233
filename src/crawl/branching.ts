/**
 * Per-level branching factor lookup.
 *
 * Out-of-range depths clamp to the nearest configured entry instead of failing,
 * so a short schedule such as [10, 3] means "10 at the seeds, 3 from then on".
 * `branchCounts` is assumed non-empty; normalizeTraversalConfig enforces that.
 */
export function branchCountAt(branchCounts: readonly number[], depth: number): number {
  const index = Math.max(0, Math.min(depth, branchCounts.length - 1));
  return branchCounts[index];
}
