/**
 * Counts — string-keyed integer maps (bonds, propagation paths,
 * priorities) with no prototype, so keys such as `constructor` or
 * `__proto__` are plain entries.
 */

export type Counts = Record<string, number>;

export function emptyCounts(): Counts {
  const counts: Counts = Object.create(null);
  return counts;
}

export function countsFrom(entries: Iterable<readonly [string, number]>): Counts {
  const counts = emptyCounts();
  for (const [key, value] of entries) counts[key] = value;
  return counts;
}

/** The stored count, or 0 when the key was never written. */
export function countOf(counts: Counts, key: string): number {
  return Object.hasOwn(counts, key) ? counts[key] : 0;
}
