/**
 * Length of the longest common subsequence of two code point sequences,
 * computed with a single rolling row.
 */
function lcsLength(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  const row = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    let diagonal = 0;
    for (let j = 1; j <= inner.length; j++) {
      const above = row[j];
      row[j] = outer[i - 1] === inner[j - 1]
        ? diagonal + 1
        : Math.max(row[j], row[j - 1]);
      diagonal = above;
    }
  }
  return row[inner.length];
}

/**
 * Normalized Indel similarity on a 0-100 scale, rounded to two decimals:
 * 100 * (1 - indelDistance / (|a| + |b|)), i.e. 200 * LCS / (|a| + |b|).
 */
export function calculateSimilarity(original: string | null, corrected: string | null): number {
  const a = Array.from(original ?? '');
  const b = Array.from(corrected ?? '');
  const total = a.length + b.length;
  if (total === 0) return 100;

  const ratio = (200 * lcsLength(a, b)) / total;
  return Math.round(ratio * 100) / 100;
}
