// Edit-distance measures used by cross-validation and calibration scoring.

export function normalizeText(text: string) {
  return text.normalize("NFKC").replace(/\s+/g, " ").trim();
}

export function tokenizeWords(text: string) {
  return normalizeText(text)
    .toLowerCase()
    .split(/[^\p{L}\p{N}']+/u)
    .map((w) => w.replace(/^'+|'+$/g, ""))
    .filter(Boolean);
}

/** Levenshtein distance over any sequence (characters or words). */
export function editDistance<T>(a: readonly T[], b: readonly T[]) {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

/** 1 - distance / longer length, over whitespace-normalised characters. Two empty strings are identical. */
export function textSimilarity(a: string, b: string) {
  const x = Array.from(normalizeText(a));
  const y = Array.from(normalizeText(b));
  const longest = Math.max(x.length, y.length);
  if (longest === 0) return 1;
  return 1 - editDistance(x, y) / longest;
}

/**
 * Word error rate of `hypothesis` against `reference`: (S + D + I) / N.
 * An empty reference yields 0 against an empty hypothesis and 1 otherwise.
 */
export function wordErrorRate(reference: string, hypothesis: string) {
  const ref = tokenizeWords(reference);
  const hyp = tokenizeWords(hypothesis);
  if (ref.length === 0) return hyp.length === 0 ? 0 : 1;
  return editDistance(ref, hyp) / ref.length;
}

export function standardDeviation(values: readonly number[]) {
  if (values.length === 0) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}
