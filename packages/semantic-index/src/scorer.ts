// packages/semantic-index/src/scorer.ts
// cosine + top-k helpers for retrieval

// ----------------------
// Cosine with guards
// ----------------------
export function cosineSimilarity(a?: number[], b?: number[]): number {
  if (!a || !b || a.length === 0 || b.length === 0) return 0;
  const n = Math.min(a.length, b.length);
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < n; i++) {
    const x = a[i], y = b[i];
    dot += x * y; na += x * x; nb += y * y;
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  return denom === 0 ? 0 : dot / denom;
}

// ----------------------
// Top-k by score; ties broken by key so results are stable
// ----------------------
export function pickTopK<T>(arr: T[], k: number, score: (x: T) => number, key: (x: T) => string): T[] {
  return arr
    .slice()
    .sort((a, b) => {
      const d = score(b) - score(a);
      if (d !== 0) return d;
      const ka = key(a), kb = key(b);
      return ka < kb ? -1 : ka > kb ? 1 : 0;
    })
    .slice(0, Math.max(0, k));
}
