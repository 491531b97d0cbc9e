// node/src/services/providers/retrieval-vector-utils.ts: shared BM25-like + vector helpers for hybrid retrieval

export type Embedding = number[];

export interface Embedder {
  embed(text: string): Promise<Embedding>;
}

export function dot(a: Readonly<Embedding>, b: Readonly<Embedding>): number {
  if (a.length !== b.length) return 0;
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/** Unit-length copy of v; a zero vector is returned unchanged. */
export function normalize(v: Readonly<Embedding>): Embedding {
  const norm = Math.sqrt(dot(v, v));
  if (norm === 0) return v.slice();
  return v.map((x) => x / norm);
}

export function cosineSimilarity(a: Readonly<Embedding>, b: Readonly<Embedding>): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot(a, b) / (Math.sqrt(na) * Math.sqrt(nb));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

/** Very simple BM25-like scorer (constant idf, no corpus statistics beyond average length). */
export function bm25LikeScore(
  queryTokens: string[],
  docTokens: string[],
  avgDocLength: number,
  k1 = 1.5,
  b = 0.75,
): number {
  if (docTokens.length === 0 || queryTokens.length === 0) return 0;

  const docLength = docTokens.length;
  const termFreq = new Map<string, number>();
  for (const t of docTokens) {
    termFreq.set(t, (termFreq.get(t) ?? 0) + 1);
  }

  let score = 0;
  for (const qt of new Set(queryTokens)) {
    const tf = termFreq.get(qt) ?? 0;
    if (tf === 0) continue;

    const idf = 1.5;
    const numerator = tf * (k1 + 1);
    const denominator = tf + k1 * (1 - b + (b * docLength) / Math.max(avgDocLength, 1));

    score += idf * (numerator / denominator);
  }

  return score;
}
