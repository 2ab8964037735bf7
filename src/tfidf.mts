import type {SparseVector} from "./types.mjs";

// Sparse TF-IDF over unigrams + bigrams.
//
// weight(t, d) = count(t, d) * idf(t),  idf(t) = ln((1 + n) / (1 + df(t))) + 1
// every row is L2-normalised, so cosine similarity is a plain dot product.

export type NgramRange = [min: number, max: number];

export type TfidfOptions = {
  maxFeatures?: number;
  ngramRange?: NgramRange;
};

export type TfidfModel = {
  vocabulary: Map<string, number>;   // term -> column, columns in term order
  idf: Float64Array;                 // indexed by column
  ngramRange: NgramRange;
};

export const DEFAULT_MAX_FEATURES = 30000;

const TOKEN_RE = /[\p{L}\p{N}_]{2,}/gu;

/** Lowercased word tokens of two or more characters; punctuation separates. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

export function ngrams(tokens: string[], [min, max]: NgramRange): string[] {
  const out: string[] = [];
  for (let n = min; n <= max; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      out.push(n === 1 ? tokens[i] : tokens.slice(i, i + n).join(" "));
    }
  }
  return out;
}

function countTerms(text: string, range: NgramRange): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of ngrams(tokenize(text), range)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

const compareTerms = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function weigh(model: TfidfModel, counts: Map<string, number>): SparseVector {
  const vec: SparseVector = new Map();
  let sumSq = 0;
  for (const [term, count] of counts) {
    const col = model.vocabulary.get(term);
    if (col === undefined) {
      continue;
    }
    const w = count * model.idf[col];
    vec.set(col, w);
    sumSq += w * w;
  }
  if (sumSq > 0) {
    const norm = Math.sqrt(sumSq);
    for (const [col, w] of vec) {
      vec.set(col, w / norm);
    }
  }
  return vec;
}

/**
 * Fit vocabulary + idf on `texts` and return their weighted rows.
 * When the vocabulary exceeds `maxFeatures`, the terms with the highest
 * corpus-wide count survive (ties: alphabetical).
 */
export function fitTransform(
  texts: string[],
  opts?: TfidfOptions
): { model: TfidfModel; matrix: SparseVector[] } {
  const {maxFeatures = DEFAULT_MAX_FEATURES, ngramRange = [1, 2]} = opts ?? {};
  if (!Number.isInteger(maxFeatures) || maxFeatures < 1) {
    throw new RangeError(`maxFeatures must be an integer >= 1, got ${maxFeatures}`);
  }

  const docs = texts.map(t => countTerms(t, ngramRange));

  const df = new Map<string, number>();
  const totals = new Map<string, number>();
  for (const counts of docs) {
    for (const [term, count] of counts) {
      df.set(term, (df.get(term) ?? 0) + 1);
      totals.set(term, (totals.get(term) ?? 0) + count);
    }
  }

  let terms = [...df.keys()];
  if (terms.length > maxFeatures) {
    terms = terms
      .sort((a, b) => (totals.get(b) ?? 0) - (totals.get(a) ?? 0) || compareTerms(a, b))
      .slice(0, maxFeatures);
  }
  terms.sort(compareTerms);

  const n = texts.length;
  const model: TfidfModel = {
    vocabulary: new Map(terms.map((t, i) => [t, i])),
    idf: Float64Array.from(terms, t => Math.log((1 + n) / (1 + (df.get(t) ?? 0))) + 1),
    ngramRange,
  };

  return {model, matrix: docs.map(counts => weigh(model, counts))};
}

/** Vectorise with an already-fitted model; unknown terms are ignored. */
export function transform(model: TfidfModel, text: string): SparseVector {
  return weigh(model, countTerms(text, model.ngramRange));
}

/** Cosine of two L2-normalised sparse vectors, clamped to [0, 1]. */
export function cosine(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [col, w] of small) {
    dot += w * (large.get(col) ?? 0);
  }
  return Math.min(1, Math.max(0, dot));
}
