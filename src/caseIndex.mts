import {loadRows} from "./kbLoader.mjs";
import {cosine, fitTransform, transform, type TfidfModel} from "./tfidf.mjs";
import type {EvidenceSink} from "./evidence.mjs";
import type {
  CorpusStats,
  KnowledgeBaseRow,
  KnowledgeBaseSource,
  SearchResult,
  SparseVector
} from "./types.mjs";

export const DEFAULT_TOP_K = 3;

/** Built once per CaseIndex, read-only afterwards. */
export type IndexedCorpus = {
  model: TfidfModel;
  documentVectors: SparseVector[];   // one per row, same order
};

export type CaseIndexOptions = {
  source: KnowledgeBaseSource;
  maxFeatures?: number;
  evidence?: EvidenceSink;
  /** Swappable for tests; defaults to the CSV loader. */
  load?: (source: KnowledgeBaseSource) => Promise<KnowledgeBaseRow[]>;
  onLoad?: (rowCount: number) => void;
};

/** Text indexed for a row; a query equal to this matches the row exactly. */
export function rowText(r: KnowledgeBaseRow): string {
  return `${r.condition} | ${r.patientText} | ${r.advice}`;
}

const round3 = (x: number) => Math.round(x * 1000) / 1000;

/**
 * Similar-case lookup over the knowledge base.
 *
 * The first `search` or `stats` call loads and indexes the CSV; callers that
 * arrive during that window wait on the same build.
 */
export class CaseIndex {
  private rows: KnowledgeBaseRow[] = [];
  private corpus?: IndexedCorpus;
  private building?: Promise<void>;

  constructor(private readonly opts: CaseIndexOptions) {}

  private ensureBuilt(): Promise<void> {
    this.building ??= this.build();
    return this.building;
  }

  private async build(): Promise<void> {
    const load = this.opts.load ?? loadRows;
    const rows = await load(this.opts.source);
    this.opts.onLoad?.(rows.length);
    this.rows = rows;
    if (!rows.length) {
      console.error("[case-index] empty corpus, similar-case search disabled");
      return;
    }

    const started = Date.now();
    try {
      const {model, matrix} = fitTransform(rows.map(rowText), {
        maxFeatures: this.opts.maxFeatures,
        ngramRange: [1, 2],
      });
      this.corpus = {model, documentVectors: matrix};
      console.error(
        `[case-index] indexed ${rows.length} rows, ${model.vocabulary.size} terms in ${Date.now() - started}ms`
      );
    } catch (err) {
      console.error("[case-index] index build failed:", err instanceof Error ? err.message : err);
    }
  }

  async stats(): Promise<CorpusStats> {
    await this.ensureBuilt();
    return {
      rows: this.rows.length,
      indexed: this.corpus?.documentVectors.length ?? 0,
    };
  }

  /** Top `topK` rows by cosine similarity, best first; ties keep file order. */
  async search(query: string, topK = DEFAULT_TOP_K): Promise<SearchResult[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RangeError(`topK must be an integer >= 1, got ${topK}`);
    }
    await this.ensureBuilt();

    const corpus = this.corpus;
    if (!corpus) {
      this.opts.evidence?.add("dataset", "0 similar cases");
      return [];
    }

    const q = transform(corpus.model, query);
    const ranked = corpus.documentVectors
      .map((vec, i) => ({i, score: cosine(q, vec)}))
      .sort((a, b) => b.score - a.score || a.i - b.i)
      .slice(0, topK);

    const out = ranked.map(({i, score}): SearchResult => {
      const r = this.rows[i];
      return {
        condition: r.condition,
        symptoms: r.patientText,
        advice: r.advice,
        ...(r.url ? {url: r.url} : {}),
        score: round3(score),
      };
    });

    this.opts.evidence?.add("dataset", `${out.length} similar cases`);
    return out;
  }
}
