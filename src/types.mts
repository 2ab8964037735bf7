// Shared shapes for the similar-case knowledge base.

/** One historical case record from the knowledge base CSV. */
export type KnowledgeBaseRow = {
  condition: string;     // label or short topic, may be empty
  patientText: string;   // free-text complaint / symptoms
  advice: string;        // self-care guidance or clinician note
  url?: string;          // source link, absent when the CSV has none
};

/** One similarity hit, in the shape the agent consumes. */
export type SearchResult = {
  condition: string;
  symptoms: string;
  advice: string;
  url?: string;
  score: number;         // cosine similarity in [0, 1], 3 decimals
};

export type CorpusStats = {
  rows: number;
  indexed: number;
};

/** Sparse row: vocabulary column -> weight. */
export type SparseVector = Map<number, number>;

/** Where the CSV comes from. */
export type KnowledgeBaseSource = {
  localPath: string;
  remoteUri?: string;
  timeoutMs: number;
  maxRows?: number;
};
