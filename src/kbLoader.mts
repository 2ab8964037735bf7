import {readFile} from "node:fs/promises";
import {parse} from "csv-parse/sync";
import {z} from "zod";
import {describeFetchError, ensureLocalCsv, type FetchFn} from "./kbSource.mjs";
import type {KnowledgeBaseRow, KnowledgeBaseSource} from "./types.mjs";

type Field = "condition" | "patientText" | "advice" | "url";

// Case-insensitive header aliases; within a list the first header (left to
// right) that matches wins. The first alias doubles as the default column name.
const COLUMN_ALIASES: Record<Field, readonly string[]> = {
  condition: ["condition", "disease", "name"],
  patientText: ["symptoms", "symptom", "features"],
  advice: ["advice", "self_care", "recommendations"],
  url: ["url", "link", "source"],
};

// Patient/doctor exports; consulted only when no primary alias matches.
const FALLBACK_ALIASES: Partial<Record<Field, readonly string[]>> = {
  condition: ["description"],
  patientText: ["patient"],
  advice: ["doctor"],
};

const CsvRecords = z.array(z.array(z.string()));

export type ColumnMap = Record<Field, number | undefined>;

export function resolveColumns(headers: string[]): ColumnMap {
  const normalized = headers.map(h => h.trim().toLowerCase());
  const find = (names: readonly string[] = []) => {
    const i = normalized.findIndex(h => names.includes(h));
    return i >= 0 ? i : undefined;
  };
  const resolve = (field: Field) => find(COLUMN_ALIASES[field]) ?? find(FALLBACK_ALIASES[field]);
  return {
    condition: resolve("condition"),
    patientText: resolve("patientText"),
    advice: resolve("advice"),
    url: resolve("url"),
  };
}

/**
 * Parse knowledge-base CSV text (header row first) into rows.
 * Rows with all three text fields blank are dropped; `maxRows` keeps the
 * first N surviving rows. Throws on CSV syntax errors.
 */
export function parseRows(csvText: string, opts?: { maxRows?: number }): KnowledgeBaseRow[] {
  const records = CsvRecords.parse(parse(csvText, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  }));
  if (records.length === 0) {
    return [];
  }

  const [headers, ...body] = records;
  const cols = resolveColumns(headers);
  const cell = (record: string[], i: number | undefined) =>
    i === undefined ? "" : (record[i] ?? "").trim();

  const rows: KnowledgeBaseRow[] = [];
  for (const record of body) {
    const condition = cell(record, cols.condition);
    const patientText = cell(record, cols.patientText);
    const advice = cell(record, cols.advice);
    if (!condition && !patientText && !advice) {
      continue;
    }
    const url = cell(record, cols.url);
    rows.push({condition, patientText, advice, ...(url ? {url} : {})});
    if (opts?.maxRows !== undefined && rows.length >= opts.maxRows) {
      break;
    }
  }
  return rows;
}

/**
 * Load the knowledge base. Never throws: a missing source or an unreadable
 * file yields an empty corpus.
 */
export async function loadRows(
  source: KnowledgeBaseSource,
  fetchImpl?: FetchFn
): Promise<KnowledgeBaseRow[]> {
  const local = await ensureLocalCsv(source, fetchImpl);
  if (!local.ok) {
    console.error(`[kb-loader] knowledge base unavailable: ${describeFetchError(local.error)}`);
    return [];
  }

  try {
    const text = await readFile(local.value, "utf8");
    const rows = parseRows(text, {maxRows: source.maxRows});
    console.error(`[kb-loader] loaded ${rows.length} rows from ${local.value}`);
    return rows;
  } catch (err) {
    console.error(`[kb-loader] could not parse ${local.value}:`, err instanceof Error ? err.message : err);
    return [];
  }
}
