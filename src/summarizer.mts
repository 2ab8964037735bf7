import type {SearchResult} from "./types.mjs";
import type {SearchState, SearchUpdate} from "./state.mjs";

const MAX_CELL = 160;

function cell(v: string | number | undefined): string {
  const flat = String(v ?? "").replace(/\s+/g, " ").trim();
  const cut = flat.length > MAX_CELL ? `${flat.slice(0, MAX_CELL - 1)}…` : flat;
  return cut.replace(/\|/g, "\\|");
}

export function formatMarkdownTable(results: SearchResult[]): string {
  const headers = ["#", "Condition", "Symptoms", "Advice", "Score", "Source"];
  const head = `| ${headers.join(" | ")} |`;
  const sep = `| ${headers.map(() => "---").join(" | ")} |`;
  const body = results.map((r, i) => {
    const vals = [String(i + 1), r.condition, r.symptoms, r.advice, r.score.toFixed(3), r.url];
    return `| ${vals.map(cell).join(" | ")} |`;
  });
  return [head, sep, ...body].join("\n");
}

export function summarizeResults(results: SearchResult[]): string {
  if (!results.length) {
    return "No similar cases found.";
  }
  const noun = results.length === 1 ? "case" : "cases";
  return `${results.length} similar ${noun} (lexical match, not a diagnosis):\n\n${formatMarkdownTable(results)}`;
}

export function summarizerNode(s: SearchState): SearchUpdate {
  return {summary: summarizeResults(s.results ?? [])};
}
