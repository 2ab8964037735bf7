import {DEFAULT_TOP_K} from "./caseIndex.mjs";
import type {SearchState, SearchUpdate} from "./state.mjs";

// Normalise the raw tool input before retrieval. topK is not range-checked
// here: CaseIndex.search rejects values below 1.
export function intakeNode(s: SearchState): SearchUpdate {
  const query = (s.query ?? "").replace(/\s+/g, " ").trim();
  return {query, topK: s.topK ?? DEFAULT_TOP_K};
}
