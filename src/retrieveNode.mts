import type {RunnableConfig} from "@langchain/core/runnables";
import {DEFAULT_TOP_K, type CaseIndex} from "./caseIndex.mjs";
import type {SearchState, SearchUpdate} from "./state.mjs";

export function makeRetrieveNode(index: CaseIndex) {
  return async function retrieve(s: SearchState, _cfg?: RunnableConfig): Promise<SearchUpdate> {
    const results = await index.search(s.query, s.topK ?? DEFAULT_TOP_K);
    return {results};
  };
}
