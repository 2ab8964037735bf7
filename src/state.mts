import {Annotation} from "@langchain/langgraph";
import type {SearchResult} from "./types.mjs";

export const State = Annotation.Root({
  query: Annotation<string>(),
  topK: Annotation<number | undefined>(),
  results: Annotation<SearchResult[]>(),
  summary: Annotation<string>(),
});

export type SearchState = typeof State.State;
export type SearchUpdate = typeof State.Update;
