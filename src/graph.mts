import {END, START, StateGraph} from "@langchain/langgraph";
import type {CaseIndex} from "./caseIndex.mjs";
import {intakeNode} from "./intakeNode.mjs";
import {makeRetrieveNode} from "./retrieveNode.mjs";
import {State} from "./state.mjs";
import {summarizerNode} from "./summarizer.mjs";

// No checkpointer: every invoke starts from an empty state.
export function makeSearchGraph(index: CaseIndex) {
  const graph = new StateGraph(State)
    .addNode("intake", intakeNode)
    .addNode("retrieve", makeRetrieveNode(index))
    .addNode("summarize", summarizerNode)

    .addEdge(START, "intake")
    .addEdge("intake", "retrieve")
    .addEdge("retrieve", "summarize")
    .addEdge("summarize", END);

  return graph.compile();
}

export type SearchGraph = ReturnType<typeof makeSearchGraph>;
