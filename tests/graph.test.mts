import {afterEach, beforeEach, describe, expect, it, vi} from "vitest";
import {CaseIndex} from "../src/caseIndex.mjs";
import {makeSearchGraph} from "../src/graph.mjs";
import type {KnowledgeBaseRow} from "../src/types.mjs";

const CORPUS: KnowledgeBaseRow[] = [
  {condition: "Strep throat", patientText: "sore throat and fever", advice: "rest and fluids"},
  {condition: "Migraine", patientText: "throbbing headache", advice: "dark quiet room"},
  {condition: "Flu", patientText: "fever and aches", advice: "rest"},
  {condition: "Gout", patientText: "swollen big toe", advice: "ice"},
];

function graphOver(rows: KnowledgeBaseRow[]) {
  return makeSearchGraph(new CaseIndex({
    source: {localPath: "/nonexistent/cases.csv", timeoutMs: 1000},
    load: async () => rows,
  }));
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("search graph", () => {
  it("normalises the query, retrieves and summarises", async () => {
    const out = await graphOver(CORPUS).invoke(
      {query: "  sore   throat ", topK: 1});

    expect(out.query).toBe("sore throat");
    expect(out.results.map(r => r.condition)).toEqual(["Strep throat"]);
    expect(out.summary.split("\n")[0]).toBe("1 similar case (lexical match, not a diagnosis):");
  });

  it("defaults topK to 3", async () => {
    const out = await graphOver(CORPUS).invoke({query: "fever"});
    expect(out.topK).toBe(3);
    expect(out.results).toHaveLength(3);
  });

  it("carries nothing over between searches", async () => {
    const graph = graphOver(CORPUS);
    const first = await graph.invoke({query: "fever", topK: 1});
    const second = await graph.invoke({query: "headache"});

    expect(first.results).toHaveLength(1);
    expect(second.topK).toBe(3);
    expect(second.results.map(r => r.condition)).toEqual(["Migraine", "Strep throat", "Flu"]);
  });

  it("summarises an empty corpus", async () => {
    const out = await graphOver([]).invoke({query: "fever", topK: 2});
    expect(out.results).toEqual([]);
    expect(out.summary).toBe("No similar cases found.");
  });
});
