import {McpServer} from "@modelcontextprotocol/sdk/server/mcp.js";
import {z} from "zod";

import type {CaseIndex} from "./caseIndex.mjs";
import {EVIDENCE_ALLOWED_SOURCES, type EvidenceLog} from "./evidence.mjs";
import {makeSearchGraph} from "./graph.mjs";

export type ServerDeps = {
  index: CaseIndex;
  evidence: EvidenceLog;
};

const SearchInput = {
  query: z.string().describe("Free-text symptoms or complaint, in the patient's words"),
  topK: z.number().int().default(3).describe("How many similar cases to return (>= 1)")
};

const EvidenceInput = {
  clear: z.boolean().default(true)
};

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

export function createServer({index, evidence}: ServerDeps): McpServer {
  const server = new McpServer({name: "similar-cases", version: "0.1.0"});
  const searchGraph = makeSearchGraph(index);

  server.registerTool(
    "similar-cases-search",
    {
      title: "Similar Past Cases",
      description: `
Find historical patient/doctor cases whose text is lexically similar to the user's
symptoms (TF-IDF over unigrams and bigrams, cosine similarity).

Use during triage to surface "similar cases" as supporting context. Results are
best-effort lexical matches, not diagnoses; an empty list means nothing similar
was found.

Output: a Markdown table, then the same results as a JSON array of
{condition, symptoms, advice, url?, score}.
      `.trim(),
      inputSchema: SearchInput
    },
    async ({query, topK}) => {
      try {
        const out = await searchGraph.invoke({query, topK});
        return {
          content: [
            {type: "text", text: out.summary ?? "No similar cases found."},
            {type: "text", text: JSON.stringify(out.results ?? [])},
          ],
        };
      } catch (err) {
        console.error("[similar-cases-search] tool error:", err instanceof Error ? err.stack : err);
        return {
          isError: true,
          content: [{type: "text", text: `Similar-case search error: ${messageOf(err)}`}],
        };
      }
    }
  );

  server.registerTool(
    "similar-cases-stats",
    {
      title: "Similar-Case Library Size",
      description: "Number of knowledge-base rows loaded and indexed. Useful for the greeting."
    },
    async () => {
      try {
        const stats = await index.stats();
        return {
          content: [
            {type: "text", text: JSON.stringify(stats)},
            {type: "text", text: `Scanning ~${stats.rows.toLocaleString("en-US")} similar cases from our library.`},
          ],
        };
      } catch (err) {
        console.error("[similar-cases-stats] tool error:", err instanceof Error ? err.stack : err);
        return {
          isError: true,
          content: [{type: "text", text: `Similar-case stats error: ${messageOf(err)}`}],
        };
      }
    }
  );

  server.registerTool(
    "evidence-panel",
    {
      title: "Evidence Panel",
      description: "Breadcrumbs recorded by triage tools (e.g. how many similar cases matched).",
      inputSchema: EvidenceInput
    },
    async ({clear}) => {
      const items = evidence.snapshot({clear, allowedSources: EVIDENCE_ALLOWED_SOURCES});
      return {content: [{type: "text", text: JSON.stringify({items})}]};
    }
  );

  return server;
}

export function installProcessHandlers() {
  process.on("unhandledRejection", (e) => console.error("unhandledRejection", e));
  process.on("uncaughtException", (e) => console.error("uncaughtException", e));
}
