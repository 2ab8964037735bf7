#!/usr/bin/env node
import {CaseIndex} from "./caseIndex.mjs";
import {knowledgeBaseSource, loadConfig} from "./config.mjs";
import {EvidenceLog} from "./evidence.mjs";
import {makeSearchGraph} from "./graph.mjs";
import {createServer, installProcessHandlers} from "./server.mjs";
import {startStdio} from "./transport/stdio.mjs";

const config = loadConfig(process.env);
const evidence = new EvidenceLog();
const index = new CaseIndex({
  source: knowledgeBaseSource(config),
  maxFeatures: config.maxFeatures,
  evidence,
});

async function smokeTest() {
  const out = await makeSearchGraph(index).invoke({query: "sore throat and fever for three days", topK: 3});
  console.log("STATS:", JSON.stringify(await index.stats()));
  console.log("SUMMARY:\n", out.summary);
  console.log("EVIDENCE:", JSON.stringify(evidence.snapshot()));
}

installProcessHandlers();

const run = config.smokeTest ? smokeTest() : startStdio(createServer({index, evidence}));
run.catch((err) => {
  console.error("[similar-cases] fatal:", err);
  process.exitCode = 1;
});
