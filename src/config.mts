import {z} from "zod";
import type {KnowledgeBaseSource} from "./types.mjs";

// "" in the environment means "unset"
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  TRIAGE_KB_LOCAL: z.preprocess(blankToUndefined,
    z.string().trim().default("/tmp/ai-medical-chatbot.csv")),
  TRIAGE_KB_REMOTE: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TRIAGE_KB_GCS: z.preprocess(blankToUndefined, z.string().trim().optional()),
  HTTP_TIMEOUT_SECS: z.preprocess(blankToUndefined, positiveInt.default(8)),
  RAG_MAX_FEATURES: z.preprocess(blankToUndefined, positiveInt.default(30000)),
  RAG_MAX_ROWS: z.preprocess(blankToUndefined, positiveInt.optional()),
  SMOKE_TEST: z.preprocess(blankToUndefined, z.string().optional()),
});

export type AppConfig = {
  kbLocalPath: string;
  kbRemoteUri?: string;
  httpTimeoutMs: number;
  maxFeatures: number;
  maxRows?: number;
  smokeTest: boolean;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    kbLocalPath: e.TRIAGE_KB_LOCAL,
    kbRemoteUri: e.TRIAGE_KB_REMOTE ?? e.TRIAGE_KB_GCS,
    httpTimeoutMs: e.HTTP_TIMEOUT_SECS * 1000,
    maxFeatures: e.RAG_MAX_FEATURES,
    maxRows: e.RAG_MAX_ROWS,
    smokeTest: e.SMOKE_TEST?.toLowerCase() === "true",
  };
}

export function knowledgeBaseSource(config: AppConfig): KnowledgeBaseSource {
  return {
    localPath: config.kbLocalPath,
    remoteUri: config.kbRemoteUri,
    timeoutMs: config.httpTimeoutMs,
    maxRows: config.maxRows,
  };
}
