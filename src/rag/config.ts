import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const RAG_CONFIG = {
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,

  // Per-turn cap when quoting history to the query analyzer
  transcriptTurnChars: 1000,

  conversationListLimit: 50,
} as const;

function booleanFlag(fallback: boolean) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0"]))
    .transform((v) => v === "true" || v === "1")
    .default(fallback ? "true" : "false");
}

function resolvedPath(fallback: string) {
  return z
    .string()
    .trim()
    .min(1)
    .default(fallback)
    .transform((p) => path.resolve(p));
}

const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().trim().min(1),
  LLM_API_URL: z
    .string()
    .url()
    .default("https://openrouter.ai/api/v1")
    .transform((url) => url.replace(/\/+$/, "")),
  LLM_MODEL: z.string().trim().min(1).default("qwen/qwen3.5-122b-a10b"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(500),

  EMBEDDING_MODEL: z.string().trim().min(1).default("qwen/qwen3-embedding-8b"),
  EMBEDDING_QUERY_PREFIX: z
    .string()
    .default("Instruct: Retrieve relevant scripture passages\nQuery: "),

  QUERY_REWRITE_ENABLED: booleanFlag(true),
  QUERY_REWRITE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  QUERY_REWRITE_MAX_TOKENS: z.coerce.number().int().positive().default(200),
  QUERY_CONTEXT_MESSAGES: z.coerce.number().int().min(0).default(5),

  CONTEXT_WINDOW_SIZE: z.coerce.number().int().min(0).default(2),
  TOP_K_RESULTS: z.coerce.number().int().positive().default(5),
  INDEX_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  INDEX_REQUIRE_MANIFEST: booleanFlag(true),
  COLLECTION_NAME: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "must be letters, digits, _ or -")
    .default("kjv_bible"),
  VECTOR_STORE_DIR: resolvedPath(".rag-cache/collections"),
  CONVERSATIONS_DIR: resolvedPath(".rag-cache/conversations"),

  CORPUS_PATH: resolvedPath("data/kjv.json"),
  CORPUS_TITLE: z.string().trim().min(1).default("King James Bible"),
});

export interface AppConfig {
  llm: {
    apiUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  embedding: {
    model: string;
    queryPrefix: string;
  };
  queryRewrite: {
    enabled: boolean;
    temperature: number;
    maxTokens: number;
    contextMessages: number;
  };
  index: {
    collection: string;
    storeDir: string;
    batchSize: number;
    windowSize: number;
    topK: number;
    requireManifest: boolean;
  };
  corpus: {
    path: string;
    title: string;
  };
  conversationsDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    llm: {
      apiUrl: e.LLM_API_URL,
      apiKey: e.OPENROUTER_API_KEY,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    embedding: {
      model: e.EMBEDDING_MODEL,
      queryPrefix: e.EMBEDDING_QUERY_PREFIX,
    },
    queryRewrite: {
      enabled: e.QUERY_REWRITE_ENABLED,
      temperature: e.QUERY_REWRITE_TEMPERATURE,
      maxTokens: e.QUERY_REWRITE_MAX_TOKENS,
      contextMessages: e.QUERY_CONTEXT_MESSAGES,
    },
    index: {
      collection: e.COLLECTION_NAME,
      storeDir: e.VECTOR_STORE_DIR,
      batchSize: e.INDEX_BATCH_SIZE,
      windowSize: e.CONTEXT_WINDOW_SIZE,
      topK: e.TOP_K_RESULTS,
      requireManifest: e.INDEX_REQUIRE_MANIFEST,
    },
    corpus: {
      path: e.CORPUS_PATH,
      title: e.CORPUS_TITLE,
    },
    conversationsDir: e.CONVERSATIONS_DIR,
  };
}
