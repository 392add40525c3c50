import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, type AppConfig } from "../src/rag/config.js";
import type {
  CompletionRequest,
  CompletionService,
} from "../src/rag/completion-service.js";
import type { EmbeddingService } from "../src/rag/embedding-service.js";
import type { Verse } from "../src/rag/types.js";

export const FIXTURE_CORPUS = path.join(__dirname, "fixtures", "corpus.json");

// Axis 0 is constant so no vector is ever all zeros
export const KEYWORDS = ["light", "water", "shepherd", "bread", "mountain"];

export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  return [1, ...KEYWORDS.map((k) => words.filter((w) => w === k).length)];
}

export interface FakeEmbeddings extends EmbeddingService {
  textBatches: string[][];
  queries: string[];
}

export function createFakeEmbeddings(): FakeEmbeddings {
  const fake: FakeEmbeddings = {
    textBatches: [],
    queries: [],
    async embedTexts(texts) {
      fake.textBatches.push(texts);
      return texts.map(keywordVector);
    },
    async embedQuery(query) {
      fake.queries.push(query);
      return keywordVector(query);
    },
  };
  return fake;
}

export interface FakeCompletions extends CompletionService {
  requests: CompletionRequest[];
}

/** Replies via `respond`; streamed requests get the reply word by word. */
export function createFakeCompletions(
  respond: (request: CompletionRequest) => string | Promise<string>,
): FakeCompletions {
  const fake: FakeCompletions = {
    requests: [],
    async complete(request) {
      fake.requests.push(request);
      const reply = await respond(request);
      if (request.stream) {
        for (const part of reply.split(/(?<= )/)) request.stream.onContent?.(part);
      }
      return reply;
    },
  };
  return fake;
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "scripture-rag-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function testConfig(dir: string, env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    OPENROUTER_API_KEY: "test-secret",
    VECTOR_STORE_DIR: path.join(dir, "collections"),
    CONVERSATIONS_DIR: path.join(dir, "conversations"),
    CORPUS_PATH: FIXTURE_CORPUS,
    CORPUS_TITLE: "Test Scriptures",
    ...env,
  });
}

export function verse(book: string, chapter: string, n: number, content: string): Verse {
  return { source: "test", book, chapter, verse: String(n), content };
}
