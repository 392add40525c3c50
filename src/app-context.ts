import type { AppConfig } from "./rag/config.js";
import { createAnswerGenerator, type AnswerGenerator } from "./rag/answer-generator.js";
import { createCompletionClient, type CompletionService } from "./rag/completion-service.js";
import { createEmbeddingClient, type EmbeddingService } from "./rag/embedding-service.js";
import { createQueryAnalyzer, type QueryAnalyzer } from "./rag/query-analyzer.js";
import { createRetriever, type Retriever } from "./rag/retriever.js";
import type { VerseMetadata } from "./rag/types.js";
import { createVectraDatabase, type VectorDatabase } from "./rag/vector-store.js";
import { createVerseIndex, type VerseIndex } from "./rag/verse-index.js";
import {
  createConversationStore,
  type ConversationStore,
} from "./conversations/conversation-store.js";

export type Logger = (msg: string) => void;

/** Everything a request needs, built once at startup and passed explicitly. */
export interface AppContext {
  config: AppConfig;
  log: Logger;
  embeddings: EmbeddingService;
  completions: CompletionService;
  vectorDb: VectorDatabase<VerseMetadata>;
  index: VerseIndex;
  analyzer: QueryAnalyzer;
  retriever: Retriever;
  generator: AnswerGenerator;
  conversations: ConversationStore;
}

/** Service clients that tests replace with in-process fakes. */
export interface AppServices {
  embeddings: EmbeddingService;
  completions: CompletionService;
  vectorDb: VectorDatabase<VerseMetadata>;
  conversations: ConversationStore;
}

export function createAppContext(
  config: AppConfig,
  log: Logger,
  services: Partial<AppServices> = {},
): AppContext {
  const embeddings =
    services.embeddings ??
    createEmbeddingClient({
      apiUrl: config.llm.apiUrl,
      apiKey: config.llm.apiKey,
      model: config.embedding.model,
      queryPrefix: config.embedding.queryPrefix,
    });
  const completions =
    services.completions ??
    createCompletionClient({
      apiUrl: config.llm.apiUrl,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
    });
  const vectorDb =
    services.vectorDb ?? createVectraDatabase<VerseMetadata>(config.index.storeDir);
  const conversations =
    services.conversations ?? createConversationStore(config.conversationsDir);

  const index = createVerseIndex(vectorDb, embeddings, {
    collection: config.index.collection,
    batchSize: config.index.batchSize,
    embeddingModel: config.embedding.model,
    windowSize: config.index.windowSize,
  });

  return {
    config,
    log,
    embeddings,
    completions,
    vectorDb,
    index,
    analyzer: createQueryAnalyzer(completions, {
      enabled: config.queryRewrite.enabled,
      contextMessages: config.queryRewrite.contextMessages,
      temperature: config.queryRewrite.temperature,
      maxTokens: config.queryRewrite.maxTokens,
      corpusTitle: config.corpus.title,
    }),
    retriever: createRetriever(index, embeddings, config.index.topK),
    generator: createAnswerGenerator(completions, {
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      corpusTitle: config.corpus.title,
    }),
    conversations,
  };
}
