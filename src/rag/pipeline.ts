import type { AppContext } from "../app-context.js";
import type { StreamHandlers } from "./completion-service.js";
import { buildVerseContexts } from "./context-windower.js";
import { loadCorpus } from "./corpus-loader.js";
import { retrievalQuery } from "./query-analyzer.js";
import type { ConversationTurn, QueryDecision, RetrievedPassage } from "./types.js";
import { needsRebuild } from "./verse-index.js";

export interface TurnEvents extends StreamHandlers {
  /** Fires before generation starts, only on turns that searched the index. */
  onRetrieved?(passages: RetrievedPassage[]): void;
}

export interface ChatTurnResult {
  answer: string;
  decision: QueryDecision;
  /** Undefined when the turn skipped retrieval. */
  passages: RetrievedPassage[] | undefined;
}

export interface PipelineHealth {
  conversations: "ready";
  index: "ready" | "not initialized";
  indexedCount: number;
}

export interface RagPipeline {
  readonly indexedCount: number;
  chat(
    conversationId: string,
    message: string,
    events?: TurnEvents,
  ): Promise<ChatTurnResult>;
  reindex(): Promise<number>;
  health(): PipelineHealth;
}

async function indexCorpus(ctx: AppContext): Promise<number> {
  const { config, log } = ctx;

  log(`RAG: loading corpus from ${config.corpus.path}...`);
  const verses = await loadCorpus(config.corpus.path);
  log(`RAG: loaded ${verses.length} verses`);

  const contexts = buildVerseContexts(verses, config.index.windowSize);
  log(`RAG: built ${contexts.length} context windows (window ${config.index.windowSize})`);

  log(`RAG: embedding and indexing into ${config.index.collection}...`);
  const count = await ctx.index.rebuild(contexts, log);
  log(`RAG: collection ${config.index.collection} ready with ${count} verses`);
  return count;
}

export async function initRagPipeline(ctx: AppContext): Promise<RagPipeline> {
  const { config, log } = ctx;

  log(`RAG: probing collection ${config.index.collection}...`);
  const probe = await ctx.index.probe();
  let indexedCount = probe.state === "populated" ? probe.count : 0;

  const rebuild = needsRebuild(probe, {
    embeddingModel: config.embedding.model,
    windowSize: config.index.windowSize,
    requireManifest: config.index.requireManifest,
  });

  if (!rebuild) {
    log(`RAG: using existing collection (${indexedCount} verses)`);
  } else {
    if (probe.state === "absent") log("RAG: collection does not exist, building it");
    else if (probe.state === "empty") log("RAG: collection is empty, re-indexing");
    else log("RAG: collection is incomplete or stale, re-indexing");
    indexedCount = await indexCorpus(ctx);
  }

  return {
    get indexedCount() {
      return indexedCount;
    },

    async reindex() {
      indexedCount = await indexCorpus(ctx);
      return indexedCount;
    },

    health() {
      return {
        conversations: "ready",
        index: ctx.index.isOpen ? "ready" : "not initialized",
        indexedCount,
      };
    },

    async chat(conversationId, message, events) {
      const recent = await ctx.conversations.getRecent(
        conversationId,
        config.queryRewrite.contextMessages,
      );

      const userTurn: ConversationTurn = {
        role: "user",
        content: message,
        timestamp: new Date().toISOString(),
      };
      await ctx.conversations.append(conversationId, userTurn);

      const decision = await ctx.analyzer.analyze(message, recent);
      const reason = decision.reasoning ? ` (${decision.reasoning})` : "";
      log(`RAG: ${decision.kind}: retrieval=${decision.needsRetrieval}${reason}`);

      const searchQuery = retrievalQuery(decision, message);
      let passages: RetrievedPassage[] | undefined;
      if (searchQuery !== null) {
        passages = await ctx.retriever.retrieve(searchQuery);
        log(`RAG: retrieved ${passages.length} passage(s) for "${searchQuery}"`);
        events?.onRetrieved?.(passages);
      }

      const answer = await ctx.generator.generate(message, passages, recent, events);

      await ctx.conversations.append(conversationId, {
        role: "assistant",
        content: answer,
        timestamp: new Date().toISOString(),
        ...(passages && passages.length > 0 ? { retrievedPassages: passages } : {}),
      });

      return { answer, decision, passages };
    },
  };
}
