import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { RAG_CONFIG } from "../rag/config.js";
import { ConversationNotFoundError } from "../rag/errors.js";
import type {
  Conversation,
  ConversationSummary,
  ConversationTurn,
} from "../rag/types.js";

const PassageSchema = z.object({
  book: z.string(),
  chapter: z.string(),
  verse: z.string(),
  content: z.string(),
  context: z.string(),
  score: z.number(),
});

const TurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  retrievedPassages: z.array(PassageSchema).optional(),
});

const ConversationSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  turns: z.array(TurnSchema),
});

export interface ConversationStore {
  create(title?: string): Promise<string>;
  get(id: string): Promise<Conversation | null>;
  /** The last `limit` turns, oldest first. */
  getRecent(id: string, limit: number): Promise<ConversationTurn[]>;
  append(id: string, turn: ConversationTurn): Promise<void>;
  list(limit?: number): Promise<ConversationSummary[]>;
  rename(id: string, title: string): Promise<void>;
  delete(id: string): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** One JSON file per conversation under `dir`. */
export function createConversationStore(
  dir: string,
  now: () => Date = () => new Date(),
): ConversationStore {
  function fileFor(id: string): string {
    if (!/^[A-Za-z0-9-]+$/.test(id)) throw new ConversationNotFoundError(id);
    return path.join(dir, `${id}.json`);
  }

  async function load(id: string): Promise<Conversation | null> {
    let data: string;
    try {
      data = await readFile(fileFor(id), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return ConversationSchema.parse(JSON.parse(data));
  }

  async function save(conversation: Conversation): Promise<void> {
    await mkdir(dir, { recursive: true });
    await writeFile(fileFor(conversation.id), JSON.stringify(conversation, null, 2));
  }

  async function loadOrThrow(id: string): Promise<Conversation> {
    const conversation = await load(id);
    if (!conversation) throw new ConversationNotFoundError(id);
    return conversation;
  }

  return {
    async create(title) {
      const timestamp = now().toISOString();
      const conversation: Conversation = {
        id: randomUUID(),
        title: title?.trim() || null,
        createdAt: timestamp,
        updatedAt: timestamp,
        turns: [],
      };
      await save(conversation);
      return conversation.id;
    },

    get: load,

    async getRecent(id, limit) {
      const conversation = await loadOrThrow(id);
      return limit > 0 ? conversation.turns.slice(-limit) : [];
    },

    async append(id, turn) {
      const conversation = await loadOrThrow(id);
      conversation.turns.push(turn);
      conversation.updatedAt = now().toISOString();
      await save(conversation);
    },

    async list(limit = RAG_CONFIG.conversationListLimit) {
      let entries: string[];
      try {
        entries = await readdir(dir);
      } catch (err) {
        if (isMissingFile(err)) return [];
        throw err;
      }

      const summaries: ConversationSummary[] = [];
      for (const entry of entries) {
        if (!entry.endsWith(".json")) continue;
        const conversation = await load(entry.slice(0, -".json".length));
        if (!conversation) continue;
        summaries.push({
          id: conversation.id,
          title: conversation.title,
          createdAt: conversation.createdAt,
          updatedAt: conversation.updatedAt,
          messageCount: conversation.turns.length,
        });
      }

      return summaries
        .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
        .slice(0, limit);
    },

    async rename(id, title) {
      const conversation = await loadOrThrow(id);
      conversation.title = title.trim() || null;
      await save(conversation);
    },

    async delete(id) {
      await rm(fileFor(id), { force: true });
    },
  };
}
