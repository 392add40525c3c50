export interface Verse {
  source: string;
  book: string;
  chapter: string;
  verse: string;
  content: string;
}

export interface VerseContext {
  book: string;
  chapter: string;
  verse: string;
  content: string;
  /** The verse plus its chapter-local neighbours, space-joined. */
  context: string;
}

// A type alias rather than an interface so it satisfies vectra's
// Record<string, MetadataTypes> constraint.
export type VerseMetadata = {
  book: string;
  chapter: string;
  verse: string;
  content: string;
  context: string;
};

export interface IndexedRecord {
  id: string;
  embedding: number[];
  document: string;
  metadata: VerseMetadata;
}

export interface RetrievedPassage extends VerseContext {
  score: number;
}

export interface IndexManifest {
  collection: string;
  count: number;
  embeddingModel: string;
  windowSize: number;
  completedAt: string;
}

export type IndexProbe =
  | { state: "absent" }
  | { state: "empty" }
  | {
      state: "populated";
      count: number;
      complete: boolean;
      manifest: IndexManifest | null;
    };

export type QueryDecision =
  | {
      kind: "passthrough";
      needsRetrieval: true;
      rewrittenQuery: string;
      reasoning: string;
    }
  | {
      kind: "decided";
      needsRetrieval: boolean;
      rewrittenQuery: string | null;
      reasoning: string | null;
    }
  | {
      kind: "fallback";
      needsRetrieval: true;
      rewrittenQuery: string;
      reasoning: string;
    };

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  timestamp: string;
  retrievedPassages?: RetrievedPassage[];
}

export interface Conversation {
  id: string;
  title: string | null;
  createdAt: string;
  updatedAt: string;
  turns: ConversationTurn[];
}

export interface ConversationSummary {
  id: string;
  title: string | null;
  createdAt: string;
  updatedAt: string;
  messageCount: number;
}
