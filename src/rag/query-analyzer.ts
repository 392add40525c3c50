import { z, ZodError } from "zod";
import { RAG_CONFIG } from "./config.js";
import type { CompletionService } from "./completion-service.js";
import { errorMessage } from "./errors.js";
import type { ConversationTurn, QueryDecision } from "./types.js";

export const REWRITE_DISABLED_REASON = "Query rewriting disabled";

const DecisionSchema = z.object({
  needs_retrieval: z.boolean(),
  rewritten_query: z.string().nullish(),
  reasoning: z.string().nullish(),
});

export interface QueryAnalyzerOptions {
  enabled: boolean;
  contextMessages: number;
  temperature: number;
  maxTokens: number;
  corpusTitle: string;
}

export interface QueryAnalyzer {
  analyze(query: string, recentTurns: ConversationTurn[]): Promise<QueryDecision>;
}

export function buildAnalysisSystemPrompt(corpusTitle: string): string {
  return `You analyze questions for a question-answering assistant grounded in the ${corpusTitle}.

Decide two things about the user's latest message:
1. needs_retrieval: whether answering it requires searching the ${corpusTitle} (true for substantive questions about its content; false for greetings, thanks or small talk).
2. rewritten_query: when retrieval is needed, a standalone search query that makes sense without the conversation. Replace pronouns and vague references with the topic they refer to.

Examples:
- "Who was Moses?" -> needs_retrieval: true, rewritten_query: "Who was Moses?"
- "Tell me more about that" (after discussing the flood) -> needs_retrieval: true, rewritten_query: "The flood and Noah's ark in more detail"
- "What else does it say?" (after discussing forgiveness) -> needs_retrieval: true, rewritten_query: "What else does the ${corpusTitle} say about forgiveness?"
- "Thanks, that helps!" -> needs_retrieval: false, rewritten_query: null

Reply with a JSON object with exactly these keys:
{
  "needs_retrieval": true or false,
  "rewritten_query": "standalone query" or null,
  "reasoning": "one short sentence"
}`;
}

/** Last `limit` turns as `role: content` lines, each content capped. */
export function buildTranscript(turns: ConversationTurn[], limit: number): string {
  const recent = limit > 0 ? turns.slice(-limit) : [];
  if (recent.length === 0) return "No previous context";
  return recent
    .map((t) => `${t.role}: ${t.content.slice(0, RAG_CONFIG.transcriptTurnChars)}`)
    .join("\n");
}

export function parseDecision(raw: string): QueryDecision {
  const parsed = DecisionSchema.parse(JSON.parse(raw));
  return {
    kind: "decided",
    needsRetrieval: parsed.needs_retrieval,
    rewrittenQuery: parsed.rewritten_query ?? null,
    reasoning: parsed.reasoning ?? null,
  };
}

/**
 * The query to search with, or null when the turn needs no retrieval.
 * A decision that asks for retrieval without a usable rewrite searches with
 * the user's own words.
 */
export function retrievalQuery(decision: QueryDecision, original: string): string | null {
  if (!decision.needsRetrieval) return null;
  const rewritten = decision.rewrittenQuery?.trim();
  return rewritten ? rewritten : original;
}

/** One line per failure; a schema mismatch reports only its first issue. */
function describeFailure(err: unknown): string {
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    return issue ? `${issue.path.join(".") || "reply"}: ${issue.message}` : "invalid reply";
  }
  return errorMessage(err);
}

export function createQueryAnalyzer(
  completions: CompletionService,
  options: QueryAnalyzerOptions,
): QueryAnalyzer {
  const systemPrompt = buildAnalysisSystemPrompt(options.corpusTitle);

  return {
    async analyze(query, recentTurns) {
      if (!options.enabled) {
        return {
          kind: "passthrough",
          needsRetrieval: true,
          rewrittenQuery: query,
          reasoning: REWRITE_DISABLED_REASON,
        };
      }

      const transcript = buildTranscript(recentTurns, options.contextMessages);
      const userPrompt = `Conversation so far:\n${transcript}\n\nLatest user message: ${query}\n\nAnalyze the latest message.`;

      try {
        const raw = await completions.complete({
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
          temperature: options.temperature,
          maxTokens: options.maxTokens,
          json: true,
        });
        return parseDecision(raw);
      } catch (err) {
        // Fail open to retrieval
        return {
          kind: "fallback",
          needsRetrieval: true,
          rewrittenQuery: query,
          reasoning: `Error in analysis: ${describeFailure(err)}`,
        };
      }
    },
  };
}
