import type { ChatMessage } from "./completion-service.js";
import type { ConversationTurn, RetrievedPassage } from "./types.js";

export const NO_PASSAGES_PROMPT = `You are a knowledgeable scripture assistant helping users understand the text.

No specific verses were retrieved for this message. Answer from the conversation context alone, and do not cite or quote verse references that do not appear in the conversation.`;

/** Upper-cases the first letter and lower-cases the rest ("1 JOHN" -> "1 john", "genesis" -> "Genesis"). */
export function capitalizeBook(book: string): string {
  return book.charAt(0).toUpperCase() + book.slice(1).toLowerCase();
}

export function formatReference(
  p: Pick<RetrievedPassage, "book" | "chapter" | "verse">,
): string {
  return `${capitalizeBook(p.book)} ${p.chapter}:${p.verse}`;
}

export function formatPassages(passages: RetrievedPassage[]): string {
  return passages.map((p) => `${formatReference(p)} - ${p.content}`).join("\n\n");
}

export function buildGroundedPrompt(
  passages: RetrievedPassage[],
  corpusTitle: string,
): string {
  return `You are a knowledgeable scripture assistant helping users understand the text.

These verses from the ${corpusTitle} were retrieved as relevant to the user's question:

${formatPassages(passages)}

Guidelines:
- Base your answer on the retrieved verses
- Cite specific verse references for every claim (e.g. Genesis 1:1, John 3:16)
- Stay accurate and faithful to the wording of the text
- If the verses do not fully answer the question, say so
- Be concise but thorough
- Keep a respectful, scholarly tone`;
}

export function buildSystemPrompt(
  passages: RetrievedPassage[] | undefined,
  corpusTitle: string,
): string {
  return passages && passages.length > 0
    ? buildGroundedPrompt(passages, corpusTitle)
    : NO_PASSAGES_PROMPT;
}

/** System prompt, every history turn in order, then the current query. */
export function buildAnswerMessages(
  query: string,
  passages: RetrievedPassage[] | undefined,
  history: ConversationTurn[],
  corpusTitle: string,
): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt(passages, corpusTitle) },
    ...history.map((t): ChatMessage => ({ role: t.role, content: t.content })),
    { role: "user", content: query },
  ];
}

export function formatSourcesForUI(passages: RetrievedPassage[]): string {
  return passages.map((p) => formatReference(p)).join(", ");
}
