import {
  buildTranscript,
  createQueryAnalyzer,
  parseDecision,
  retrievalQuery,
  REWRITE_DISABLED_REASON,
} from "../src/rag/query-analyzer.js";
import type { ConversationTurn, QueryDecision } from "../src/rag/types.js";
import { createFakeCompletions } from "./helpers.js";

const OPTIONS = {
  enabled: true,
  contextMessages: 2,
  temperature: 0.3,
  maxTokens: 200,
  corpusTitle: "Test Scriptures",
};

function turn(role: ConversationTurn["role"], content: string): ConversationTurn {
  return { role, content, timestamp: "2026-01-01T00:00:00.000Z" };
}

describe("createQueryAnalyzer", () => {
  it("passes the query through untouched when rewriting is disabled", async () => {
    const completions = createFakeCompletions(() => "{}");
    const analyzer = createQueryAnalyzer(completions, { ...OPTIONS, enabled: false });

    const decision = await analyzer.analyze("Who was Ruth?", [turn("user", "hi")]);

    expect(decision).toEqual({
      kind: "passthrough",
      needsRetrieval: true,
      rewrittenQuery: "Who was Ruth?",
      reasoning: REWRITE_DISABLED_REASON,
    });
    expect(completions.requests).toHaveLength(0);
  });

  it("asks for a JSON decision with the recent transcript", async () => {
    const completions = createFakeCompletions(() =>
      JSON.stringify({
        needs_retrieval: true,
        rewritten_query: "Where did Ruth glean?",
        reasoning: "Follow-up about Ruth",
      }),
    );
    const analyzer = createQueryAnalyzer(completions, OPTIONS);

    const decision = await analyzer.analyze("Where did she work?", [
      turn("user", "older"),
      turn("user", "Who was Ruth?"),
      turn("assistant", "A woman of Moab."),
    ]);

    expect(decision).toEqual({
      kind: "decided",
      needsRetrieval: true,
      rewrittenQuery: "Where did Ruth glean?",
      reasoning: "Follow-up about Ruth",
    });
    const [request] = completions.requests;
    expect(request?.json).toBe(true);
    expect(request?.temperature).toBe(0.3);
    expect(request?.maxTokens).toBe(200);
    expect(request?.stream).toBeUndefined();
    expect(request?.messages[0]?.role).toBe("system");
    expect(request?.messages[0]?.content).toContain("grounded in the Test Scriptures");
    expect(request?.messages[1]).toEqual({
      role: "user",
      content:
        "Conversation so far:\nuser: Who was Ruth?\nassistant: A woman of Moab.\n\n" +
        "Latest user message: Where did she work?\n\nAnalyze the latest message.",
    });
  });

  it("accepts a decision that skips retrieval", async () => {
    const completions = createFakeCompletions(
      () => '{"needs_retrieval": false, "rewritten_query": null, "reasoning": "Thanks", "confidence": 0.9}',
    );

    const decision = await createQueryAnalyzer(completions, OPTIONS).analyze("Thank you!", []);

    expect(decision).toEqual({
      kind: "decided",
      needsRetrieval: false,
      rewrittenQuery: null,
      reasoning: "Thanks",
    });
    expect(completions.requests[0]?.messages[1]?.content).toContain(
      "Conversation so far:\nNo previous context\n\n",
    );
  });

  it("falls back to retrieval with the original query when the call fails", async () => {
    const completions = createFakeCompletions(() => {
      throw new Error("API error (503): unavailable");
    });

    const decision = await createQueryAnalyzer(completions, OPTIONS).analyze("Who was Boaz?", []);

    expect(decision).toEqual({
      kind: "fallback",
      needsRetrieval: true,
      rewrittenQuery: "Who was Boaz?",
      reasoning: "Error in analysis: API error (503): unavailable",
    });
  });

  it("falls back when the reply is not JSON", async () => {
    const completions = createFakeCompletions(() => "Sure! Here is my analysis.");

    const decision = await createQueryAnalyzer(completions, OPTIONS).analyze("Who was Boaz?", []);

    expect(decision.kind).toBe("fallback");
    expect(decision.needsRetrieval).toBe(true);
    expect(decision.rewrittenQuery).toBe("Who was Boaz?");
    expect(decision.reasoning?.startsWith("Error in analysis: ")).toBe(true);
  });

  it("reads absent rewrite and reasoning keys as null", async () => {
    const completions = createFakeCompletions(() => '{"needs_retrieval": false}');

    const decision = await createQueryAnalyzer(completions, OPTIONS).analyze("Thank you!", []);

    expect(decision).toEqual({
      kind: "decided",
      needsRetrieval: false,
      rewrittenQuery: null,
      reasoning: null,
    });
    expect(retrievalQuery(decision, "Thank you!")).toBeNull();
  });

  it("falls back with a one-line summary when the retrieval flag is missing", async () => {
    const completions = createFakeCompletions(() => '{"rewritten_query": "Boaz", "reasoning": null}');

    const decision = await createQueryAnalyzer(completions, OPTIONS).analyze("Who was Boaz?", []);

    expect(decision).toEqual({
      kind: "fallback",
      needsRetrieval: true,
      rewrittenQuery: "Who was Boaz?",
      reasoning: "Error in analysis: needs_retrieval: Required",
    });
  });
});

describe("parseDecision", () => {
  it("rejects a non-boolean retrieval flag", () => {
    expect(() =>
      parseDecision('{"needs_retrieval": "yes", "rewritten_query": null, "reasoning": null}'),
    ).toThrow();
  });
});

describe("buildTranscript", () => {
  it("keeps only the last turns and caps each one", () => {
    const long = "x".repeat(1200);
    expect(buildTranscript([turn("user", "a"), turn("assistant", long)], 1)).toBe(
      `assistant: ${"x".repeat(1000)}`,
    );
  });

  it("treats a zero limit as no context", () => {
    expect(buildTranscript([turn("user", "a")], 0)).toBe("No previous context");
  });
});

describe("retrievalQuery", () => {
  const decided = (
    needsRetrieval: boolean,
    rewrittenQuery: string | null,
  ): QueryDecision => ({ kind: "decided", needsRetrieval, rewrittenQuery, reasoning: null });

  it("returns null when no retrieval is needed", () => {
    expect(retrievalQuery(decided(false, "ignored"), "hi")).toBeNull();
  });

  it("prefers the rewritten query", () => {
    expect(retrievalQuery(decided(true, "  Ruth in Moab "), "she")).toBe("Ruth in Moab");
  });

  it("searches with the original words when the rewrite is missing or blank", () => {
    expect(retrievalQuery(decided(true, null), "Who was Ruth?")).toBe("Who was Ruth?");
    expect(retrievalQuery(decided(true, "   "), "Who was Ruth?")).toBe("Who was Ruth?");
  });
});
