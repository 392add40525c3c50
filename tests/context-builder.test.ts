import { createAnswerGenerator } from "../src/rag/answer-generator.js";
import {
  buildAnswerMessages,
  buildSystemPrompt,
  capitalizeBook,
  formatPassages,
  formatReference,
  formatSourcesForUI,
  NO_PASSAGES_PROMPT,
} from "../src/rag/context-builder.js";
import type { ConversationTurn, RetrievedPassage } from "../src/rag/types.js";
import { createFakeCompletions } from "./helpers.js";

const passages: RetrievedPassage[] = [
  {
    book: "genesis",
    chapter: "1",
    verse: "1",
    content: "In the first days there was light.",
    context: "In the first days there was light.",
    score: 0.9,
  },
  {
    book: "1 JOHN",
    chapter: "4",
    verse: "8",
    content: "Love is the measure.",
    context: "Love is the measure.",
    score: 0.6,
  },
];

const history: ConversationTurn[] = [
  { role: "user", content: "Tell me about creation", timestamp: "2026-01-01T00:00:00.000Z" },
  { role: "assistant", content: "It begins with light.", timestamp: "2026-01-01T00:00:01.000Z" },
];

describe("reference formatting", () => {
  it("capitalizes only the first letter of the book", () => {
    expect(capitalizeBook("genesis")).toBe("Genesis");
    expect(capitalizeBook("1 JOHN")).toBe("1 john");
    expect(capitalizeBook("")).toBe("");
  });

  it("formats a reference as Book chapter:verse", () => {
    expect(formatReference({ book: "PSALMS", chapter: "23", verse: "1" })).toBe("Psalms 23:1");
  });

  it("lists passages as reference - content blocks", () => {
    expect(formatPassages(passages)).toBe(
      "Genesis 1:1 - In the first days there was light.\n\n1 john 4:8 - Love is the measure.",
    );
  });

  it("joins sources for display", () => {
    expect(formatSourcesForUI(passages)).toBe("Genesis 1:1, 1 john 4:8");
  });
});

describe("buildSystemPrompt", () => {
  it("uses the no-passages prompt when nothing was retrieved", () => {
    expect(buildSystemPrompt(undefined, "Test Scriptures")).toBe(NO_PASSAGES_PROMPT);
    expect(buildSystemPrompt([], "Test Scriptures")).toBe(NO_PASSAGES_PROMPT);
  });

  it("embeds the formatted passages in the grounded prompt", () => {
    const prompt = buildSystemPrompt(passages, "Test Scriptures");
    expect(prompt).toContain("These verses from the Test Scriptures were retrieved");
    expect(prompt).toContain(formatPassages(passages));
  });
});

describe("buildAnswerMessages", () => {
  it("orders system prompt, history, then the query", () => {
    const messages = buildAnswerMessages("And then?", undefined, history, "Test Scriptures");
    expect(messages).toEqual([
      { role: "system", content: NO_PASSAGES_PROMPT },
      { role: "user", content: "Tell me about creation" },
      { role: "assistant", content: "It begins with light." },
      { role: "user", content: "And then?" },
    ]);
  });
});

describe("createAnswerGenerator", () => {
  const options = { temperature: 0.7, maxTokens: 500, corpusTitle: "Test Scriptures" };

  it("makes one completion call and returns the reply verbatim", async () => {
    const completions = createFakeCompletions(() => "See Genesis 1:1.");
    const generator = createAnswerGenerator(completions, options);

    const answer = await generator.generate("What came first?", passages, []);

    expect(answer).toBe("See Genesis 1:1.");
    expect(completions.requests).toHaveLength(1);
    const [request] = completions.requests;
    expect(request?.temperature).toBe(0.7);
    expect(request?.maxTokens).toBe(500);
    expect(request?.json).toBeUndefined();
    expect(request?.messages).toHaveLength(2);
    expect(request?.messages[0]?.content).toContain("Genesis 1:1 - In the first days there was light.");
  });

  it("answers from the no-passages prompt when retrieval found nothing", async () => {
    const completions = createFakeCompletions(() => "You're welcome.");

    await createAnswerGenerator(completions, options).generate("Thanks", [], history);

    expect(completions.requests[0]?.messages[0]).toEqual({
      role: "system",
      content: NO_PASSAGES_PROMPT,
    });
  });

  it("forwards stream handlers", async () => {
    const completions = createFakeCompletions(() => "In the beginning");
    const deltas: string[] = [];

    await createAnswerGenerator(completions, options).generate("Q", undefined, [], {
      onContent: (d) => deltas.push(d),
    });

    expect(deltas).toEqual(["In ", "the ", "beginning"]);
  });
});
