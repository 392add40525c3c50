import type { CompletionService, StreamHandlers } from "./completion-service.js";
import { buildAnswerMessages } from "./context-builder.js";
import type { ConversationTurn, RetrievedPassage } from "./types.js";

export interface AnswerGeneratorOptions {
  temperature: number;
  maxTokens: number;
  corpusTitle: string;
}

export interface AnswerGenerator {
  /** Returns the model's reply verbatim; citations are not checked against `retrieved`. */
  generate(
    query: string,
    retrieved: RetrievedPassage[] | undefined,
    history: ConversationTurn[],
    stream?: StreamHandlers,
  ): Promise<string>;
}

export function createAnswerGenerator(
  completions: CompletionService,
  options: AnswerGeneratorOptions,
): AnswerGenerator {
  return {
    generate(query, retrieved, history, stream) {
      return completions.complete({
        messages: buildAnswerMessages(query, retrieved, history, options.corpusTitle),
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        stream,
      });
    },
  };
}
