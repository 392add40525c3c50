import { ServiceError } from "./errors.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface StreamHandlers {
  onContent?(delta: string): void;
  onReasoning?(delta: string): void;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  /** Constrain the reply to a JSON object. */
  json?: boolean;
  /** Stream the reply over SSE, reporting deltas as they arrive. */
  stream?: StreamHandlers;
}

export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}

export interface CompletionClientOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
}

interface CompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

interface StreamDelta {
  content?: string | null;
  reasoning?: string | null;
}

interface StreamChunk {
  choices?: Array<{ delta?: StreamDelta }>;
}

/**
 * Reads an SSE body of chat completion chunks and returns the concatenated
 * content. Malformed `data:` lines are skipped.
 */
export async function readCompletionStream(
  body: ReadableStream<Uint8Array>,
  handlers: StreamHandlers,
): Promise<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let fullReply = "";
  let buffer = "";

  const handleLine = (line: string): void => {
    const trimmed = line.trim();
    if (!trimmed.startsWith("data: ")) return;
    const payload = trimmed.slice(6);
    if (payload === "[DONE]") return;

    let chunk: StreamChunk;
    try {
      chunk = JSON.parse(payload) as StreamChunk;
    } catch {
      return;
    }
    const delta = chunk.choices?.[0]?.delta;
    if (!delta) return;
    if (delta.reasoning) handlers.onReasoning?.(delta.reasoning);
    if (delta.content) {
      fullReply += delta.content;
      handlers.onContent?.(delta.content);
    }
  };

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    buffer += decoder.decode(value, { stream: true });
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";
    lines.forEach(handleLine);
  }
  handleLine(buffer + decoder.decode());

  return fullReply;
}

export function createCompletionClient(
  options: CompletionClientOptions,
): CompletionService {
  return {
    async complete(request) {
      const streaming = request.stream !== undefined;
      const res = await fetch(`${options.apiUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: options.model,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          ...(request.json ? { response_format: { type: "json_object" } } : {}),
          stream: streaming,
        }),
      });

      if (!res.ok) {
        const text = await res.text();
        throw new ServiceError(
          "completion",
          `API error (${res.status}): ${text}`,
          res.status,
        );
      }

      if (request.stream) {
        if (!res.body) throw new ServiceError("completion", "No response body");
        return readCompletionStream(res.body, request.stream);
      }

      const json = (await res.json()) as CompletionResponse;
      const content = json.choices?.[0]?.message?.content;
      if (typeof content !== "string") {
        throw new ServiceError("completion", "Completion response has no message content");
      }
      return content;
    },
  };
}
