import { RAG_CONFIG } from "./config.js";
import { ServiceError } from "./errors.js";

interface EmbeddingResponse {
  data?: Array<{ embedding?: unknown; index?: number }>;
}

export interface EmbeddingService {
  /** Embeds a passage as-is (used for indexing). */
  embedTexts(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<number[][]>;
  /** Embeds a search query, applying the configured query prefix. */
  embedQuery(query: string): Promise<number[]>;
}

export interface EmbeddingClientOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
  queryPrefix: string;
  batchSize?: number;
  concurrency?: number;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((x) => typeof x === "number");
}

export function createEmbeddingClient(
  options: EmbeddingClientOptions,
): EmbeddingService {
  const batchSize = options.batchSize ?? RAG_CONFIG.embeddingBatchSize;
  const concurrency = options.concurrency ?? RAG_CONFIG.embeddingConcurrency;

  async function embedBatch(batch: string[]): Promise<number[][]> {
    const res = await fetch(`${options.apiUrl}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options.model,
        input: batch,
      }),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new ServiceError(
        "embedding",
        `Embedding API error (${res.status}): ${text}`,
        res.status,
      );
    }

    const json = (await res.json()) as EmbeddingResponse;
    const data = json.data ?? [];
    if (data.length !== batch.length) {
      throw new ServiceError(
        "embedding",
        `Embedding API returned ${data.length} vectors for ${batch.length} inputs`,
      );
    }

    // Providers may return items out of order; `index` is authoritative when present
    const ordered = [...data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((item) => {
      if (!isVector(item.embedding)) {
        throw new ServiceError("embedding", "Embedding API returned a malformed vector");
      }
      return item.embedding;
    });
  }

  async function embedTexts(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<number[][]> {
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batches.push({ texts: texts.slice(i, i + batchSize), startIdx: i });
    }

    const results: number[][] = new Array<number[]>(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(concurrency, queue.length) },
      async () => {
        while (queue.length > 0) {
          const batch = queue.shift();
          if (!batch) break;
          const embeddings = await embedBatch(batch.texts);
          embeddings.forEach((embedding, j) => {
            results[batch.startIdx + j] = embedding;
          });
          completed += batch.texts.length;
          onProgress?.(Math.min(completed, texts.length), texts.length);
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  return {
    embedTexts,
    async embedQuery(query: string) {
      const [embedding] = await embedBatch([options.queryPrefix + query]);
      if (!embedding) {
        throw new ServiceError("embedding", "Embedding API returned no vector");
      }
      return embedding;
    },
  };
}
