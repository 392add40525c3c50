import type { EmbeddingService } from "./embedding-service.js";
import { IndexNotReadyError } from "./errors.js";
import type { VerseIndex } from "./verse-index.js";
import type { RetrievedPassage } from "./types.js";

/** Maps a raw distance to (0, 1]; 1 only at distance 0. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

export interface Retriever {
  retrieve(query: string): Promise<RetrievedPassage[]>;
}

export function createRetriever(
  index: VerseIndex,
  embeddings: EmbeddingService,
  topK: number,
): Retriever {
  return {
    async retrieve(query) {
      if (!index.isOpen) throw new IndexNotReadyError(index.collectionName);
      const queryVector = await embeddings.embedQuery(query);
      const results = await index.search(queryVector, topK);

      return results.map((r) => ({
        book: r.metadata.book,
        chapter: r.metadata.chapter,
        verse: r.metadata.verse,
        content: r.metadata.content,
        context: r.metadata.context,
        score: distanceToScore(r.distance),
      }));
    },
  };
}
