import { z } from "zod";
import type { EmbeddingService } from "./embedding-service.js";
import { IndexNotReadyError } from "./errors.js";
import type {
  IndexedRecord,
  IndexManifest,
  IndexProbe,
  VerseContext,
  VerseMetadata,
} from "./types.js";
import type {
  CollectionMatch,
  VectorCollection,
  VectorDatabase,
} from "./vector-store.js";

const ManifestSchema = z.object({
  collection: z.string(),
  count: z.number().int().nonnegative(),
  embeddingModel: z.string(),
  windowSize: z.number().int().nonnegative(),
  completedAt: z.string(),
});

export interface VerseIndexOptions {
  collection: string;
  batchSize: number;
  embeddingModel: string;
  windowSize: number;
}

export interface VerseIndex {
  readonly collectionName: string;
  /** True once probe() found the collection or rebuild() created it. */
  readonly isOpen: boolean;
  probe(): Promise<IndexProbe>;
  rebuild(
    records: VerseContext[],
    onProgress?: (msg: string) => void,
  ): Promise<number>;
  search(embedding: number[], k: number): Promise<CollectionMatch<VerseMetadata>[]>;
}

export function verseId(v: Pick<VerseContext, "book" | "chapter" | "verse">): string {
  return `${v.book}_${v.chapter}_${v.verse}`;
}

export function toIndexedRecord(v: VerseContext, embedding: number[]): IndexedRecord {
  return {
    id: verseId(v),
    embedding,
    document: v.context,
    metadata: {
      book: v.book,
      chapter: v.chapter,
      verse: v.verse,
      content: v.content,
      context: v.context,
    },
  };
}

/**
 * Whether a probed collection must be rebuilt before serving queries.
 * Without `requireManifest` any non-empty collection is accepted as-is.
 */
export function needsRebuild(
  probe: IndexProbe,
  expected: { embeddingModel: string; windowSize: number; requireManifest: boolean },
): boolean {
  if (probe.state !== "populated") return true;
  if (!expected.requireManifest) return false;
  if (!probe.complete || !probe.manifest) return true;
  return (
    probe.manifest.embeddingModel !== expected.embeddingModel ||
    probe.manifest.windowSize !== expected.windowSize
  );
}

export function createVerseIndex(
  db: VectorDatabase<VerseMetadata>,
  embeddings: EmbeddingService,
  options: VerseIndexOptions,
): VerseIndex {
  let collection: VectorCollection<VerseMetadata> | null = null;

  async function readManifest(
    target: VectorCollection<VerseMetadata>,
  ): Promise<IndexManifest | null> {
    const parsed = ManifestSchema.safeParse(await target.readInfo());
    return parsed.success ? parsed.data : null;
  }

  return {
    collectionName: options.collection,

    get isOpen() {
      return collection !== null;
    },

    async probe() {
      const found = await db.getCollection(options.collection);
      collection = found;
      if (!found) return { state: "absent" };

      const count = await found.count();
      if (count === 0) return { state: "empty" };

      const manifest = await readManifest(found);
      return {
        state: "populated",
        count,
        complete: manifest !== null && manifest.count === count,
        manifest,
      };
    },

    async rebuild(records, onProgress) {
      // Drop the handle first: the collection is gone until creation succeeds
      collection = null;
      if (await db.deleteCollection(options.collection)) {
        onProgress?.(`RAG: deleted existing collection ${options.collection}`);
      }
      const fresh = await db.createCollection(options.collection);
      collection = fresh;

      const totalBatches = Math.ceil(records.length / options.batchSize);
      for (let i = 0; i < records.length; i += options.batchSize) {
        const batch = records.slice(i, i + options.batchSize);
        // Embed the context window, not the bare verse
        const vectors = await embeddings.embedTexts(batch.map((r) => r.context));
        await fresh.add(
          batch.map((r, j) => {
            const vector = vectors[j];
            if (!vector) throw new Error(`Missing embedding for ${verseId(r)}`);
            return toIndexedRecord(r, vector);
          }),
        );
        const batchNumber = i / options.batchSize + 1;
        onProgress?.(`RAG: indexed batch ${batchNumber}/${totalBatches}`);
      }

      const count = await fresh.count();
      const manifest: IndexManifest = {
        collection: options.collection,
        count,
        embeddingModel: options.embeddingModel,
        windowSize: options.windowSize,
        completedAt: new Date().toISOString(),
      };
      await fresh.writeInfo(manifest);
      return count;
    },

    async search(embedding, k) {
      if (!collection) throw new IndexNotReadyError(options.collection);
      return collection.query(embedding, k);
    },
  };
}
