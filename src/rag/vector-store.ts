import { access, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { LocalIndex } from "vectra";

export type MetadataValue = string | number | boolean;
export type CollectionMetadata = Record<string, MetadataValue>;

export interface CollectionRecord<TMetadata extends CollectionMetadata> {
  id: string;
  embedding: number[];
  document: string;
  metadata: TMetadata;
}

export interface CollectionMatch<TMetadata extends CollectionMetadata> {
  id: string;
  document: string;
  metadata: TMetadata;
  distance: number;
}

export interface VectorCollection<TMetadata extends CollectionMetadata> {
  readonly name: string;
  count(): Promise<number>;
  /** Inserts one batch; an existing id is overwritten. */
  add(records: CollectionRecord<TMetadata>[]): Promise<void>;
  /** Nearest records first. */
  query(embedding: number[], k: number): Promise<CollectionMatch<TMetadata>[]>;
  readInfo(): Promise<unknown>;
  writeInfo(info: unknown): Promise<void>;
}

export interface VectorDatabase<TMetadata extends CollectionMetadata> {
  getCollection(name: string): Promise<VectorCollection<TMetadata> | null>;
  createCollection(name: string): Promise<VectorCollection<TMetadata>>;
  /** Resolves false when there was nothing to delete. */
  deleteCollection(name: string): Promise<boolean>;
}

type StoredMetadata<TMetadata extends CollectionMetadata> = TMetadata & {
  document: string;
};

const INFO_FILE = "collection.json";

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function assertCollectionName(name: string): void {
  if (!/^[A-Za-z0-9][A-Za-z0-9_-]*$/.test(name)) {
    throw new Error(`Invalid collection name: ${name}`);
  }
}

/**
 * vectra ranks by cosine similarity; report cosine distance instead.
 * A zero vector has no direction and scores NaN, read here as orthogonal.
 */
export function similarityToDistance(similarity: number): number {
  if (!Number.isFinite(similarity)) return 1;
  return Math.max(0, 1 - similarity);
}

function openCollection<TMetadata extends CollectionMetadata>(
  name: string,
  folderPath: string,
): VectorCollection<TMetadata> {
  const index = new LocalIndex<StoredMetadata<TMetadata>>(folderPath);
  const infoPath = path.join(folderPath, INFO_FILE);

  return {
    name,

    async count() {
      const items = await index.listItems();
      return items.length;
    },

    async add(records) {
      if (records.length === 0) return;
      await index.beginUpdate();
      try {
        for (const record of records) {
          const metadata: StoredMetadata<TMetadata> = {
            ...record.metadata,
            document: record.document,
          };
          await index.upsertItem({
            id: record.id,
            vector: record.embedding,
            metadata,
          });
        }
      } catch (err) {
        index.cancelUpdate();
        throw err;
      }
      await index.endUpdate();
    },

    async query(embedding, k) {
      if (k <= 0) return [];
      const results = await index.queryItems(embedding, "", k);
      return results.map((r) => ({
        id: r.item.id,
        document: r.item.metadata.document,
        metadata: r.item.metadata,
        distance: similarityToDistance(r.score),
      }));
    },

    async readInfo() {
      if (!(await fileExists(infoPath))) return null;
      const info: unknown = JSON.parse(await readFile(infoPath, "utf-8"));
      return info;
    },

    async writeInfo(info) {
      await writeFile(infoPath, JSON.stringify(info, null, 2));
    },
  };
}

/**
 * Named collections stored as vectra `LocalIndex` folders under `rootDir`.
 */
export function createVectraDatabase<TMetadata extends CollectionMetadata>(
  rootDir: string,
): VectorDatabase<TMetadata> {
  function folderFor(name: string): string {
    assertCollectionName(name);
    return path.join(rootDir, name);
  }

  return {
    async getCollection(name) {
      const folderPath = folderFor(name);
      const index = new LocalIndex(folderPath);
      if (!(await index.isIndexCreated())) return null;
      return openCollection<TMetadata>(name, folderPath);
    },

    async createCollection(name) {
      const folderPath = folderFor(name);
      await mkdir(folderPath, { recursive: true });
      const index = new LocalIndex(folderPath);
      await index.createIndex();
      return openCollection<TMetadata>(name, folderPath);
    },

    async deleteCollection(name) {
      const folderPath = folderFor(name);
      if (!(await fileExists(folderPath))) return false;
      await rm(folderPath, { recursive: true, force: true });
      return true;
    },
  };
}
