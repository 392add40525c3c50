import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CorpusError, errorMessage } from "./errors.js";
import type { Verse } from "./types.js";

const textField = z.union([z.string(), z.number()]).transform(String);

const VerseSchema = z.object({
  source: textField,
  book: z.string().min(1),
  chapter: textField,
  verse: textField,
  content: z.string(),
});

/** Validate raw corpus JSON into verses; numeric chapter/verse values are stringified. */
export function parseCorpus(data: unknown): Verse[] {
  if (!Array.isArray(data)) {
    throw new CorpusError("Corpus must be a JSON array of verse records");
  }

  return data.map((record: unknown, i) => {
    const parsed = VerseSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
      throw new CorpusError(`Corpus record ${i} is invalid (${where})`);
    }
    return parsed.data;
  });
}

export async function loadCorpus(filePath: string): Promise<Verse[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new CorpusError(`Corpus file not readable at ${filePath}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CorpusError(`Corpus file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }

  return parseCorpus(data);
}
