import { CorpusError } from "./errors.js";
import type { Verse, VerseContext } from "./types.js";

function verseNumber(verse: Verse): number {
  if (!/^\d+$/.test(verse.verse.trim())) {
    throw new CorpusError(
      `Verse number "${verse.verse}" in ${verse.book} ${verse.chapter} is not an integer`,
    );
  }
  return Number.parseInt(verse.verse, 10);
}

/**
 * Index range `[start, end)` of the window around position `i` in a chapter
 * of `n` verses. Windows are clipped at chapter boundaries, never padded.
 */
export function windowBounds(
  i: number,
  n: number,
  windowSize: number,
): { start: number; end: number } {
  return {
    start: Math.max(0, i - windowSize),
    end: Math.min(n, i + windowSize + 1),
  };
}

/** Groups verses by book and chapter, keeping first-seen chapter order. */
export function groupByChapter(verses: Verse[]): Verse[][] {
  const chapters = new Map<string, Verse[]>();
  for (const verse of verses) {
    const key = `${verse.book}\u0000${verse.chapter}`;
    let group = chapters.get(key);
    if (!group) {
      group = [];
      chapters.set(key, group);
    }
    group.push(verse);
  }

  return [...chapters.values()].map((group) =>
    group
      .map((verse) => ({ verse, n: verseNumber(verse) }))
      .sort((a, b) => a.n - b.n)
      .map(({ verse }) => verse),
  );
}

export function buildVerseContexts(
  verses: Verse[],
  windowSize: number,
): VerseContext[] {
  const contexts: VerseContext[] = [];

  for (const chapter of groupByChapter(verses)) {
    chapter.forEach((verse, i) => {
      const { start, end } = windowBounds(i, chapter.length, windowSize);
      contexts.push({
        book: verse.book,
        chapter: verse.chapter,
        verse: verse.verse,
        content: verse.content,
        context: chapter
          .slice(start, end)
          .map((v) => v.content)
          .join(" "),
      });
    });
  }

  return contexts;
}
