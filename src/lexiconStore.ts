import fs from "node:fs";
import path from "node:path";
import { ClassifierConfigError } from "./errors";
import { Lexicons } from "./types";

export const LEXICON_FILES = {
  stopwords: "stopwords.txt",
  positive: "positive.txt",
  negative: "negative.txt",
} as const;

export type LexiconName = keyof typeof LEXICON_FILES;

export const parseLexicon = (contents: string): Set<string> =>
  new Set(
    contents
      .split(/\r?\n/)
      .map((line) => line.trim().toLowerCase())
      .filter(Boolean),
  );

/**
 * Assembles the three read-only word sets. A word carrying sentiment is never a stopword,
 * so it is removed from the stopword set here.
 */
export const createLexiconStore = (lists: Record<LexiconName, Iterable<string>>): Lexicons => {
  const positive = new Set(Array.from(lists.positive, (word) => word.trim().toLowerCase()).filter(Boolean));
  const negative = new Set(Array.from(lists.negative, (word) => word.trim().toLowerCase()).filter(Boolean));
  const stopwords = new Set<string>();
  for (const word of lists.stopwords) {
    const cleaned = word.trim().toLowerCase();
    if (cleaned && !positive.has(cleaned) && !negative.has(cleaned)) stopwords.add(cleaned);
  }
  return Object.freeze({
    stopwords,
    positive,
    negative,
  });
};

const readLexiconFile = (dir: string, name: LexiconName): Set<string> => {
  const filePath = path.join(dir, LEXICON_FILES[name]);
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ClassifierConfigError(`Unable to read ${name} lexicon at ${filePath}`, { cause: error });
  }
  const words = parseLexicon(contents);
  if (words.size === 0) {
    throw new ClassifierConfigError(`The ${name} lexicon at ${filePath} is empty`);
  }
  return words;
};

export const loadLexiconStore = (dir: string): Lexicons =>
  createLexiconStore({
    stopwords: readLexiconFile(dir, "stopwords"),
    positive: readLexiconFile(dir, "positive"),
    negative: readLexiconFile(dir, "negative"),
  });
