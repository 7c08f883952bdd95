import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ClassifierConfigError } from "../src/errors";
import { createLexiconStore, loadLexiconStore, parseLexicon } from "../src/lexiconStore";
import { DATA_DIR } from "./test-utils";

describe("LexiconStore", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "lexicon-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const writeLexicons = (files: Record<string, string>) => {
    for (const [name, contents] of Object.entries(files)) {
      fs.writeFileSync(path.join(tempDir, name), contents, "utf-8");
    }
  };

  describe("parseLexicon", () => {
    it("should trim, lowercase and drop blank lines", () => {
      const words = parseLexicon("Good\n  great \r\n\nGOOD\n");
      expect(Array.from(words)).toEqual(["good", "great"]);
    });
  });

  describe("createLexiconStore", () => {
    it("should never keep a sentiment word as a stopword", () => {
      const lexicons = createLexiconStore({
        stopwords: ["the", "not", "good", "bad"],
        positive: ["good"],
        negative: ["bad"],
      });

      expect(Array.from(lexicons.stopwords)).toEqual(["the", "not"]);
      expect(lexicons.positive.has("good")).toBe(true);
      expect(lexicons.negative.has("bad")).toBe(true);
    });
  });

  describe("loadLexiconStore", () => {
    it("should load the shipped lexicons", () => {
      const lexicons = loadLexiconStore(DATA_DIR);

      expect(lexicons.stopwords.has("is")).toBe(true);
      expect(lexicons.positive.has("amazing")).toBe(true);
      expect(lexicons.negative.has("terrible")).toBe(true);
      expect(lexicons.positive.size).toBe(87);
      expect(lexicons.negative.size).toBe(67);
      expect(lexicons.stopwords.size).toBe(138);
    });

    it("should read line-delimited files from a directory", () => {
      writeLexicons({
        "stopwords.txt": "the\nis\n",
        "positive.txt": "Nice\n",
        "negative.txt": "meh\n",
      });

      const lexicons = loadLexiconStore(tempDir);

      expect(Array.from(lexicons.stopwords)).toEqual(["the", "is"]);
      expect(Array.from(lexicons.positive)).toEqual(["nice"]);
      expect(Array.from(lexicons.negative)).toEqual(["meh"]);
    });

    it("should fail when a lexicon file is missing", () => {
      writeLexicons({ "stopwords.txt": "the\n", "positive.txt": "nice\n" });

      expect(() => loadLexiconStore(tempDir)).toThrow(ClassifierConfigError);
      expect(() => loadLexiconStore(tempDir)).toThrow(/Unable to read negative lexicon/);
    });

    it("should fail when a lexicon file is empty", () => {
      writeLexicons({
        "stopwords.txt": "the\n",
        "positive.txt": "\n  \n",
        "negative.txt": "meh\n",
      });

      expect(() => loadLexiconStore(tempDir)).toThrow(/The positive lexicon at .* is empty/);
    });
  });
});
