import { describe, expect, it } from "vitest";
import { AbusiveTrie, buildAbusiveTrie } from "../src/abusiveTrie";
import { ClassifierConfigError } from "../src/errors";
import { normalizeToken } from "../src/textNormalization";

describe("AbusiveTrie", () => {
  it("should match any token that starts with an inserted prefix", () => {
    const trie = new AbusiveTrie();
    trie.insert("chut");

    expect(trie.hasPrefixMatch("chut")).toBe(true);
    expect(trie.hasPrefixMatch("chutiya")).toBe(true);
  });

  it("should not match tokens shorter than the prefix or off the path", () => {
    const trie = new AbusiveTrie();
    trie.insert("chut");

    expect(trie.hasPrefixMatch("chu")).toBe(false);
    expect(trie.hasPrefixMatch("cat")).toBe(false);
    expect(trie.hasPrefixMatch("xchut")).toBe(false);
    expect(trie.hasPrefixMatch("")).toBe(false);
  });

  it("should stop at the first terminal node on the path", () => {
    const trie = new AbusiveTrie();
    trie.insert("fk");
    trie.insert("fuck");

    expect(trie.hasPrefixMatch("fkn")).toBe(true);
    expect(trie.hasPrefixMatch("fucking")).toBe(true);
    expect(trie.hasPrefixMatch("fun")).toBe(false);
  });

  it("should treat repeated inserts as a no-op", () => {
    const trie = new AbusiveTrie();
    trie.insert("jerk");
    trie.insert("jerk");
    trie.insert("");

    expect(trie.size).toBe(1);
  });
});

describe("buildAbusiveTrie", () => {
  it("should canonicalize prefixes before inserting them", () => {
    const trie = buildAbusiveTrie(["Ch0d"], (prefix) => normalizeToken(prefix));

    expect(trie.hasPrefixMatch("chodu")).toBe(true);
    expect(trie.size).toBe(1);
  });

  it("should refuse to build an empty trie", () => {
    expect(() => buildAbusiveTrie([])).toThrow(ClassifierConfigError);
    expect(() => buildAbusiveTrie(["   "])).toThrow(ClassifierConfigError);
  });
});
