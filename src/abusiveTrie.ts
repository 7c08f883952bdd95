import { ClassifierConfigError } from "./errors";

export class TrieNode {
  readonly children = new Map<string, TrieNode>();
  isTerminal = false;
}

export interface PrefixMatcher {
  readonly size: number;
  hasPrefixMatch(token: string): boolean;
}

export class AbusiveTrie implements PrefixMatcher {
  private readonly root = new TrieNode();
  private count = 0;

  get size(): number {
    return this.count;
  }

  insert(prefix: string): void {
    const chars = Array.from(prefix);
    if (!chars.length) return;
    let node = this.root;
    for (const ch of chars) {
      let next = node.children.get(ch);
      if (!next) {
        next = new TrieNode();
        node.children.set(ch, next);
      }
      node = next;
    }
    if (!node.isTerminal) {
      node.isTerminal = true;
      this.count += 1;
    }
  }

  // True as soon as a terminal node is visited: some inserted prefix starts the token.
  hasPrefixMatch(token: string): boolean {
    let node = this.root;
    for (const ch of token) {
      const next = node.children.get(ch);
      if (!next) return false;
      if (next.isTerminal) return true;
      node = next;
    }
    return false;
  }
}

/**
 * Builds the trie once from the curated prefixes and hands back a read-only view.
 * Throws on an empty prefix list.
 */
export const buildAbusiveTrie = (
  prefixes: Iterable<string>,
  canonicalize: (prefix: string) => string = (prefix) => prefix.trim().toLowerCase(),
): PrefixMatcher => {
  const trie = new AbusiveTrie();
  for (const prefix of prefixes) {
    trie.insert(canonicalize(prefix));
  }
  if (trie.size === 0) {
    throw new ClassifierConfigError("Abusive prefix list is empty; refusing to build an empty trie");
  }
  return trie;
};
