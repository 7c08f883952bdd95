import { buildAbusiveTrie } from "./abusiveTrie";
import {
  DEFAULT_OBFUSCATION,
  ObfuscationPatternSet,
  compileObfuscationPatterns,
  normalizeToken,
} from "./textNormalization";
import { tokenize } from "./tokenizer";
import { AbuseVerdict, CuratedLists } from "./types";

// No curated word comes close to this; longer tokens skip the pattern scan.
const MAX_PATTERN_TOKEN_LENGTH = 64;

const SKIN_TONE_AND_VARIATION_RE = /[\u{1f3fb}-\u{1f3ff}\ufe0f]/gu;

export const emojiKey = (token: string): string => token.replace(SKIN_TONE_AND_VARIATION_RE, "");

export interface AbuseDetector {
  readonly trieSize: number;
  isAbusive(text: string): boolean;
  detect(text: string): AbuseVerdict;
  detectTokens(tokens: readonly string[]): AbuseVerdict;
}

export interface AbuseDetectorOptions {
  curation: CuratedLists;
  obfuscation?: ObfuscationPatternSet;
}

export const createAbuseDetector = ({
  curation,
  obfuscation = DEFAULT_OBFUSCATION,
}: AbuseDetectorOptions): AbuseDetector => {
  const normalize = (token: string) => normalizeToken(token, obfuscation);
  const trie = buildAbusiveTrie(curation.abusivePrefixes, normalize);
  const patterns = compileObfuscationPatterns(curation.abusivePrefixes);
  const safeWords: ReadonlySet<string> = new Set(curation.safeWords.map(normalize).filter(Boolean));
  const abusiveEmoji: ReadonlySet<string> = new Set(curation.abusiveEmoji.map(emojiKey));

  const detectTokens = (tokens: readonly string[]): AbuseVerdict => {
    const candidates = tokens
      .map((token) => ({ token, normalized: normalize(token) }))
      .filter(({ normalized }) => !safeWords.has(normalized));

    for (const { token, normalized } of candidates) {
      if (normalized && trie.hasPrefixMatch(normalized)) {
        return { abusive: true, signal: "trie", token };
      }
    }

    for (const { token } of candidates) {
      const lowered = token.toLowerCase();
      if (lowered.length > MAX_PATTERN_TOKEN_LENGTH) continue;
      if (patterns.some((pattern) => pattern.test(lowered))) {
        return { abusive: true, signal: "pattern", token };
      }
    }

    for (const { token } of candidates) {
      if (abusiveEmoji.has(emojiKey(token))) {
        return { abusive: true, signal: "emoji", token };
      }
    }

    return { abusive: false };
  };

  const detect = (text: string): AbuseVerdict => detectTokens(tokenize(text));

  return {
    trieSize: trie.size,
    isAbusive: (text) => detect(text).abusive,
    detect,
    detectTokens,
  };
};
