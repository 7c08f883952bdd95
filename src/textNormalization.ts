// Utilities to normalize obfuscated tokens (censor symbols, leet digits, repeated chars) before matching.

export const CENSOR_SYMBOLS = ["*", "@", "#", "$", "%", "^", "&", "_"] as const;

export interface SubstitutionRule {
  pattern: RegExp;
  replacement: string;
}

export interface ObfuscationPatternSet {
  // Applied in order, before repeat collapsing.
  substitutions: readonly SubstitutionRule[];
  // Only applied to tokens that carry at least one letter.
  leetDigits: Readonly<Record<string, string>>;
  maxRepeat: number;
}

export const DEFAULT_OBFUSCATION: ObfuscationPatternSet = Object.freeze({
  substitutions: Object.freeze([
    { pattern: /@/g, replacement: "a" },
    { pattern: /\$/g, replacement: "s" },
    { pattern: /[*#%^&_]/g, replacement: "" },
  ]),
  leetDigits: Object.freeze({
    "0": "o",
    "1": "i",
    "3": "e",
    "4": "a",
    "5": "s",
    "7": "t",
  }),
  maxRepeat: 2,
});

const LETTER_RE = /\p{L}/u;
const DIGIT_RE = /[0-9]/g;
const EDGE_CHARS = String.raw`[^\p{L}\p{M}\p{N}\p{Extended_Pictographic}\u200d\ufe0f\u{1f3fb}-\u{1f3ff}]+`;
const LEADING_PUNCT_RE = new RegExp(`^${EDGE_CHARS}`, "u");
const TRAILING_PUNCT_RE = new RegExp(`${EDGE_CHARS}$`, "u");

export const escapeRegex = (str: string): string => str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const collapseRepeats = (token: string, maxRepeat = DEFAULT_OBFUSCATION.maxRepeat): string => {
  const keep = Math.max(1, Math.floor(maxRepeat));
  const runRe = new RegExp(`(.)\\1{${keep},}`, "gu");
  return token.replace(runRe, (_run, ch: string) => ch.repeat(keep));
};

/**
 * Canonical form of a single token: lowercased, censor symbols substituted or elided,
 * leet digits mapped, runs of 3+ identical characters cut to 2, edge punctuation stripped.
 * Total over strings and idempotent; an unreadable token comes back as "".
 */
export const normalizeToken = (raw: string, patterns: ObfuscationPatternSet = DEFAULT_OBFUSCATION): string => {
  let token = raw.toLowerCase();
  for (const rule of patterns.substitutions) {
    token = token.replace(rule.pattern, rule.replacement);
  }
  if (LETTER_RE.test(token)) {
    token = token.replace(DIGIT_RE, (digit) => patterns.leetDigits[digit] ?? digit);
  }
  token = collapseRepeats(token, patterns.maxRepeat);
  return token.replace(LEADING_PUNCT_RE, "").replace(TRAILING_PUNCT_RE, "");
};

const SYMBOL_CLASS = `[${CENSOR_SYMBOLS.map(escapeRegex).join("")}]`;

/**
 * One anchored pattern per word: the first letter literal, every later letter either a run of
 * itself (optionally preceded by censor symbols) or a single censor symbol.
 * "fuck" accepts f@ck, f*ck, f**ck, f***, fuuuck.
 */
export const createObfuscationRegex = (word: string): RegExp => {
  const chars = Array.from(word.toLowerCase());
  const [first, ...rest] = chars;
  const body = rest
    .map((ch) => `(?:${SYMBOL_CLASS}*${escapeRegex(ch)}+|${SYMBOL_CLASS})`)
    .join("");
  return new RegExp(`^${escapeRegex(first ?? "")}${body}$`, "u");
};

export const MIN_PATTERN_WORD_LENGTH = 3;

export const compileObfuscationPatterns = (words: Iterable<string>): readonly RegExp[] => {
  const unique = new Set<string>();
  for (const word of words) {
    const cleaned = word.trim().toLowerCase();
    if (Array.from(cleaned).length >= MIN_PATTERN_WORD_LENGTH) unique.add(cleaned);
  }
  return Object.freeze(Array.from(unique, createObfuscationRegex));
};
