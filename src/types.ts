export const MEANINGFUL_FEEDBACK_PROMPT = "Please give meaningful feedback";

export type Classification = "Abusive" | "Clean" | typeof MEANINGFUL_FEEDBACK_PROMPT;

export type Sentiment = "Positive" | "Negative" | "Neutral";

export type AbuseSignal = "trie" | "pattern" | "emoji";

export type AbuseVerdict = { abusive: false } | { abusive: true; signal: AbuseSignal; token: string };

export type TokenContribution = "positive" | "negative" | "none";

export interface TokenScore {
  token: string;
  normalized: string;
  positiveScore: number;
  negativeScore: number;
  positiveMatch: string | null;
  negativeMatch: string | null;
  contribution: TokenContribution;
}

export interface SentimentDetails {
  label: Sentiment;
  positiveCount: number;
  negativeCount: number;
  tokens: TokenScore[];
}

export interface DebugReport {
  tokens: string[];
  abuse?: { signal: AbuseSignal; token: string };
  details?: Omit<SentimentDetails, "label">;
}

export interface ClassificationResult {
  classification: Classification;
  sentiment?: Sentiment;
  debug?: DebugReport;
}

export interface Lexicons {
  stopwords: ReadonlySet<string>;
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
}

export interface CuratedLists {
  abusivePrefixes: readonly string[];
  safeWords: readonly string[];
  abusiveEmoji: readonly string[];
}

export interface ClassifyOptions {
  debug?: boolean;
}
