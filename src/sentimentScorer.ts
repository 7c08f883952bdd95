import { ClassifierConfigError } from "./errors";
import { bestSimilarity } from "./similarity";
import { DEFAULT_OBFUSCATION, ObfuscationPatternSet, normalizeToken } from "./textNormalization";
import { isEmojiToken, tokenize } from "./tokenizer";
import { Lexicons, Sentiment, SentimentDetails, TokenContribution, TokenScore } from "./types";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

export interface SentimentScorer {
  score(text: string): Sentiment;
  analyze(text: string): SentimentDetails;
  analyzeTokens(tokens: readonly string[]): SentimentDetails;
}

export interface SentimentScorerOptions {
  lexicons: Lexicons;
  similarityThreshold?: number;
  obfuscation?: ObfuscationPatternSet;
}

export const assertThreshold = (threshold: number): number => {
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1) {
    throw new ClassifierConfigError(`Similarity threshold must be in (0, 1], got ${threshold}`);
  }
  return threshold;
};

const toLabel = (positiveCount: number, negativeCount: number): Sentiment => {
  if (positiveCount > negativeCount) return "Positive";
  if (negativeCount > positiveCount) return "Negative";
  return "Neutral";
};

export const createSentimentScorer = ({
  lexicons,
  similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
  obfuscation = DEFAULT_OBFUSCATION,
}: SentimentScorerOptions): SentimentScorer => {
  const threshold = assertThreshold(similarityThreshold);

  const scoreToken = (token: string, normalized: string): TokenScore => {
    const positive = bestSimilarity(normalized, lexicons.positive);
    const negative = bestSimilarity(normalized, lexicons.negative);
    let contribution: TokenContribution = "none";
    // Equal best scores cancel out.
    if (positive.score > negative.score && positive.score >= threshold) contribution = "positive";
    else if (negative.score > positive.score && negative.score >= threshold) contribution = "negative";
    return {
      token,
      normalized,
      positiveScore: positive.score,
      negativeScore: negative.score,
      positiveMatch: positive.score >= threshold ? positive.word : null,
      negativeMatch: negative.score >= threshold ? negative.word : null,
      contribution,
    };
  };

  const analyzeTokens = (tokens: readonly string[]): SentimentDetails => {
    const scored: TokenScore[] = [];
    for (const token of tokens) {
      const normalized = normalizeToken(token, obfuscation);
      if (!normalized || isEmojiToken(normalized) || lexicons.stopwords.has(normalized)) continue;
      scored.push(scoreToken(token, normalized));
    }
    const positiveCount = scored.filter((entry) => entry.contribution === "positive").length;
    const negativeCount = scored.filter((entry) => entry.contribution === "negative").length;
    return {
      label: toLabel(positiveCount, negativeCount),
      positiveCount,
      negativeCount,
      tokens: scored,
    };
  };

  const analyze = (text: string): SentimentDetails => analyzeTokens(tokenize(text));

  return {
    score: (text) => analyze(text).label,
    analyze,
    analyzeTokens,
  };
};
