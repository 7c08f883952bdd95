import { AbuseDetector, createAbuseDetector } from "./abuseDetector";
import { defaultCuration } from "./curation";
import { loadLexiconStore } from "./lexiconStore";
import { SentimentScorer, createSentimentScorer } from "./sentimentScorer";
import { DEFAULT_OBFUSCATION, ObfuscationPatternSet } from "./textNormalization";
import { tokenize } from "./tokenizer";
import {
  ClassificationResult,
  ClassifyOptions,
  CuratedLists,
  Lexicons,
  MEANINGFUL_FEEDBACK_PROMPT,
} from "./types";

export interface ClassifierStats {
  stopwords: number;
  positive: number;
  negative: number;
  abusivePrefixes: number;
}

export interface Classifier {
  readonly stats: ClassifierStats;
  readonly detector: AbuseDetector;
  readonly scorer: SentimentScorer;
  classify(text: string, options?: ClassifyOptions): ClassificationResult;
}

export interface ClassifierOptions {
  lexicons: Lexicons;
  curation?: CuratedLists;
  similarityThreshold?: number;
  obfuscation?: ObfuscationPatternSet;
}

/**
 * Builds every shared store once; the returned classifier only reads them,
 * so a single instance serves concurrent requests.
 */
export const createClassifier = ({
  lexicons,
  curation = defaultCuration,
  similarityThreshold,
  obfuscation = DEFAULT_OBFUSCATION,
}: ClassifierOptions): Classifier => {
  const detector = createAbuseDetector({ curation, obfuscation });
  const scorer = createSentimentScorer({ lexicons, similarityThreshold, obfuscation });

  const classify = (text: string, options: ClassifyOptions = {}): ClassificationResult => {
    if (!text.trim()) {
      return options.debug
        ? { classification: MEANINGFUL_FEEDBACK_PROMPT, debug: { tokens: [] } }
        : { classification: MEANINGFUL_FEEDBACK_PROMPT };
    }

    const tokens = tokenize(text);
    const verdict = detector.detectTokens(tokens);
    if (verdict.abusive) {
      if (!options.debug) return { classification: "Abusive" };
      return { classification: "Abusive", debug: { tokens, abuse: { signal: verdict.signal, token: verdict.token } } };
    }

    const { label, ...details } = scorer.analyzeTokens(tokens);
    if (!options.debug) return { classification: "Clean", sentiment: label };
    return { classification: "Clean", sentiment: label, debug: { tokens, details } };
  };

  const stats: ClassifierStats = {
    stopwords: lexicons.stopwords.size,
    positive: lexicons.positive.size,
    negative: lexicons.negative.size,
    abusivePrefixes: detector.trieSize,
  };

  return { stats, detector, scorer, classify };
};

export interface LoadClassifierConfig {
  lexiconDir: string;
  similarityThreshold: number;
}

export const loadClassifier = ({ lexiconDir, similarityThreshold }: LoadClassifierConfig): Classifier =>
  createClassifier({ lexicons: loadLexiconStore(lexiconDir), similarityThreshold });
