// Levenshtein-based closeness used by the sentiment scorer. Symmetric and bounded in [0, 1].

export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) return 0;
  const rows = a.length + 1;
  const cols = b.length + 1;
  const dp = Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
  for (let i = 0; i < rows; i += 1) {
    dp[i][0] = i;
  }
  for (let j = 0; j < cols; j += 1) {
    dp[0][j] = j;
  }
  for (let i = 1; i < rows; i += 1) {
    for (let j = 1; j < cols; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
    }
  }
  return dp[a.length][b.length];
};

export const similarityRatio = (a: string, b: string): number => {
  if (!a.length && !b.length) return 1;
  if (!a.length || !b.length) return 0;
  const distance = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length, 1);
  return 1 - distance / maxLen;
};

// Upper bound of similarityRatio given only the lengths; lets callers skip hopeless pairs.
export const maxPossibleSimilarity = (a: string, b: string): number => {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - Math.abs(a.length - b.length) / maxLen;
};

export interface BestMatch {
  word: string | null;
  score: number;
}

/**
 * Highest similarity of `candidate` against every entry of `words`.
 * Exact membership short-circuits to a score of 1; ties keep the alphabetically first word.
 */
export const bestSimilarity = (candidate: string, words: ReadonlySet<string>): BestMatch => {
  if (!candidate) return { word: null, score: 0 };
  if (words.has(candidate)) return { word: candidate, score: 1 };
  let best: BestMatch = { word: null, score: 0 };
  for (const word of words) {
    if (maxPossibleSimilarity(candidate, word) < best.score) continue;
    const score = similarityRatio(candidate, word);
    if (score > best.score || (score === best.score && score > 0 && best.word !== null && word < best.word)) {
      best = { word, score };
    }
  }
  return best;
};
