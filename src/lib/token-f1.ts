export const harmonicMean = (precision: number, recall: number) => {
  if (precision + recall === 0) {
    return 0;
  }

  return (2 * precision * recall) / (precision + recall);
};

export const countTokens = (tokens: readonly string[]) => {
  const counts = new Map<string, number>();
  tokens.forEach((token) => {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  });

  return counts;
};

export const countSharedTokens = (
  predictionTokens: readonly string[],
  groundTruthTokens: readonly string[],
) => {
  const predictionCounts = countTokens(predictionTokens);
  const groundTruthCounts = countTokens(groundTruthTokens);

  let sharedCount = 0;
  predictionCounts.forEach((count, token) => {
    sharedCount += Math.min(count, groundTruthCounts.get(token) ?? 0);
  });

  return sharedCount;
};

/** Bag-of-tokens F1. No overlap scores 0, including when either side is empty. */
export const tokenF1 = (
  predictionTokens: readonly string[],
  groundTruthTokens: readonly string[],
) => {
  const sharedCount = countSharedTokens(predictionTokens, groundTruthTokens);
  if (sharedCount === 0) {
    return 0;
  }

  const precision = sharedCount / predictionTokens.length;
  const recall = sharedCount / groundTruthTokens.length;
  return harmonicMean(precision, recall);
};
