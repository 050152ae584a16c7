export const mean = (values: readonly number[]) => {
  if (values.length === 0) {
    return null;
  }

  return values.reduce((total, current) => total + current, 0) / values.length;
};

export type MetricSummary<Key extends string> = {
  sampleSize: number;
  means: Map<Key, number | null>;
};

/** Corpus-level mean of each listed component. Empty input yields null means. */
export const summarizeMetrics = <Key extends string>(
  results: readonly Record<Key, number>[],
  keys: readonly Key[],
): MetricSummary<Key> => {
  const means = new Map<Key, number | null>();
  keys.forEach((key) => {
    means.set(key, mean(results.map((result) => result[key])));
  });

  return {
    sampleSize: results.length,
    means,
  };
};
