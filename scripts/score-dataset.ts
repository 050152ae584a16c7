import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { IOU_THRESHOLD_ENV_KEY, METRIC_LABELS, VARIANT_LABELS } from "../src/lib/constants";
import { parseScoringDataset, resolveIouThreshold } from "../src/lib/schemas";
import { scoreDataset } from "../src/lib/scoring";
import type { MetricKey } from "../src/lib/types";

const datasetArgument = process.argv[2];

const formatScore = (value: number | null) => {
  return value === null ? "N/A" : (value * 100).toFixed(2);
};

const run = (datasetPath: string) => {
  const rawDataset = JSON.parse(readFileSync(datasetPath, "utf8")) as unknown;
  const dataset = parseScoringDataset(rawDataset);
  const result = scoreDataset(dataset, {
    iouThreshold: resolveIouThreshold(process.env[IOU_THRESHOLD_ENV_KEY]),
  });

  console.log(`${VARIANT_LABELS[result.variant]} scores for ${datasetPath}`);
  console.log(`Examples: ${result.summary.sampleSize}`);
  if (result.variant === "boxed_elements") {
    console.log(`IoU threshold: ${result.iouThreshold}`);
  }

  const means: ReadonlyMap<MetricKey, number | null> = result.summary.means;
  means.forEach((value, key) => {
    console.log(`${METRIC_LABELS[key]}: ${formatScore(value)}`);
  });
};

if (!datasetArgument) {
  process.exitCode = 1;
  console.error("Usage: npm run score -- <dataset.json>");
} else {
  try {
    run(resolve(process.cwd(), datasetArgument));
  } catch (error) {
    process.exitCode = 1;
    console.error(
      `Failed to score ${datasetArgument}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
