import { summarizeMetrics, type MetricSummary } from "@/lib/aggregate";
import {
  BOXED_ELEMENT_METRIC_KEYS,
  DEFAULT_IOU_THRESHOLD,
  TEXT_METRIC_KEYS,
} from "@/lib/constants";
import {
  sqaBoxedElementMetrics,
  sqaElementListMetrics,
  sqaTextMetrics,
} from "@/lib/metrics";
import type { ScoringDataset } from "@/lib/schemas";
import type { BoxedElementMetrics, ElementListMetrics, TextMetrics } from "@/lib/types";

export type ExampleScore<Metrics> = {
  id: string;
  metrics: Metrics;
};

export type DatasetScore =
  | {
      variant: "text";
      examples: ExampleScore<TextMetrics>[];
      summary: MetricSummary<keyof TextMetrics>;
    }
  | {
      variant: "elements";
      examples: ExampleScore<ElementListMetrics>[];
      summary: MetricSummary<keyof ElementListMetrics>;
    }
  | {
      variant: "boxed_elements";
      iouThreshold: number;
      examples: ExampleScore<BoxedElementMetrics>[];
      summary: MetricSummary<keyof BoxedElementMetrics>;
    };

export type ScoreDatasetOptions = {
  /** Takes precedence over the threshold stored in the dataset. */
  iouThreshold?: number;
};

export const scoreDataset = (
  dataset: ScoringDataset,
  options: ScoreDatasetOptions = {},
): DatasetScore => {
  switch (dataset.variant) {
    case "text": {
      const examples = dataset.examples.map(({ id, prediction, groundTruths }) => ({
        id,
        metrics: sqaTextMetrics(prediction, groundTruths),
      }));
      return {
        variant: "text",
        examples,
        summary: summarizeMetrics(
          examples.map(({ metrics }) => metrics),
          TEXT_METRIC_KEYS,
        ),
      };
    }
    case "elements": {
      const examples = dataset.examples.map(({ id, prediction, groundTruths }) => ({
        id,
        metrics: sqaElementListMetrics(prediction, groundTruths),
      }));
      return {
        variant: "elements",
        examples,
        summary: summarizeMetrics(
          examples.map(({ metrics }) => metrics),
          TEXT_METRIC_KEYS,
        ),
      };
    }
    case "boxed_elements": {
      const iouThreshold =
        options.iouThreshold ?? dataset.iouThreshold ?? DEFAULT_IOU_THRESHOLD;
      const examples = dataset.examples.map(({ id, prediction, groundTruths }) => ({
        id,
        metrics: sqaBoxedElementMetrics(prediction, groundTruths, iouThreshold),
      }));
      return {
        variant: "boxed_elements",
        iouThreshold,
        examples,
        summary: summarizeMetrics(
          examples.map(({ metrics }) => metrics),
          BOXED_ELEMENT_METRIC_KEYS,
        ),
      };
    }
    default: {
      const unsupported: never = dataset;
      throw new Error(`Unsupported scoring variant: ${JSON.stringify(unsupported)}`);
    }
  }
};
