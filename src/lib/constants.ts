import type {
  BoxedElementMetrics,
  MetricKey,
  MetricVariant,
  TextMetrics,
} from "@/lib/types";

export const NO_ANSWER = "<no answer>";

export const DEFAULT_IOU_THRESHOLD = 0.1;

export const IOU_THRESHOLD_ENV_KEY = "SQA_IOU_THRESHOLD";

export const METRIC_LABELS: Record<MetricKey, string> = {
  exactMatch: "Exact Match",
  f1: "F1",
  bboxF1: "BBox-F1",
};

export const VARIANT_LABELS: Record<MetricVariant, string> = {
  text: "SQA-S",
  elements: "SQA-UIC",
  boxed_elements: "SQA-UIC-BB",
};

export const TEXT_METRIC_KEYS: (keyof TextMetrics)[] = ["exactMatch", "f1"];

export const BOXED_ELEMENT_METRIC_KEYS: (keyof BoxedElementMetrics)[] = [
  "bboxF1",
  "exactMatch",
  "f1",
];
