import { describe, expect, it } from "vitest";
import {
  NO_ANSWER,
  VARIANT_LABELS,
  sqaBoxedElementMetrics,
  sqaElementListMetrics,
  sqaTextMetrics,
  toMetricTuple,
} from "@/lib/index";

describe("public entry point", () => {
  it("exposes the three metric variants", () => {
    expect(toMetricTuple(sqaTextMetrics(NO_ANSWER, [NO_ANSWER]))).toEqual([1, 1]);
    expect(toMetricTuple(sqaElementListMetrics(["a"], [["a"]]))).toEqual([1, 1]);
    expect(
      toMetricTuple(sqaBoxedElementMetrics([[[0, 0, 1, 1], "btn"]], [[[[0, 0, 1, 1], "btn"]]])),
    ).toEqual([1, 1, 1]);
  });

  it("labels each variant", () => {
    expect(VARIANT_LABELS).toEqual({
      text: "SQA-S",
      elements: "SQA-UIC",
      boxed_elements: "SQA-UIC-BB",
    });
  });
});
