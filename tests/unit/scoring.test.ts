import { describe, expect, it } from "vitest";
import { NO_ANSWER } from "@/lib/constants";
import { parseScoringDataset, resolveIouThreshold } from "@/lib/schemas";
import { scoreDataset } from "@/lib/scoring";

describe("dataset scoring", () => {
  it("scores text examples and summarizes them", () => {
    const result = scoreDataset(
      parseScoringDataset({
        variant: "text",
        examples: [
          { id: "q1", prediction: "Paris", groundTruths: ["the paris"] },
          { id: "q2", prediction: NO_ANSWER, groundTruths: ["berlin"] },
        ],
      }),
    );

    expect(result.variant).toBe("text");
    expect(result.examples).toEqual([
      { id: "q1", metrics: { exactMatch: 1, f1: 1 } },
      { id: "q2", metrics: { exactMatch: 0, f1: 0 } },
    ]);
    expect(result.summary.means.get("exactMatch")).toBe(0.5);
    expect(result.summary.means.get("f1")).toBe(0.5);
  });

  it("scores element list examples", () => {
    const result = scoreDataset(
      parseScoringDataset({
        variant: "elements",
        examples: [{ id: "e1", prediction: [3, 7], groundTruths: [[7, 3]] }],
      }),
    );

    expect(result.examples).toEqual([{ id: "e1", metrics: { exactMatch: 0, f1: 1 } }]);
  });

  it("prefers an explicit IoU threshold over the dataset value", () => {
    const dataset = parseScoringDataset({
      variant: "boxed_elements",
      iouThreshold: 0.1,
      examples: [
        {
          id: "b1",
          prediction: [[[0, 0, 2, 2], "btn"]],
          groundTruths: [[[[1, 1, 3, 3], "btn"]]],
        },
      ],
    });

    const lenient = scoreDataset(dataset);
    const strict = scoreDataset(dataset, { iouThreshold: 0.5 });

    expect(lenient.variant === "boxed_elements" && lenient.iouThreshold).toBe(0.1);
    expect(lenient.examples[0].metrics).toEqual({ bboxF1: 1, exactMatch: 1, f1: 1 });
    expect(strict.variant === "boxed_elements" && strict.iouThreshold).toBe(0.5);
    expect(strict.examples[0].metrics).toEqual({ bboxF1: 0, exactMatch: 1, f1: 0 });
  });

  it("keeps the dataset threshold when the override is blank", () => {
    const dataset = parseScoringDataset({
      variant: "boxed_elements",
      iouThreshold: 0.5,
      examples: [
        {
          id: "b2",
          prediction: [[[0, 0, 2, 2], "btn"]],
          groundTruths: [[[[1, 1, 3, 3], "btn"]]],
        },
      ],
    });

    const result = scoreDataset(dataset, { iouThreshold: resolveIouThreshold(" ") });

    expect(result.variant === "boxed_elements" && result.iouThreshold).toBe(0.5);
    expect(result.examples[0].metrics).toEqual({ bboxF1: 0, exactMatch: 1, f1: 0 });
  });
});
