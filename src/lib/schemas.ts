import { z } from "zod";

export const INVALID_BOUNDING_BOX_MESSAGE =
  "Invalid bounding box: ymin <= ymax and xmin <= xmax required";

export const boundingBoxSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .refine(([ymin, xmin, ymax, xmax]) => ymin <= ymax && xmin <= xmax, {
    message: INVALID_BOUNDING_BOX_MESSAGE,
  });

export const uiContentSchema = z.union([z.string(), z.number(), z.boolean()]);

export const boxedElementSchema = z.tuple([boundingBoxSchema, uiContentSchema]);

export const iouThresholdSchema = z.number().min(0).max(1);

const textExampleSchema = z.object({
  id: z.string().min(1),
  prediction: z.string(),
  groundTruths: z.array(z.string()).min(1),
});

const elementListExampleSchema = z.object({
  id: z.string().min(1),
  prediction: z.array(uiContentSchema),
  groundTruths: z.array(z.array(uiContentSchema)).min(1),
});

const boxedElementExampleSchema = z.object({
  id: z.string().min(1),
  prediction: z.array(boxedElementSchema),
  groundTruths: z.array(z.array(boxedElementSchema)).min(1),
});

const scoringDatasetSchema = z.discriminatedUnion("variant", [
  z.object({
    variant: z.literal("text"),
    examples: z.array(textExampleSchema),
  }),
  z.object({
    variant: z.literal("elements"),
    examples: z.array(elementListExampleSchema),
  }),
  z.object({
    variant: z.literal("boxed_elements"),
    iouThreshold: iouThresholdSchema.optional(),
    examples: z.array(boxedElementExampleSchema),
  }),
]);

export type UiContent = z.infer<typeof uiContentSchema>;
export type TextExample = z.infer<typeof textExampleSchema>;
export type ElementListExample = z.infer<typeof elementListExampleSchema>;
export type BoxedElementExample = z.infer<typeof boxedElementExampleSchema>;
export type ScoringDataset = z.infer<typeof scoringDatasetSchema>;

export const parseTextExample = (rawJson: unknown): TextExample => {
  return textExampleSchema.parse(rawJson);
};

export const parseElementListExample = (rawJson: unknown): ElementListExample => {
  return elementListExampleSchema.parse(rawJson);
};

export const parseBoxedElementExample = (rawJson: unknown): BoxedElementExample => {
  return boxedElementExampleSchema.parse(rawJson);
};

export const parseScoringDataset = (rawJson: unknown): ScoringDataset => {
  return scoringDatasetSchema.parse(rawJson);
};

/**
 * Reads a threshold override such as an environment value. Missing or blank
 * input is no override, so a threshold stored with the dataset still applies.
 */
export const resolveIouThreshold = (rawValue: string | undefined): number | undefined => {
  if (rawValue === undefined || rawValue.trim().length === 0) {
    return undefined;
  }

  return iouThresholdSchema.parse(Number(rawValue));
};
