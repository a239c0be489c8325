import { z } from "zod";

const UINT32_MAX = 0xffffffff;

export const PointSchema = z.object({
  x: z.number().int("Coordinates must be integers"),
  y: z.number().int("Coordinates must be integers"),
});

const DimensionSchema = z
  .number()
  .int("Dimensions must be integers")
  .min(5, { error: "Dimensions must be at least 5" })
  .max(10000, { error: "Dimensions cannot exceed 10000" });

export const MazeConfigSchema = z
  .object({
    width: DimensionSchema,
    height: DimensionSchema,
    treeCount: z
      .number()
      .int("Tree count must be an integer")
      .min(1, { error: "At least one tree is required" })
      .max(1000)
      .optional(),
    growthRate: z.number().optional(),
    strategy: z.string().optional(),
    seed: z
      .number()
      .int()
      .min(0, { error: "Seed must be a non-negative integer" })
      .max(UINT32_MAX, { error: "Seed must fit in uint32" })
      .optional(),
    seedPositions: z.array(PointSchema).min(1).optional(),
    spacing: z
      .number()
      .int()
      .min(4, { error: "Seed spacing must be at least 4" })
      .max(1000)
      .optional(),
  })
  .superRefine((data, ctx) => {
    const treeCount = data.treeCount ?? 1;
    if (data.seedPositions && data.seedPositions.length !== treeCount) {
      ctx.addIssue({
        code: "custom",
        message: `Expected ${treeCount} seed positions, got ${data.seedPositions.length}`,
        path: ["seedPositions"],
      });
    }
  });

export type ValidatedMazeConfig = z.infer<typeof MazeConfigSchema>;

/**
 * Config fields whose issues are reported as dimension errors.
 */
export const DIMENSION_FIELDS: readonly string[] = ["width", "height"];
