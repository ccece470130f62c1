// Perturbation run configuration
import { z } from "zod";
import { INTENSITIES } from "~~/types/benchmark";

const IntensitySchema = z.union([
  z.literal(INTENSITIES[0]),
  z.literal(INTENSITIES[1]),
  z.literal(INTENSITIES[2]),
  z.literal(INTENSITIES[3]),
]);

export const PerturbationRunConfigSchema = z.object({
  inputPath: z.string().min(1),
  outputPath: z.string().min(1),
  failurePath: z.string().min(1).optional(),
  modelId: z.string().min(1),
  types: z
    .array(z.enum(["typo", "synonym", "language", "paraphrase", "sentence-inj", "bias"]))
    .min(1)
    .default(["typo", "synonym", "language", "paraphrase", "sentence-inj", "bias"]),
  /** Per-type intensity overrides */
  intensities: z
    .object({
      typo: IntensitySchema,
      synonym: IntensitySchema,
      language: IntensitySchema,
      paraphrase: IntensitySchema,
      "sentence-inj": IntensitySchema,
      bias: IntensitySchema,
    })
    .partial()
    .default({}),
  /** Seed for the typo routine; a hash of each question when unset */
  typoSeed: z.number().int().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type PerturbationRunConfig = z.infer<typeof PerturbationRunConfigSchema>;
