// Filter run configuration
import { z } from "zod";
import { FILTER_NAMES } from "~~/types/benchmark";

export const FILTER_CONFIG = {
  /** Completion budget per classification (reasoning models need more) */
  maxTokens: Number(process.env.FILTER_MAX_TOKENS) || undefined,

  parseFailurePolicy: process.env.FILTER_PARSE_FAILURE === "keep" ? "keep" : "discard",
} as const;

export const FilterRunConfigSchema = z.object({
  inputPath: z.string().min(1),
  outputPath: z.string().min(1),
  ledgerPath: z.string().min(1),
  modelId: z.string().min(1),
  filters: z.array(z.enum(FILTER_NAMES)).min(1).default([...FILTER_NAMES]),
  parseFailurePolicy: z.enum(["keep", "discard"]).default(FILTER_CONFIG.parseFailurePolicy),
  maxTokens: z.number().int().positive().optional(),
});

export type FilterRunConfig = z.infer<typeof FilterRunConfigSchema>;
