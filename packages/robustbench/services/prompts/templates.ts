// Prompt template catalogue, validated once at load time
import rawTemplates from "./templates.json";
import { z } from "zod";

/** Missing or malformed template: a configuration error, never retried */
export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PromptTemplateError";
  }
}

const IntensityTextSchema = z.record(z.string(), z.string().min(1));

const FilterTemplateSchema = z.object({
  instruction: z.string().min(1),
  targetHeading: z.string().min(1),
  rationaleLabel: z.string(),
  includeAnswer: z.boolean(),
  examples: z
    .array(
      z.object({
        question: z.string().min(1),
        answer: z.string().optional(),
        rationale: z.string().min(1),
        label: z.union([z.literal(0), z.literal(1)]),
      }),
    )
    .min(1),
});

const WordLevelPerturbationSchema = z.object({
  instruction: z.string().min(1),
  exampleLabel: z.string().min(1),
  examples: IntensityTextSchema,
});

const GradedPerturbationSchema = z.object({
  instructions: IntensityTextSchema,
  suffix: z.string().optional(),
  exampleLabel: z.string().min(1),
  examples: IntensityTextSchema,
});

const OneShotSchema = z.object({
  instruction: z.string().min(1),
  example: z.object({ input: z.string().min(1), output: z.string().min(1) }),
});

const QAExampleSchema = z.object({ question: z.string().min(1), answer: z.string().min(1) });

export const PromptTemplatesSchema = z.object({
  filters: z.record(z.string(), FilterTemplateSchema),
  perturbations: z.object({
    exampleQuestion: z.string().min(1),
    exampleWordCount: z.number().int().positive(),
    resultFormat: z.string().min(1),
    languages: z.array(z.string().min(1)).min(1),
    synonym: WordLevelPerturbationSchema,
    language: WordLevelPerturbationSchema,
    paraphrase: GradedPerturbationSchema,
    "sentence-inj": GradedPerturbationSchema,
    bias: GradedPerturbationSchema,
  }),
  preprocessing: z.record(z.string(), OneShotSchema),
  inprocessing: z.record(z.string(), z.string().min(1)),
  fewShot: z.object({
    instruction: z.string().min(1),
    end: z.string().min(1),
    general: z.array(QAExampleSchema).min(1),
    gooaq: z.array(QAExampleSchema).min(1),
  }),
  postprocessing: z.record(z.string(), z.string().min(1)),
  selfConsistency: z.object({ intro: z.string().min(1), outro: z.string().min(1) }),
  answerLengths: z.record(z.string(), z.number().int().positive()),
});

export type PromptTemplates = z.infer<typeof PromptTemplatesSchema>;
export type FilterTemplate = z.infer<typeof FilterTemplateSchema>;
export type QAExample = z.infer<typeof QAExampleSchema>;

let templates: PromptTemplates | null = null;

/**
 * Get the validated template catalogue (parsed on first use).
 */
export function getPromptTemplates(): PromptTemplates {
  if (!templates) {
    const parsed = PromptTemplatesSchema.safeParse(rawTemplates);
    if (!parsed.success) {
      throw new PromptTemplateError(`Invalid templates.json: ${parsed.error.message}`);
    }
    templates = parsed.data;
  }
  return templates;
}

/**
 * Look up a keyed template entry, failing with a configuration error when absent.
 */
export function requireTemplate<T>(entries: Record<string, T>, key: string, section: string): T {
  const entry = entries[key];
  if (entry === undefined) {
    throw new PromptTemplateError(`Missing prompt template "${section}.${key}"`);
  }
  return entry;
}

/**
 * Replace `{name}` placeholders. Every placeholder must have a value.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{([a-z_]+)\}/g, (_, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new PromptTemplateError(`No value for placeholder {${name}} in template "${template.slice(0, 40)}..."`);
    }
    return String(value);
  });
}
