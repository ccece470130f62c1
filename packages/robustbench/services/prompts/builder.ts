// Prompt Builder - few-shot and one-shot prompts for filters, perturbations and processing strategies
//
// Every function here is pure: identical inputs always produce the identical
// prompt string, so prompts can be regenerated for inspection after a run.
import { PromptTemplateError, QAExample, fillTemplate, getPromptTemplates, requireTemplate } from "./templates";
import {
  DatasetName,
  FilterName,
  InprocessingStrategy,
  Intensity,
  PostprocessingStrategy,
  PreprocessingStrategy,
} from "~~/types/benchmark";
import { createRandom, hashString, sampleWithoutReplacement } from "~~/utils/random";

export type PromptShape = "few-shot" | "one-shot";

export type PromptField = { label: string; value: string };

export type PromptExample = {
  /** Overrides the default "Example N:" heading */
  heading?: string;
  fields: PromptField[];
  output: string;
};

export type PromptSpec = {
  instruction: string;
  targetHeading: string;
};

/** Perturbations that are generated by the model rather than by rules */
export type ModelPerturbationType = "synonym" | "language" | "paraphrase" | "sentence-inj" | "bias";

const RESULT_OPEN = "<result>";
const RESULT_CLOSE = "</result>";

function renderFields(fields: PromptField[]): string {
  return fields.map(field => `${field.label}: ${field.value}`).join("\n");
}

/**
 * Assemble a prompt from an instruction, worked examples and the target input.
 *
 * - few-shot: instruction + K labelled examples + target
 * - one-shot: instruction + exactly one worked example + target
 */
export function buildPrompt(
  kind: PromptShape,
  spec: PromptSpec,
  examples: PromptExample[],
  payload: PromptField[],
): string {
  if (kind === "few-shot" && examples.length === 0) {
    throw new PromptTemplateError("A few-shot prompt needs at least one example");
  }
  if (kind === "one-shot" && examples.length !== 1) {
    throw new PromptTemplateError(`A one-shot prompt needs exactly one example, got ${examples.length}`);
  }

  const exampleBlock = examples
    .map((example, index) => {
      const heading = example.heading ?? (kind === "few-shot" ? `Example ${index + 1}:` : "Example:");
      return `${heading}\n${renderFields(example.fields)}\n${example.output}\n\n`;
    })
    .join("");

  return `${spec.instruction}\n\n${exampleBlock}${spec.targetHeading}\n${renderFields(payload)}\n`;
}

/**
 * Return the text between the first <result> and </result> tags, or the
 * trimmed text when the tags are missing.
 */
export function extractResult(text: string): string {
  const start = text.indexOf(RESULT_OPEN);
  if (start !== -1) {
    const end = text.indexOf(RESULT_CLOSE, start + RESULT_OPEN.length);
    if (end !== -1) {
      return text.slice(start + RESULT_OPEN.length, end).trim();
    }
  }
  return text.trim();
}

export function hasResultTags(text: string): boolean {
  const start = text.indexOf(RESULT_OPEN);
  return start !== -1 && text.indexOf(RESULT_CLOSE, start) !== -1;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

// ============================================================================
// FILTERS (few-shot)
// ============================================================================

export function buildFilterPrompt(filterName: FilterName, pair: { question: string; answer: string }): string {
  const template = requireTemplate(getPromptTemplates().filters, filterName, "filters");

  const examples: PromptExample[] = template.examples.map(example => {
    const fields: PromptField[] = [{ label: "Question", value: example.question }];
    if (template.includeAnswer) {
      if (example.answer === undefined) {
        throw new PromptTemplateError(`Filter "${filterName}" example "${example.question}" has no answer`);
      }
      fields.push({ label: "Answer", value: example.answer });
    }
    return {
      fields,
      output: `${template.rationaleLabel}${example.rationale}\n${RESULT_OPEN}${example.label}${RESULT_CLOSE}`,
    };
  });

  const payload: PromptField[] = [{ label: "Question", value: pair.question }];
  if (template.includeAnswer) {
    payload.push({ label: "Answer", value: pair.answer });
  }

  return buildPrompt("few-shot", template, examples, payload);
}

// ============================================================================
// PERTURBATIONS (one-shot)
// ============================================================================

export function buildPerturbationPrompt(
  type: ModelPerturbationType,
  question: string,
  intensity: Intensity,
  language?: string,
): string {
  const catalogue = getPromptTemplates().perturbations;
  const intensityKey = String(intensity);
  let instruction: string;
  let exampleHeading: string;
  let exampleOutput: string;

  if (type === "synonym" || type === "language") {
    const template = catalogue[type];
    const wordCount = countWords(question);
    const numWords = Math.max(1, Math.floor((wordCount * intensity) / 100));
    const remainingWords = Math.max(0, Math.min(wordCount - 1, wordCount - numWords));

    if (type === "language" && !language) {
      throw new PromptTemplateError("The language perturbation needs a target language");
    }

    instruction = fillTemplate(template.instruction, {
      num_words: numWords,
      intensity,
      remaining_words: remainingWords,
      language: language ?? "",
    });
    exampleHeading = fillTemplate(template.exampleLabel, {
      example_words: Math.max(1, Math.floor((catalogue.exampleWordCount * intensity) / 100)),
    });
    exampleOutput = requireTemplate(template.examples, intensityKey, `perturbations.${type}.examples`);
  } else {
    const template = catalogue[type];
    instruction = requireTemplate(template.instructions, intensityKey, `perturbations.${type}.instructions`);
    if (template.suffix) instruction = `${instruction} ${template.suffix}`;
    exampleHeading = template.exampleLabel;
    exampleOutput = requireTemplate(template.examples, intensityKey, `perturbations.${type}.examples`);
  }

  return buildPrompt(
    "one-shot",
    {
      instruction: `Instruction: ${instruction} ${catalogue.resultFormat}`,
      targetHeading: "Now apply the instruction to the following text:",
    },
    [
      {
        heading: exampleHeading,
        fields: [{ label: "Question", value: catalogue.exampleQuestion }],
        output: `${RESULT_OPEN}${exampleOutput}${RESULT_CLOSE}`,
      },
    ],
    [{ label: "Question", value: question }],
  );
}

export function perturbationLanguages(): readonly string[] {
  return getPromptTemplates().perturbations.languages;
}

// ============================================================================
// PROCESSING STRATEGIES
// ============================================================================

export function buildPreprocessPrompt(strategy: Exclude<PreprocessingStrategy, "none">, question: string): string {
  const template = requireTemplate(getPromptTemplates().preprocessing, strategy, "preprocessing");

  return buildPrompt(
    "one-shot",
    { instruction: template.instruction, targetHeading: "Now apply the instruction to the following question:" },
    [
      {
        fields: [{ label: "Question", value: template.example.input }],
        output: `${RESULT_OPEN}${template.example.output}${RESULT_CLOSE}`,
      },
    ],
    [{ label: "Question", value: question }],
  );
}

const FEW_SHOT_COUNTS: Partial<Record<InprocessingStrategy, number>> = {
  few_shot1: 1,
  few_shot3: 3,
  few_shot5: 5,
  few_shot7: 7,
};

function renderExemplars(examples: QAExample[]): string {
  const { instruction, end } = getPromptTemplates().fewShot;
  const body = examples.map(example => `Question: ${example.question}\nAnswer: ${example.answer}`).join("\n");
  return `\n\n${instruction}\n${body}\n\n${end}`;
}

/**
 * Instructions appended to the question for an in-processing strategy.
 * k-shot exemplars are drawn with a generator seeded from `seed` and the
 * question, so the same question always receives the same exemplars.
 */
export function inprocessingSuffix(strategy: InprocessingStrategy, question: string, seed = 0): string {
  if (strategy === "none") return "";

  const fewShot = getPromptTemplates().fewShot;
  if (strategy === "few_shot_gooaq") {
    return renderExemplars(fewShot.gooaq);
  }

  const count = FEW_SHOT_COUNTS[strategy];
  if (count !== undefined) {
    const random = createRandom(seed ^ hashString(question));
    return renderExemplars(sampleWithoutReplacement(fewShot.general, count, random));
  }

  return `\n${requireTemplate(getPromptTemplates().inprocessing, strategy, "inprocessing")}`;
}

export function expectedAnswerLength(datasetName: DatasetName): number {
  return requireTemplate(getPromptTemplates().answerLengths, datasetName, "answerLengths");
}

/**
 * Output constraint placed in front of the question for post-processing
 * strategies that shape the answer format.
 */
export function postprocessingConstraint(strategy: PostprocessingStrategy, datasetName: DatasetName): string | null {
  if (strategy === "none" || strategy === "self_consistency") return null;

  const template = requireTemplate(getPromptTemplates().postprocessing, strategy, "postprocessing");
  if (strategy === "length") {
    return fillTemplate(template, { words: expectedAnswerLength(datasetName) });
  }
  return template;
}

export type QueryPromptInput = {
  question: string;
  datasetName: DatasetName;
  inproc: InprocessingStrategy;
  postproc: PostprocessingStrategy;
  seed?: number;
};

/**
 * Final prompt sent to the evaluated model.
 */
export function buildQueryPrompt(input: QueryPromptInput): string {
  const body = `${input.question}${inprocessingSuffix(input.inproc, input.question, input.seed)}`;
  const constraint = postprocessingConstraint(input.postproc, input.datasetName);
  return constraint ? `${constraint}\nQuestion: ${body}` : body;
}

export function buildConsolidationPrompt(answers: string[]): string {
  const { intro, outro } = getPromptTemplates().selfConsistency;
  const listed = answers.map((answer, index) => `Answer ${index + 1}:\n${answer}`).join("\n\n");
  return `${fillTemplate(intro, { count: answers.length })}\n\n${listed}\n\n${outro}`;
}
