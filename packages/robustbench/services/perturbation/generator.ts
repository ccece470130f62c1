// Perturbation Generator - produces a perturbed variant of a question
import { applyTypos } from "./typo";
import { RequestClient, isRequestError } from "~~/services/llm";
import { buildPerturbationPrompt, extractResult, perturbationLanguages } from "~~/services/prompts";
import { DEFAULT_INTENSITY, GeneratedPerturbationType, Intensity } from "~~/types/benchmark";
import { hashString } from "~~/utils/random";

/** The record is skipped for this perturbation type; the run continues */
export class PerturbationError extends Error {
  constructor(
    readonly perturbationType: GeneratedPerturbationType,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "PerturbationError";
  }
}

export type PerturbationGeneratorOptions = {
  client: RequestClient;
  modelId: string;
  /** Sampling temperature for model-generated perturbations (endpoint default when unset) */
  temperature?: number;
  /** Seed for the typo routine; defaults to a hash of each question */
  typoSeed?: number;
};

/**
 * Target language for the language perturbation, stable per question.
 */
export function languageFor(question: string): string {
  const languages = perturbationLanguages();
  return languages[hashString(question) % languages.length];
}

/** Drop an echoed "Question:" label the model sometimes repeats */
function stripQuestionLabel(text: string): string {
  return text.replace(/^\s*question\s*:\s*/i, "").trim();
}

export class PerturbationGenerator {
  constructor(private readonly options: PerturbationGeneratorOptions) {}

  /**
   * Perturb `question` with `type` at `intensity` (type default when unset).
   * Throws PerturbationError when the model call fails or yields nothing.
   */
  async perturb(question: string, type: GeneratedPerturbationType, intensity?: Intensity): Promise<string> {
    const level = intensity ?? DEFAULT_INTENSITY[type];

    if (type === "typo") {
      return applyTypos(question, level, { seed: this.options.typoSeed }).text;
    }

    const language = type === "language" ? languageFor(question) : undefined;
    const prompt = buildPerturbationPrompt(type, question, level, language);

    let response: string;
    try {
      response = await this.options.client.send(prompt, this.options.modelId, this.options.temperature);
    } catch (error) {
      if (isRequestError(error)) {
        throw new PerturbationError(type, `${type}@${level} request failed (${error.kind}): ${error.message}`, error);
      }
      throw error;
    }

    const perturbed = stripQuestionLabel(extractResult(response));
    if (!perturbed) {
      throw new PerturbationError(type, `${type}@${level} produced an empty result`);
    }
    return perturbed;
  }
}

export function isPerturbationError(error: unknown): error is PerturbationError {
  return error instanceof PerturbationError;
}
