// Prompt Builder - Main exports

export {
  buildConsolidationPrompt,
  buildFilterPrompt,
  buildPerturbationPrompt,
  buildPreprocessPrompt,
  buildPrompt,
  buildQueryPrompt,
  countWords,
  expectedAnswerLength,
  extractResult,
  hasResultTags,
  inprocessingSuffix,
  perturbationLanguages,
  postprocessingConstraint,
} from "./builder";
export type {
  ModelPerturbationType,
  PromptExample,
  PromptField,
  PromptShape,
  PromptSpec,
  QueryPromptInput,
} from "./builder";
export { PromptTemplateError, fillTemplate, getPromptTemplates, requireTemplate } from "./templates";
export type { FilterTemplate, PromptTemplates, QAExample } from "./templates";
