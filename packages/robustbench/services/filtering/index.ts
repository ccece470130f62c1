// Filter Stage - Main exports

export { FILTER_CONFIG, FilterRunConfigSchema } from "./config";
export type { FilterRunConfig } from "./config";
export { FilterClassifier, parseVerdict } from "./classifier";
export type { FilterClassifierOptions, ParseFailurePolicy, ParsedVerdict } from "./classifier";
export { VERDICT_COLUMNS, runFilterChain } from "./chain";
export type { FilterChainOptions, FilterChainSummary } from "./chain";
