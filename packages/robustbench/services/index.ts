// Robustness bench - package entry point

export * from "../types/benchmark";
export * from "./dataset";
export * from "./evaluation";
export * from "./filtering";
export * from "./llm";
export * from "./perturbation";
export * from "./prompts";
export { ConfigError, errorMessage } from "../utils/errors";
