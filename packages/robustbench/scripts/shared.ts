// Helpers shared by the CLI scripts
import * as dotenv from "dotenv";
import * as path from "path";
import { ZodError } from "zod";
import { validateLlmConfig } from "~~/services/llm";

/** Root of the robustbench package; default data paths are relative to it */
export const PACKAGE_ROOT = path.resolve(__dirname, "..");

export function loadEnv(): void {
  dotenv.config({ path: path.resolve(PACKAGE_ROOT, "../../.env") }); // load base env
  dotenv.config({ path: path.resolve(PACKAGE_ROOT, "../../.env.local"), override: true }); // override with local values if present
}

export function dataPath(fileName: string): string {
  return path.resolve(PACKAGE_ROOT, "data", fileName);
}

export function splitList(value: string | undefined): string[] | undefined {
  return value
    ?.split(",")
    .map(item => item.trim())
    .filter(Boolean);
}

export function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function formatZodError(error: ZodError): string {
  return error.issues.map(issue => `  ${issue.path.join(".")}: ${issue.message}`).join("\n");
}

/** Exit before any request when the endpoint is not configured */
export function requireLlmConfig(): void {
  const { valid, errors } = validateLlmConfig();
  if (!valid) {
    console.error("LLM configuration is incomplete:");
    for (const error of errors) console.error(`  - ${error}`);
    process.exit(1);
  }
}
