// LLM Access Configuration

export const LLM_CONFIG = {
  /** OpenAI-compatible endpoint, e.g. https://api.openai.com/v1 */
  baseUrl: process.env.LLM_BASE_URL || "",
  apiKey: process.env.LLM_API_KEY || "",

  /** Requests per minute, shared by every stage of the process */
  requestsPerMinute: Number(process.env.LLM_RPM) || 10,

  /** Total attempts per request (first try + retries) */
  maxAttempts: Number(process.env.LLM_MAX_ATTEMPTS) || 7,

  /** Exponential backoff: base * 2^(attempt-1), capped at max */
  backoffBaseMs: Number(process.env.LLM_BACKOFF_BASE_MS) || 2000,
  backoffMaxMs: Number(process.env.LLM_BACKOFF_MAX_MS) || 30000,

  /** Timeout per completion call in milliseconds */
  timeoutMs: Number(process.env.LLM_TIMEOUT_MS) || 60000,

  defaultModel: process.env.LLM_MODEL || "llama-3.3-70b-instruct",
} as const;

export type LlmSettings = {
  baseUrl: string;
  apiKey: string;
  requestsPerMinute: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeoutMs: number;
};

/**
 * Read the settings from the environment at call time, so that scripts which
 * load dotenv after this module was imported still see their values.
 */
export function loadLlmSettings(): LlmSettings {
  return {
    baseUrl: process.env.LLM_BASE_URL || LLM_CONFIG.baseUrl,
    apiKey: process.env.LLM_API_KEY || LLM_CONFIG.apiKey,
    requestsPerMinute: Number(process.env.LLM_RPM) || LLM_CONFIG.requestsPerMinute,
    maxAttempts: Number(process.env.LLM_MAX_ATTEMPTS) || LLM_CONFIG.maxAttempts,
    backoffBaseMs: Number(process.env.LLM_BACKOFF_BASE_MS) || LLM_CONFIG.backoffBaseMs,
    backoffMaxMs: Number(process.env.LLM_BACKOFF_MAX_MS) || LLM_CONFIG.backoffMaxMs,
    timeoutMs: Number(process.env.LLM_TIMEOUT_MS) || LLM_CONFIG.timeoutMs,
  };
}

// Validate required environment variables
export function validateLlmConfig(settings: LlmSettings = loadLlmSettings()): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!settings.apiKey) {
    errors.push("LLM_API_KEY is required");
  }

  if (!settings.baseUrl) {
    errors.push("LLM_BASE_URL is required");
  }

  if (settings.requestsPerMinute <= 0) {
    errors.push("LLM_RPM must be positive");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
