// LLM Access - Main exports
import { LlmSettings, loadLlmSettings } from "./config";
import { createOpenAITransport } from "./openaiTransport";
import { RateLimiter } from "./rateLimiter";
import { RequestClient } from "./requestClient";
import { estimateTokens } from "./tokens";
import { UsageTracker } from "./usage";

export { LLM_CONFIG, loadLlmSettings, validateLlmConfig } from "./config";
export type { LlmSettings } from "./config";
export { RequestError, classifyError, isRequestError } from "./errors";
export type { RequestErrorKind } from "./errors";
export { RateLimiter, sleep, systemClock } from "./rateLimiter";
export type { Clock } from "./rateLimiter";
export { RequestClient, stripReasoning } from "./requestClient";
export type { ChatRequest, ChatTransport, Completion, RequestClientOptions } from "./requestClient";
export { UsageTracker, formatUsage } from "./usage";
export type { UsageSnapshot } from "./usage";
export { createOpenAITransport } from "./openaiTransport";
export { cleanupEncoder, estimateTokens } from "./tokens";

/**
 * Wire the process-wide client: one limiter, one usage counter, one endpoint.
 * Every stage of a run must receive this same instance.
 */
export function createRequestClient(settings: LlmSettings = loadLlmSettings()): RequestClient {
  return new RequestClient({
    transport: createOpenAITransport(settings),
    limiter: new RateLimiter({ requestsPerMinute: settings.requestsPerMinute }),
    usage: new UsageTracker(estimateTokens),
    retry: settings,
  });
}
