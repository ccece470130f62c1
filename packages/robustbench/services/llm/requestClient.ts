// Rate-limited request client - the single path from the pipeline to the LLM endpoint
import { LlmSettings } from "./config";
import { RequestError, classifyError } from "./errors";
import { Clock, RateLimiter, systemClock } from "./rateLimiter";
import { UsageTracker } from "./usage";
import { ConfigError } from "~~/utils/errors";

export type ChatRequest = {
  prompt: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
};

/** One single-turn chat completion against an OpenAI-compatible endpoint */
export interface ChatTransport {
  complete(request: ChatRequest): Promise<string>;
  /** Ids of the models the endpoint serves */
  listModels(): Promise<string[]>;
}

export type Completion = {
  text: string;
  /** Attempts made, 1 when the first try succeeded */
  attempts: number;
  latencyMs: number;
};

export type SendOptions = {
  maxTokens?: number;
};

export type RequestClientOptions = {
  transport: ChatTransport;
  limiter: RateLimiter;
  usage?: UsageTracker;
  retry?: Partial<Pick<LlmSettings, "maxAttempts" | "backoffBaseMs" | "backoffMaxMs" | "timeoutMs">>;
  clock?: Clock;
  log?: (message: string) => void;
};

const DEFAULT_RETRY = {
  maxAttempts: 7,
  backoffBaseMs: 2000,
  backoffMaxMs: 30000,
  timeoutMs: 60000,
};

/**
 * Remove a leading reasoning trace (`...</think>`) and surrounding whitespace.
 */
export function stripReasoning(content: string): string {
  const marker = content.lastIndexOf("</think>");
  return (marker === -1 ? content : content.slice(marker + "</think>".length)).trim();
}

export class RequestClient {
  readonly usage: UsageTracker;
  private readonly transport: ChatTransport;
  private readonly limiter: RateLimiter;
  private readonly retry: typeof DEFAULT_RETRY;
  private readonly clock: Clock;
  private readonly log: (message: string) => void;

  constructor(options: RequestClientOptions) {
    this.transport = options.transport;
    this.limiter = options.limiter;
    this.usage = options.usage ?? new UsageTracker();
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.clock = options.clock ?? systemClock;
    this.log = options.log ?? (message => console.log(message));
  }

  /**
   * Fail before a run when the endpoint does not serve `modelId`.
   * Throws ConfigError for an unknown model, RequestError when the list cannot be fetched.
   */
  async verifyModel(modelId: string): Promise<void> {
    let models: string[];
    try {
      models = await this.withTimeout(this.transport.listModels());
    } catch (error) {
      throw classifyError(error);
    }

    if (!models.includes(modelId)) {
      throw new ConfigError(`Model "${modelId}" is not available. Available models: ${models.join(", ") || "none"}`);
    }
  }

  /**
   * Send a prompt and return the completion text.
   * Throws RequestError with kind Invalid or Exhausted.
   */
  async send(prompt: string, modelId: string, temperature?: number, options: SendOptions = {}): Promise<string> {
    const completion = await this.complete(prompt, modelId, temperature, options);
    return completion.text;
  }

  /**
   * Same as send(), but also reports how many attempts the completion took.
   */
  async complete(prompt: string, modelId: string, temperature?: number, options: SendOptions = {}): Promise<Completion> {
    const { maxAttempts } = this.retry;
    const start = this.clock.now();

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const waitedMs = await this.limiter.acquire();
      this.usage.recordWait(waitedMs);
      this.usage.recordRequest(modelId, prompt);

      try {
        const raw = await this.withTimeout(
          this.transport.complete({ prompt, model: modelId, temperature, maxTokens: options.maxTokens }),
        );
        const text = stripReasoning(raw);
        if (!text) {
          throw new RequestError("Transient", "Empty completion");
        }

        this.usage.recordCompletion(text);
        return { text, attempts: attempt, latencyMs: this.clock.now() - start };
      } catch (error) {
        const failure = classifyError(error);
        this.usage.recordFailure(failure.kind);

        if (failure.kind === "Invalid") {
          throw new RequestError("Invalid", failure.message, { status: failure.status, attempts: attempt, cause: error });
        }

        if (attempt === maxAttempts) {
          throw new RequestError("Exhausted", `Failed after ${maxAttempts} attempts: ${failure.message}`, {
            status: failure.status,
            attempts: attempt,
            cause: failure,
          });
        }

        const delay = this.backoffDelay(attempt, failure.retryAfterMs);
        this.log(
          `  Request attempt ${attempt}/${maxAttempts} failed (${failure.kind}): ${failure.message}. Retrying in ${delay}ms...`,
        );
        await this.clock.sleep(delay);
      }
    }

    throw new Error("Unexpected error in RequestClient.complete");
  }

  /** Exponential backoff, never shorter than a server-provided retry-after */
  backoffDelay(attempt: number, retryAfterMs?: number): number {
    const { backoffBaseMs, backoffMaxMs } = this.retry;
    const exponential = Math.min(backoffMaxMs, backoffBaseMs * Math.pow(2, attempt - 1));
    return retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    const { timeoutMs } = this.retry;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new RequestError("Transient", `Request timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
