import type { RequestErrorKind } from "./errors";

export type UsageSnapshot = {
  /** Attempts sent to the endpoint, retries included */
  requests: number;
  completions: number;
  failedAttempts: number;
  failuresByKind: Partial<Record<RequestErrorKind, number>>;
  requestsByModel: Record<string, number>;
  promptChars: number;
  completionChars: number;
  /** Only counted when a token counter is supplied */
  promptTokens: number;
  completionTokens: number;
  /** Total time callers spent suspended at admission */
  rateLimitWaitMs: number;
};

/**
 * Shared usage counter for coarse cost/throughput reporting.
 * Every attempt made by the request client is recorded here.
 */
export class UsageTracker {
  private state: UsageSnapshot = {
    requests: 0,
    completions: 0,
    failedAttempts: 0,
    failuresByKind: {},
    requestsByModel: {},
    promptChars: 0,
    completionChars: 0,
    promptTokens: 0,
    completionTokens: 0,
    rateLimitWaitMs: 0,
  };

  constructor(private readonly countTokens?: (text: string) => number) {}

  recordRequest(model: string, prompt: string): void {
    this.state.requests++;
    this.state.requestsByModel[model] = (this.state.requestsByModel[model] ?? 0) + 1;
    this.state.promptChars += prompt.length;
    if (this.countTokens) this.state.promptTokens += this.countTokens(prompt);
  }

  recordCompletion(text: string): void {
    this.state.completions++;
    this.state.completionChars += text.length;
    if (this.countTokens) this.state.completionTokens += this.countTokens(text);
  }

  recordFailure(kind: RequestErrorKind): void {
    this.state.failedAttempts++;
    this.state.failuresByKind[kind] = (this.state.failuresByKind[kind] ?? 0) + 1;
  }

  recordWait(ms: number): void {
    this.state.rateLimitWaitMs += ms;
  }

  snapshot(): UsageSnapshot {
    return {
      ...this.state,
      failuresByKind: { ...this.state.failuresByKind },
      requestsByModel: { ...this.state.requestsByModel },
    };
  }
}

export function formatUsage(usage: UsageSnapshot): string {
  const lines = [
    `  Requests:      ${usage.requests} (${usage.completions} completed, ${usage.failedAttempts} failed attempts)`,
    `  Prompt chars:  ${usage.promptChars}`,
    `  Output chars:  ${usage.completionChars}`,
  ];
  if (usage.promptTokens > 0 || usage.completionTokens > 0) {
    lines.push(`  Est. tokens:   ${usage.promptTokens} in / ${usage.completionTokens} out`);
  }
  lines.push(`  Waited:        ${(usage.rateLimitWaitMs / 1000).toFixed(1)}s at the rate limit`);
  for (const [model, count] of Object.entries(usage.requestsByModel)) {
    lines.push(`  ${model}: ${count} requests`);
  }
  return lines.join("\n");
}
