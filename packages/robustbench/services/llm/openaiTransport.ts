// Production transport: OpenAI-compatible chat completions through LlamaIndex
import { LlmSettings } from "./config";
import { ChatRequest, ChatTransport } from "./requestClient";
import { OpenAI } from "@llamaindex/openai";
import { z } from "zod";

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

/**
 * Create a transport bound to one endpoint. Model instances are cached per
 * (model, temperature, maxTokens) since LlamaIndex fixes them at construction.
 * SDK-level retries are disabled: retry/backoff belongs to the RequestClient.
 */
export function createOpenAITransport(settings: Pick<LlmSettings, "baseUrl" | "apiKey" | "timeoutMs">): ChatTransport {
  const models = new Map<string, OpenAI>();

  const getModel = (request: ChatRequest): OpenAI => {
    const key = `${request.model}|${request.temperature ?? "default"}|${request.maxTokens ?? "default"}`;
    let llm = models.get(key);
    if (!llm) {
      llm = new OpenAI({
        model: request.model,
        apiKey: settings.apiKey,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        maxRetries: 0,
        timeout: settings.timeoutMs,
        additionalSessionOptions: { baseURL: settings.baseUrl },
      });
      models.set(key, llm);
    }
    return llm;
  };

  return {
    async listModels(): Promise<string[]> {
      const url = `${settings.baseUrl.replace(/\/+$/, "")}/models`;
      const res = await fetch(url, { headers: { Authorization: `Bearer ${settings.apiKey}` } });
      if (!res.ok) {
        throw Object.assign(new Error(`Failed to list models: ${url} (status ${res.status})`), { status: res.status });
      }
      const parsed = ModelListSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`Unexpected model list from ${url}: ${parsed.error.message}`);
      }
      return parsed.data.data.map(model => model.id);
    },

    async complete(request: ChatRequest): Promise<string> {
      const response = await getModel(request).chat({
        messages: [{ role: "user", content: request.prompt }],
      });
      const { content } = response.message;
      if (typeof content === "string") return content;
      // Multi-part content: keep the text parts only
      return content.map(part => (part.type === "text" ? part.text : "")).join("");
    },
  };
}
