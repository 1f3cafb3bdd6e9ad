import axios, { AxiosInstance, AxiosError } from "axios";
import { OpenAIConfig } from "../../core/config.js";
import { logDebug, logError, logInfo, logWarn } from "../../core/logging.js";
import { CostTracker } from "./cost-tracker.js";
import {
  FALLBACK_INSTRUCTIONS,
  SEARCH_INSTRUCTIONS,
  SYSTEM_PROMPT,
} from "./prompts.js";
import { InformationQueryClient, QueryResult } from "./types.js";

// ============================================================================
// Chat Completions API shapes (only the fields we read or send)
// ============================================================================

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  response_format?: { type: "json_object" };
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: string | null } }[];
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

/**
 * Rate limiter that serializes request starts via a promise chain.
 * Each call appends to the chain, so consecutive requests begin at least
 * `delayMs` apart; the requests themselves still run concurrently.
 */
class RateLimiter {
  private chain: Promise<void> = Promise.resolve();
  private lastTime = 0;
  private readonly delayMs: number;

  constructor(delayMs: number) {
    this.delayMs = delayMs;
  }

  waitIfNeeded(): Promise<void> {
    this.chain = this.chain.then(async () => {
      const now = Date.now();
      const elapsed = now - this.lastTime;
      if (elapsed < this.delayMs) {
        const waitTime = this.delayMs - elapsed;
        logDebug(`Rate limiting: waiting ${waitTime}ms`);
        await new Promise<void>((r) => setTimeout(r, waitTime));
      }
      this.lastTime = Date.now();
    });
    return this.chain;
  }
}

/**
 * OpenAI chat-completions client with web search.
 *
 * Each query goes to the search-capable model first. If that call fails
 * (model unavailable, quota, provider error) it is retried once against the
 * fallback model in JSON mode. Token usage of whichever call answered is
 * reported to the cost tracker.
 */
export class OpenAISearchClient implements InformationQueryClient {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;
  private readonly config: OpenAIConfig;
  private readonly costs: CostTracker;

  constructor(config: OpenAIConfig, costs: CostTracker) {
    if (!config.apiKey) {
      throw new Error("OPENAI_API_KEY is required to query the language model");
    }
    this.config = config;
    this.costs = costs;
    this.rateLimiter = new RateLimiter(config.rateLimitMs);

    this.client = axios.create({
      baseURL: config.apiBaseUrl,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.apiKey}`,
        "User-Agent": "dealer-fraud-check-mcp/1.0",
      },
      timeout: config.timeoutMs,
    });

    // Request interceptor for logging
    this.client.interceptors.request.use(
      (config) => {
        logDebug(`API Request: ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      },
      (error) => Promise.reject(error),
    );

    // Response interceptor for error handling
    this.client.interceptors.response.use(
      (response) => {
        logDebug(`API Response: ${response.status} ${response.config.url}`);
        return response;
      },
      (error: AxiosError) => {
        if (error.response) {
          logError(
            `API Error: ${error.response.status} ${error.config?.url}`,
            error.response.data,
          );
        } else if (error.request) {
          logError("API Error: No response received", error.message);
        } else {
          logError("API Error:", error.message);
        }
        return Promise.reject(error);
      },
    );
  }

  /**
   * Answer a prompt, preferring the web-search model.
   *
   * @param operation - label recorded with the request cost
   * @param signal - aborts the request in flight and skips the fallback
   * @throws Error if both the search model and the fallback model fail
   */
  async query(prompt: string, operation: string, signal?: AbortSignal): Promise<QueryResult> {
    logInfo(`Querying model for ${operation} (${prompt.length} chars)`);

    try {
      return await this.complete(
        {
          model: this.config.searchModel,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: `${prompt}\n${SEARCH_INSTRUCTIONS}` },
          ],
          max_tokens: this.config.maxTokens,
        },
        operation,
        1,
        signal,
      );
    } catch (searchError) {
      if (signal?.aborted) throw searchError;
      logWarn(
        `Search model ${this.config.searchModel} unavailable, falling back to ${this.config.fallbackModel}:`,
        OpenAISearchClient.describeError(searchError),
      );
    }

    return this.complete(
      {
        model: this.config.fallbackModel,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: `${prompt}\n${FALLBACK_INSTRUCTIONS}` },
        ],
        max_tokens: this.config.maxTokens,
        temperature: 0,
        response_format: { type: "json_object" },
      },
      operation,
      0,
      signal,
    );
  }

  private async complete(
    body: ChatCompletionRequest,
    operation: string,
    searchCount: number,
    signal: AbortSignal | undefined,
  ): Promise<QueryResult> {
    await this.rateLimiter.waitIfNeeded();
    signal?.throwIfAborted();

    const response = await this.client.post<ChatCompletionResponse>(
      "/chat/completions",
      body,
      { signal },
    );

    const text = response.data.choices?.[0]?.message?.content;
    if (!text) {
      throw new Error(`Empty response from model ${body.model}`);
    }

    const usage = {
      input_tokens: response.data.usage?.prompt_tokens ?? 0,
      output_tokens: response.data.usage?.completion_tokens ?? 0,
    };
    if (response.data.usage) {
      this.costs.record(
        body.model,
        usage.input_tokens,
        usage.output_tokens,
        operation,
        searchCount,
      );
    }

    logDebug(`Response from ${body.model}: ${text.length} chars`);
    return { text, model: body.model, usage };
  }

  /**
   * Human-readable description of a failed call, including the provider's
   * error message when the API returned one.
   */
  static describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const data: unknown = error.response?.data;
      const providerMessage =
        typeof data === "object" &&
        data !== null &&
        "error" in data &&
        typeof data.error === "object" &&
        data.error !== null &&
        "message" in data.error &&
        typeof data.error.message === "string"
          ? data.error.message
          : undefined;
      const base = status ? `HTTP ${status}` : error.message;
      return providerMessage ? `${base}: ${providerMessage}` : base;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
