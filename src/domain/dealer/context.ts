import { AppConfig, OpenAIConfig } from "../../core/config.js";
import { CostTracker } from "./cost-tracker.js";
import { OpenAISearchClient } from "./openai-client.js";
import { ToolContext } from "./tools.js";
import { InformationQueryClient, QueryResult } from "./types.js";

export interface DealerServices {
  tools: ToolContext;
  costs: CostTracker;
}

export interface DealerServicesOptions {
  /** Build the query client now and fail fast if it cannot be built. */
  requireApiKey?: boolean;
}

/**
 * Builds the OpenAI client on the first query, so a missing API key fails
 * that query instead of the whole process.
 */
export class LazyQueryClient implements InformationQueryClient {
  private client: OpenAISearchClient | undefined;

  constructor(
    private readonly config: OpenAIConfig,
    private readonly costs: CostTracker,
  ) {}

  async query(prompt: string, operation: string, signal?: AbortSignal): Promise<QueryResult> {
    this.client ??= new OpenAISearchClient(this.config, this.costs);
    return this.client.query(prompt, operation, signal);
  }
}

/**
 * Build the per-process services from configuration: one cost tracker and
 * one query client, passed explicitly to whoever handles requests.
 *
 * @throws Error if `requireApiKey` is set and no OpenAI API key is configured
 */
export function createDealerServices(
  config: AppConfig,
  options: DealerServicesOptions = {},
): DealerServices {
  const costs = new CostTracker();
  const client: InformationQueryClient = options.requireApiKey
    ? new OpenAISearchClient(config.openai, costs)
    : new LazyQueryClient(config.openai, costs);

  return {
    costs,
    tools: {
      client,
      thresholds: config.thresholds,
      checkOptions: { timeoutMs: config.checks.taskTimeoutMs },
    },
  };
}
