import { logInfo, logWarn } from '../../core/logging.js';
import {
  CostSummary,
  ModelCostBreakdown,
  OperationCostBreakdown,
  RequestCost,
} from './types.js';

interface ModelPricing {
  input: number;       // USD per 1K input tokens
  output: number;      // USD per 1K output tokens
  searchCost?: number; // USD per web search
}

export const PRICING: Record<string, ModelPricing> = {
  'gpt-4o': { input: 0.003, output: 0.01 },
  'gpt-4o-2024-08-06': { input: 0.0025, output: 0.01 },
  'gpt-4o-search-preview': { input: 0.003, output: 0.01, searchCost: 0.02 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
};

const HISTORY_IN_SUMMARY = 10;

/**
 * Cost of one request. Unknown models cost 0 (with a warning) rather than
 * failing the request they belong to.
 */
export function calculateCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  searchCount = 0,
): number {
  const pricing = PRICING[model];
  if (!pricing) {
    logWarn(`Model ${model} not found in pricing table`);
    return 0;
  }

  let cost = (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output;

  if (model.toLowerCase().includes('search') && pricing.searchCost !== undefined) {
    cost += searchCount * pricing.searchCost;
  }

  return cost;
}

/**
 * Per-process request history and running total.
 * `record()` is the only mutation point, so concurrent checks never race on
 * the total.
 */
export class CostTracker {
  private history: RequestCost[] = [];
  private totalCost = 0;

  record(
    model: string,
    inputTokens: number,
    outputTokens: number,
    operation = 'unknown',
    searchCount = 0,
  ): RequestCost {
    const cost = calculateCost(model, inputTokens, outputTokens, searchCount);
    const entry: RequestCost = {
      timestamp: new Date().toISOString(),
      model,
      input_tokens: inputTokens,
      output_tokens: outputTokens,
      total_tokens: inputTokens + outputTokens,
      cost_usd: cost,
      operation,
    };

    this.history.push(entry);
    this.totalCost += cost;

    logInfo(
      `Request cost: $${cost.toFixed(4)} USD (${operation}, ${model}) | running total: $${this.totalCost.toFixed(4)} USD`,
    );
    return entry;
  }

  getSummary(): CostSummary {
    const costByModel: Record<string, ModelCostBreakdown> = {};
    const costByOperation: Record<string, OperationCostBreakdown> = {};
    let totalTokens = 0;

    for (const req of this.history) {
      const byModel = (costByModel[req.model] ??= { cost: 0, requests: 0, tokens: 0 });
      byModel.cost += req.cost_usd;
      byModel.requests += 1;
      byModel.tokens += req.total_tokens;

      const byOperation = (costByOperation[req.operation] ??= { cost: 0, requests: 0 });
      byOperation.cost += req.cost_usd;
      byOperation.requests += 1;

      totalTokens += req.total_tokens;
    }

    const requests = this.history.length;
    return {
      total_cost_usd: this.totalCost,
      total_requests: requests,
      total_tokens: totalTokens,
      cost_by_model: costByModel,
      cost_by_operation: costByOperation,
      average_cost_per_request: requests > 0 ? this.totalCost / requests : 0,
      requests_history: this.history.slice(-HISTORY_IN_SUMMARY),
    };
  }

  reset(): void {
    this.history = [];
    this.totalCost = 0;
    logInfo('Cost tracking reset');
  }
}
