// ============================================================================
// Check Records (normalized model output, one per check kind)
// ============================================================================

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export type FieldMap = { [key: string]: FieldValue };

export type CheckStatus = 'success' | 'success_text' | 'error' | 'partial_success';

export type CheckKind = 'cnpj_status' | 'reputation' | 'legal_issues' | 'business_images';

export const CHECK_KINDS: readonly CheckKind[] = [
  'cnpj_status',
  'reputation',
  'legal_issues',
  'business_images',
];

/**
 * A check result is a loose mapping of named fields. Every record carries
 * `status` and `query_date`; the remaining fields depend on the check kind
 * and on how well the model followed the requested schema.
 */
export interface CheckRecord {
  status: CheckStatus;
  query_date: string;
  [field: string]: FieldValue | undefined;
}

export type CheckRecords = Record<CheckKind, CheckRecord>;

// ============================================================================
// Risk Analysis
// ============================================================================

export type RiskLevel = 'BAIXO' | 'MÉDIO' | 'ALTO' | 'CRÍTICO';

export interface RiskAssessment {
  risk_score: number;
  risk_level: RiskLevel;
  risk_factors: string[];
  recommendation: string;
  next_steps: string[];
}

export interface ConsolidatedResult {
  cnpj: string;
  company_name: string | null;
  analysis_date: string;
  checks_performed: CheckRecords;
  risk_analysis: RiskAssessment;
}

// ============================================================================
// Risk Thresholds (Configurable via Environment Variables)
// ============================================================================

export interface RiskThresholds {
  // Points added when each signal fires
  weightRegistration: number; // irregular registration status (default: 50)
  weightReputation: number;   // low online reputation (default: 30)
  weightLegal: number;        // serious legal problems (default: 40)

  // Reputation score below this fires the reputation signal (default: 50)
  reputationMinScore: number;

  // Tier cutoffs, score >= cutoff
  levelCriticalMin: number; // default: 80
  levelHighMin: number;     // default: 50
  levelMediumMin: number;   // default: 25
}

// ============================================================================
// Query Client
// ============================================================================

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface QueryResult {
  text: string;
  model: string;
  usage: TokenUsage;
}

/**
 * Anything that can answer a natural-language prompt. The OpenAI client is
 * the production implementation; tests substitute an in-process fake.
 * An aborted `signal` must stop the work in flight.
 */
export interface InformationQueryClient {
  query(prompt: string, operation: string, signal?: AbortSignal): Promise<QueryResult>;
}

// ============================================================================
// Cost Tracking
// ============================================================================

export interface RequestCost {
  timestamp: string;
  model: string;
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  cost_usd: number;
  operation: string;
}

export interface ModelCostBreakdown {
  cost: number;
  requests: number;
  tokens: number;
}

export interface OperationCostBreakdown {
  cost: number;
  requests: number;
}

export interface CostSummary {
  total_cost_usd: number;
  total_requests: number;
  total_tokens: number;
  cost_by_model: Record<string, ModelCostBreakdown>;
  cost_by_operation: Record<string, OperationCostBreakdown>;
  average_cost_per_request: number;
  requests_history: RequestCost[];
}

// ============================================================================
// Tool Response Wrappers
// ============================================================================

export interface CnpjValidationResult {
  cnpj_provided: string;
  cnpj_formatted: string;
  is_valid: boolean;
  validation_date: string;
}

export interface ToolResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  disclaimer: string;
}
