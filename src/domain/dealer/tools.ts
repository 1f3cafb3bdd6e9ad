import { formatCnpj, isValidCnpj } from "./cnpj.js";
import { CheckOptions, runCheck, runComprehensiveCheck } from "./checks.js";
import { CostTracker } from "./cost-tracker.js";
import { DISCLAIMER, invalidCnpjMessage } from "./messages.js";
import {
  CheckKind,
  CheckRecord,
  CnpjValidationResult,
  ConsolidatedResult,
  CostSummary,
  InformationQueryClient,
  RiskThresholds,
  ToolResponse,
} from "./types.js";
import { logDebug, logError } from "../../core/logging.js";

// Security: Input length limits to prevent DoS
const MAX_CNPJ_LENGTH = 100;
const MAX_COMPANY_NAME_LENGTH = 200;

// ============================================================================
// Tool Input Types
// ============================================================================

export interface ValidateCnpjInput {
  cnpj: string;
}

export interface CnpjCheckInput {
  cnpj: string;
  company_name?: string;
}

/**
 * Everything a tool needs, constructed once per process by the server or CLI.
 */
export interface ToolContext {
  client: InformationQueryClient;
  thresholds: RiskThresholds;
  checkOptions: CheckOptions;
}

// ============================================================================
// Shared CNPJ Gate
// ============================================================================

function failure<T>(error: string): ToolResponse<T> {
  return { success: false, error, disclaimer: DISCLAIMER };
}

function cleanCompanyName(name: string | undefined): string | undefined {
  const trimmed = name?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Wraps the common pattern: validate CNPJ → run logic.
 * An invalid CNPJ is rejected before any query (and any cost) happens.
 * Handles try/catch, logging, disclaimer, and error responses uniformly.
 */
async function withValidCnpj<T>(
  input: CnpjCheckInput,
  toolName: string,
  fn: (cnpj: string, companyName: string | undefined) => Promise<T>,
): Promise<ToolResponse<T>> {
  try {
    const cnpj = input.cnpj?.trim() ?? "";
    if (!cnpj) {
      return failure("CNPJ parameter is required");
    }
    if (cnpj.length > MAX_CNPJ_LENGTH) {
      return failure(`CNPJ too long (max ${MAX_CNPJ_LENGTH} characters)`);
    }
    if (!isValidCnpj(cnpj)) {
      return failure(invalidCnpjMessage(cnpj));
    }

    const companyName = cleanCompanyName(input.company_name);
    if (companyName && companyName.length > MAX_COMPANY_NAME_LENGTH) {
      return failure(
        `Company name too long (max ${MAX_COMPANY_NAME_LENGTH} characters)`,
      );
    }

    logDebug(`${toolName} for CNPJ: ${formatCnpj(cnpj)}`);
    return {
      success: true,
      data: await fn(cnpj, companyName),
      disclaimer: DISCLAIMER,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError(`${toolName} failed:`, message);
    return failure(`${toolName} failed: ${message}`);
  }
}

function singleCheck(
  ctx: ToolContext,
  kind: CheckKind,
  input: CnpjCheckInput,
  toolName: string,
): Promise<ToolResponse<CheckRecord>> {
  return withValidCnpj(input, toolName, (cnpj, companyName) =>
    runCheck(ctx.client, kind, cnpj, companyName, ctx.checkOptions),
  );
}

// ============================================================================
// Tool Implementations
// ============================================================================

/**
 * validate_cnpj - Check digits only, no query
 */
export function validateCnpj(
  input: ValidateCnpjInput,
): ToolResponse<CnpjValidationResult> {
  const cnpj = input.cnpj?.trim() ?? "";
  const isValid = isValidCnpj(cnpj);

  return {
    success: true,
    data: {
      cnpj_provided: cnpj,
      cnpj_formatted: isValid ? formatCnpj(cnpj) : cnpj,
      is_valid: isValid,
      validation_date: new Date().toISOString(),
    },
    disclaimer: DISCLAIMER,
  };
}

/**
 * verify_cnpj_status - Official registration status
 */
export function verifyCnpjStatus(
  ctx: ToolContext,
  input: ValidateCnpjInput,
): Promise<ToolResponse<CheckRecord>> {
  // The registration prompt does not use the company name
  return singleCheck(ctx, "cnpj_status", { cnpj: input.cnpj }, "verifyCnpjStatus");
}

/**
 * check_dealer_reputation - Complaints and online reviews
 */
export function checkDealerReputation(
  ctx: ToolContext,
  input: CnpjCheckInput,
): Promise<ToolResponse<CheckRecord>> {
  return singleCheck(ctx, "reputation", input, "checkDealerReputation");
}

/**
 * check_legal_issues - Lawsuits, investigations, sanctions
 */
export function checkLegalIssues(
  ctx: ToolContext,
  input: CnpjCheckInput,
): Promise<ToolResponse<CheckRecord>> {
  return singleCheck(ctx, "legal_issues", input, "checkLegalIssues");
}

/**
 * search_business_images - Storefront, logo, social media presence
 */
export function searchBusinessImages(
  ctx: ToolContext,
  input: CnpjCheckInput,
): Promise<ToolResponse<CheckRecord>> {
  return singleCheck(ctx, "business_images", input, "searchBusinessImages");
}

/**
 * comprehensive_dealer_check - All four checks plus consolidated risk
 */
export function comprehensiveDealerCheck(
  ctx: ToolContext,
  input: CnpjCheckInput,
): Promise<ToolResponse<ConsolidatedResult>> {
  return withValidCnpj(input, "comprehensiveDealerCheck", (cnpj, companyName) =>
    runComprehensiveCheck(
      ctx.client,
      cnpj,
      companyName,
      ctx.thresholds,
      ctx.checkOptions,
    ),
  );
}

/**
 * get_cost_summary - Spend of this process so far
 */
export function getCostSummary(costs: CostTracker): ToolResponse<CostSummary> {
  return {
    success: true,
    data: costs.getSummary(),
    disclaimer: DISCLAIMER,
  };
}

/**
 * reset_cost_tracking - Start a new spend window; returns what was cleared
 */
export function resetCostTracking(costs: CostTracker): ToolResponse<CostSummary> {
  const cleared = costs.getSummary();
  costs.reset();
  return {
    success: true,
    data: cleared,
    disclaimer: DISCLAIMER,
  };
}
