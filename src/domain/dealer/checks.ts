import { logDebug, logError, logInfo } from '../../core/logging.js';
import { formatCnpj } from './cnpj.js';
import {
  buildBusinessImagesPrompt,
  buildCnpjStatusPrompt,
  buildLegalIssuesPrompt,
  buildReputationPrompt,
} from './prompts.js';
import { errorRecord, toCheckRecord } from './records.js';
import { analyzeRisk } from './scoring.js';
import {
  CheckKind,
  CheckRecord,
  CheckRecords,
  ConsolidatedResult,
  InformationQueryClient,
  RiskThresholds,
} from './types.js';

// ============================================================================
// Check Definitions
// ============================================================================

interface CheckDefinition {
  operation: string;
  buildPrompt: (formattedCnpj: string, companyName?: string) => string;
}

export const CHECK_DEFINITIONS: Record<CheckKind, CheckDefinition> = {
  cnpj_status: {
    operation: 'verify_cnpj_status',
    buildPrompt: (cnpj) => buildCnpjStatusPrompt(cnpj),
  },
  reputation: {
    operation: 'check_dealer_reputation',
    buildPrompt: buildReputationPrompt,
  },
  legal_issues: {
    operation: 'check_legal_issues',
    buildPrompt: buildLegalIssuesPrompt,
  },
  business_images: {
    operation: 'search_business_images',
    buildPrompt: buildBusinessImagesPrompt,
  },
};

export interface CheckOptions {
  /** Per-check timeout; a check that runs longer is aborted and becomes an error record. */
  timeoutMs?: number;
}

export class CheckTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CheckTimeoutError';
  }
}

/**
 * Reject with CheckTimeoutError if `promise` has not settled in time, and
 * abort `controller` so the work behind the promise stops too.
 * The timer is cleared either way so nothing is left running.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  controller?: AbortController,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CheckTimeoutError(operation, timeoutMs);
      controller?.abort(error);
      reject(error);
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Single Check
// ============================================================================

/**
 * Run one check kind for an already validated CNPJ.
 *
 * Never rejects: a failed or timed-out query becomes an `error` record and
 * an unparseable answer a degraded one.
 */
export async function runCheck(
  client: InformationQueryClient,
  kind: CheckKind,
  cnpj: string,
  companyName?: string,
  options: CheckOptions = {},
): Promise<CheckRecord> {
  const formattedCnpj = formatCnpj(cnpj);
  const { operation, buildPrompt } = CHECK_DEFINITIONS[kind];
  const prompt = buildPrompt(formattedCnpj, companyName);

  logDebug(`${operation} for CNPJ: ${formattedCnpj}`);

  try {
    const controller = new AbortController();
    const pending = client.query(prompt, operation, controller.signal);
    const result = options.timeoutMs
      ? await withTimeout(pending, options.timeoutMs, operation, controller)
      : await pending;
    return toCheckRecord(kind, result.text, formattedCnpj, companyName);
  } catch (error) {
    const message = errorMessage(error);
    logError(`${operation} failed:`, message);
    return errorRecord(kind, formattedCnpj, message);
  }
}

// ============================================================================
// Comprehensive Check
// ============================================================================

/**
 * Run all four checks concurrently and consolidate them.
 *
 * All branches are joined before aggregation; one failing (or timing out)
 * only turns its own record into an error and never cancels its siblings.
 */
export async function runComprehensiveCheck(
  client: InformationQueryClient,
  cnpj: string,
  companyName: string | undefined,
  thresholds: RiskThresholds,
  options: CheckOptions = {},
): Promise<ConsolidatedResult> {
  const formattedCnpj = formatCnpj(cnpj);
  logInfo(`Comprehensive check for CNPJ: ${formattedCnpj}`);

  const run = (kind: CheckKind) => runCheck(client, kind, cnpj, companyName, options);
  const settle = (kind: CheckKind, outcome: PromiseSettledResult<CheckRecord>): CheckRecord =>
    outcome.status === 'fulfilled'
      ? outcome.value
      : errorRecord(kind, formattedCnpj, errorMessage(outcome.reason));

  const [status, reputation, legal, images] = await Promise.allSettled([
    run('cnpj_status'),
    run('reputation'),
    run('legal_issues'),
    run('business_images'),
  ]);

  const checks: CheckRecords = {
    cnpj_status: settle('cnpj_status', status),
    reputation: settle('reputation', reputation),
    legal_issues: settle('legal_issues', legal),
    business_images: settle('business_images', images),
  };

  return {
    cnpj: formattedCnpj,
    company_name: companyName ?? null,
    analysis_date: new Date().toISOString(),
    checks_performed: checks,
    risk_analysis: analyzeRisk(checks, thresholds),
  };
}
