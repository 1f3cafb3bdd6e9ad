import { vi } from 'vitest';
import type {
  CheckRecord,
  FieldMap,
  InformationQueryClient,
  QueryResult,
  RiskThresholds,
} from '../src/domain/dealer/types.js';
import type { ToolContext } from '../src/domain/dealer/tools.js';
import { loadRiskThresholds } from '../src/core/config.js';

/**
 * Canonical defaults from config.ts.
 * Importing loadRiskThresholds() keeps tests in step with production defaults.
 */
export const DEFAULT_THRESHOLDS: RiskThresholds = loadRiskThresholds();

/** Build thresholds with specific overrides (defaults are valid). */
export function makeThresholds(overrides: Partial<RiskThresholds>): RiskThresholds {
  return { ...DEFAULT_THRESHOLDS, ...overrides };
}

/** Valid CNPJ used across tests, bare and formatted. */
export const VALID_CNPJ = '11222333000181';
export const VALID_CNPJ_FORMATTED = '11.222.333/0001-81';

/** Operation name → answer text (or an Error to throw). */
export type FakeAnswers = Record<string, string | Error>;

export function makeQueryResult(text: string, model = 'gpt-4o-search-preview'): QueryResult {
  return { text, model, usage: { input_tokens: 100, output_tokens: 50 } };
}

/**
 * In-process stand-in for the language model. Answers by operation name;
 * an operation with no answer rejects.
 */
export function makeFakeClient(answers: FakeAnswers) {
  const query = vi.fn(async (_prompt: string, operation: string, _signal?: AbortSignal): Promise<QueryResult> => {
    const answer = answers[operation];
    if (answer === undefined) {
      throw new Error(`No fake answer for ${operation}`);
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return makeQueryResult(answer);
  });
  const client: InformationQueryClient = { query };
  return { client, query };
}

export function makeToolContext(
  client: InformationQueryClient,
  overrides: Partial<ToolContext> = {},
): ToolContext {
  return {
    client,
    thresholds: DEFAULT_THRESHOLDS,
    checkOptions: {},
    ...overrides,
  };
}

/** A success record with extra fields. */
export function makeRecord(fields: FieldMap = {}): CheckRecord {
  return {
    ...fields,
    status: 'success',
    query_date: '2024-01-01T00:00:00.000Z',
  };
}

/** Canned model answers that trip no risk signal. */
export const CLEAN_ANSWERS: FakeAnswers = {
  verify_cnpj_status: JSON.stringify({
    cnpj: VALID_CNPJ_FORMATTED,
    razao_social: 'Auto Teste Veiculos LTDA',
    situacao_cadastral: 'ATIVA',
    company_data: { situacao_cadastral: 'ATIVA' },
  }),
  check_dealer_reputation: JSON.stringify({
    company_name: 'Auto Teste',
    reputation_score: '85',
    main_issues: [],
  }),
  check_legal_issues: JSON.stringify({
    company_name: 'Auto Teste',
    risk_level: 'BAIXO',
  }),
  search_business_images: JSON.stringify({
    company_name: 'Auto Teste',
    business_images: { facade: { url: 'N/A' } },
  }),
};
