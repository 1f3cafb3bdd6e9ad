import { describe, it, expect, beforeEach } from 'vitest';
import {
  checkDealerReputation,
  checkLegalIssues,
  comprehensiveDealerCheck,
  getCostSummary,
  resetCostTracking,
  searchBusinessImages,
  validateCnpj,
  verifyCnpjStatus,
} from '../src/domain/dealer/tools.js';
import { CostTracker } from '../src/domain/dealer/cost-tracker.js';
import { DISCLAIMER } from '../src/domain/dealer/messages.js';
import {
  CLEAN_ANSWERS,
  makeFakeClient,
  makeToolContext,
  VALID_CNPJ,
  VALID_CNPJ_FORMATTED,
} from './fixtures.js';

// ============================================================================
// validate_cnpj
// ============================================================================

describe('validateCnpj', () => {
  it('formats a valid CNPJ', () => {
    const result = validateCnpj({ cnpj: VALID_CNPJ });
    expect(result.success).toBe(true);
    expect(result.disclaimer).toBe(DISCLAIMER);
    expect(result.data).toMatchObject({
      cnpj_provided: VALID_CNPJ,
      cnpj_formatted: VALID_CNPJ_FORMATTED,
      is_valid: true,
    });
  });

  it('reports an invalid CNPJ without formatting it', () => {
    const result = validateCnpj({ cnpj: ' 11.222.333/0001-80 ' });
    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      cnpj_provided: '11.222.333/0001-80',
      cnpj_formatted: '11.222.333/0001-80',
      is_valid: false,
    });
  });
});

// ============================================================================
// Single-check tools
// ============================================================================

describe('single-check tools', () => {
  let fake: ReturnType<typeof makeFakeClient>;

  beforeEach(() => {
    fake = makeFakeClient(CLEAN_ANSWERS);
  });

  it('returns error for missing CNPJ', async () => {
    const result = await verifyCnpjStatus(makeToolContext(fake.client), { cnpj: '  ' });
    expect(result.success).toBe(false);
    expect(result.error).toBe('CNPJ parameter is required');
    expect(fake.query).not.toHaveBeenCalled();
  });

  it('returns error for CNPJ exceeding max length', async () => {
    const result = await checkLegalIssues(makeToolContext(fake.client), { cnpj: '1'.repeat(101) });
    expect(result.error).toBe('CNPJ too long (max 100 characters)');
    expect(fake.query).not.toHaveBeenCalled();
  });

  it('accepts a valid CNPJ wrapped in a label and a note', async () => {
    const cnpj = 'CNPJ: 11.222.333/0001-81 (matriz)';
    expect(validateCnpj({ cnpj }).data?.is_valid).toBe(true);

    const result = await checkLegalIssues(makeToolContext(fake.client), { cnpj });
    expect(result.success).toBe(true);
    expect(fake.query).toHaveBeenCalledTimes(1);
    expect(fake.query.mock.calls[0][0]).toContain(VALID_CNPJ_FORMATTED);
  });

  it('rejects an invalid CNPJ before querying', async () => {
    const result = await checkDealerReputation(makeToolContext(fake.client), { cnpj: '11.111.111/1111-11' });
    expect(result.success).toBe(false);
    expect(result.error).toBe('CNPJ inválido: 11.111.111/1111-11');
    expect(result.disclaimer).toBe(DISCLAIMER);
    expect(fake.query).not.toHaveBeenCalled();
  });

  it('returns error for company name exceeding max length', async () => {
    const result = await searchBusinessImages(makeToolContext(fake.client), {
      cnpj: VALID_CNPJ,
      company_name: 'a'.repeat(201),
    });
    expect(result.error).toBe('Company name too long (max 200 characters)');
  });

  it('returns the registration record', async () => {
    const result = await verifyCnpjStatus(makeToolContext(fake.client), { cnpj: VALID_CNPJ });
    expect(result.success).toBe(true);
    expect(result.data?.status).toBe('success');
    expect(result.data?.razao_social).toBe('Auto Teste Veiculos LTDA');
    expect(result.data?.cnpj_valid).toBe(true);
  });

  it('passes the trimmed company name to the prompt', async () => {
    await checkDealerReputation(makeToolContext(fake.client), {
      cnpj: VALID_CNPJ,
      company_name: '  Auto Teste  ',
    });
    const [prompt, operation] = fake.query.mock.calls[0];
    expect(operation).toBe('check_dealer_reputation');
    expect(prompt).toContain('"Auto Teste"');
  });

  it('reports a failed query as a successful call with an error record', async () => {
    const failing = makeFakeClient({ check_legal_issues: new Error('HTTP 500') });
    const result = await checkLegalIssues(makeToolContext(failing.client), { cnpj: VALID_CNPJ });
    expect(result.success).toBe(true);
    expect(result.data?.status).toBe('error');
    expect(result.data?.error).toBe('HTTP 500');
  });

  it('uses the search_business_images operation', async () => {
    const result = await searchBusinessImages(makeToolContext(fake.client), { cnpj: VALID_CNPJ });
    expect(result.data?.status).toBe('success');
    expect(fake.query.mock.calls[0][1]).toBe('search_business_images');
  });
});

// ============================================================================
// comprehensive_dealer_check
// ============================================================================

describe('comprehensiveDealerCheck', () => {
  it('rejects an invalid CNPJ before querying', async () => {
    const fake = makeFakeClient(CLEAN_ANSWERS);
    const result = await comprehensiveDealerCheck(makeToolContext(fake.client), { cnpj: '00000000000000' });
    expect(result.success).toBe(false);
    expect(result.error).toBe('CNPJ inválido: 00000000000000');
    expect(fake.query).not.toHaveBeenCalled();
  });

  it('returns the consolidated result', async () => {
    const fake = makeFakeClient(CLEAN_ANSWERS);
    const result = await comprehensiveDealerCheck(makeToolContext(fake.client), {
      cnpj: VALID_CNPJ_FORMATTED,
      company_name: 'Auto Teste',
    });
    expect(result.success).toBe(true);
    expect(result.data?.cnpj).toBe(VALID_CNPJ_FORMATTED);
    expect(result.data?.company_name).toBe('Auto Teste');
    expect(result.data?.risk_analysis.risk_level).toBe('BAIXO');
    expect(fake.query).toHaveBeenCalledTimes(4);
  });

  it('treats a blank company name as absent', async () => {
    const fake = makeFakeClient(CLEAN_ANSWERS);
    const result = await comprehensiveDealerCheck(makeToolContext(fake.client), {
      cnpj: VALID_CNPJ,
      company_name: '   ',
    });
    expect(result.data?.company_name).toBeNull();
  });
});

// ============================================================================
// get_cost_summary
// ============================================================================

describe('getCostSummary', () => {
  it('wraps the tracker summary', () => {
    const costs = new CostTracker();
    costs.record('gpt-4o', 1000, 0, 'verify_cnpj_status');
    const result = getCostSummary(costs);
    expect(result.success).toBe(true);
    expect(result.data?.total_requests).toBe(1);
    expect(result.data?.cost_by_operation.verify_cnpj_status.requests).toBe(1);
  });
});

describe('resetCostTracking', () => {
  it('returns the cleared summary and empties the tracker', () => {
    const costs = new CostTracker();
    costs.record('gpt-4o', 1000, 0, 'verify_cnpj_status');
    const result = resetCostTracking(costs);
    expect(result.success).toBe(true);
    expect(result.data?.total_requests).toBe(1);
    expect(costs.getSummary().total_requests).toBe(0);
    expect(costs.getSummary().total_cost_usd).toBe(0);
  });
});
