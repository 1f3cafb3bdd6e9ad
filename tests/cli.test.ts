import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runCli } from '../src/cli/index.js';
import { CostTracker } from '../src/domain/dealer/cost-tracker.js';
import type { DealerServices } from '../src/domain/dealer/context.js';
import { CLEAN_ANSWERS, makeFakeClient, makeToolContext, VALID_CNPJ, VALID_CNPJ_FORMATTED } from './fixtures.js';

describe('runCli', () => {
  let output: string[];
  let fake: ReturnType<typeof makeFakeClient>;
  let createServices: () => DealerServices;

  beforeEach(() => {
    output = [];
    fake = makeFakeClient(CLEAN_ANSWERS);
    createServices = vi.fn(() => ({ tools: makeToolContext(fake.client), costs: new CostTracker() }));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function run(...argv: string[]): Promise<number> {
    return runCli(argv, { createServices, write: (text) => output.push(text) });
  }

  it('validates without building query services', async () => {
    expect(await run('validate', VALID_CNPJ)).toBe(0);
    expect(JSON.parse(output[0]).data.cnpj_formatted).toBe(VALID_CNPJ_FORMATTED);
    expect(createServices).not.toHaveBeenCalled();
  });

  it('exits 1 for an invalid CNPJ on validate', async () => {
    expect(await run('validate', '11.222.333/0001-80')).toBe(1);
    expect(JSON.parse(output[0]).data.is_valid).toBe(false);
  });

  it('runs the complete check and prints JSON', async () => {
    expect(await run('complete', VALID_CNPJ, '--empresa', 'Auto Teste')).toBe(0);
    const body = JSON.parse(output[0]);
    expect(body.success).toBe(true);
    expect(body.data.company_name).toBe('Auto Teste');
    expect(body.data.risk_analysis.risk_level).toBe('BAIXO');
  });

  it('accepts the short company-name flag', async () => {
    expect(await run('reputation', VALID_CNPJ, '-e', 'Auto Teste')).toBe(0);
    expect(fake.query.mock.calls[0][0]).toContain('"Auto Teste"');
  });

  it.each([
    ['status', 'verify_cnpj_status'],
    ['reputation', 'check_dealer_reputation'],
    ['legal', 'check_legal_issues'],
    ['images', 'search_business_images'],
  ])('maps %s to %s', async (command, operation) => {
    expect(await run(command, VALID_CNPJ)).toBe(0);
    expect(fake.query.mock.calls[0][1]).toBe(operation);
  });

  it('exits 1 when the tool reports failure', async () => {
    expect(await run('status', '123')).toBe(1);
    expect(JSON.parse(output[0]).error).toBe('CNPJ inválido: 123');
  });

  it('exits 1 on missing arguments', async () => {
    expect(await run()).toBe(1);
    expect(await run('complete')).toBe(1);
    expect(output).toEqual([]);
  });

  it('exits 1 on an unknown command', async () => {
    expect(await run('explode', VALID_CNPJ)).toBe(1);
    expect(output).toEqual([]);
  });

  it('exits 1 on an unknown option', async () => {
    expect(await run('complete', VALID_CNPJ, '--verbose')).toBe(1);
  });

  it('exits 1 on extra positional arguments', async () => {
    expect(await run('complete', VALID_CNPJ, 'extra')).toBe(1);
  });

  it('exits 1 when services cannot be built', async () => {
    const failing = vi.fn((): DealerServices => {
      throw new Error('OPENAI_API_KEY is required to query the language model');
    });
    const code = await runCli(['status', VALID_CNPJ], { createServices: failing, write: (t) => output.push(t) });
    expect(code).toBe(1);
    expect(output).toEqual([]);
  });
});
