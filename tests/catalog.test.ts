import { describe, it, expect } from 'vitest';
import { PROMPTS, renderPrompt } from '../src/domain/dealer/catalog.js';
import { VALID_CNPJ_FORMATTED } from './fixtures.js';

describe('PROMPTS', () => {
  it('lists both prompts with cnpj required', () => {
    expect(PROMPTS.map((p) => p.name)).toEqual(['investigate_dealer', 'pre_purchase_check']);
    for (const prompt of PROMPTS) {
      expect(prompt.arguments.find((a) => a.name === 'cnpj')?.required).toBe(true);
    }
  });
});

describe('renderPrompt', () => {
  it('renders investigate_dealer with defaults', () => {
    const { description, text } = renderPrompt('investigate_dealer', { cnpj: VALID_CNPJ_FORMATTED });
    expect(description).toBe(`Investigação completa de fraude para lojista CNPJ ${VALID_CNPJ_FORMATTED}`);
    expect(text).toContain('por suspeita de possível fraude.');
    expect(text).toContain('Nome da empresa: A investigar');
    expect(text).toContain('comprehensive_dealer_check');
  });

  it('renders investigate_dealer with concern and company name', () => {
    const { text } = renderPrompt('investigate_dealer', {
      cnpj: VALID_CNPJ_FORMATTED,
      company_name: 'Auto Teste',
      concern: 'venda sem documento',
    });
    expect(text).toContain('por suspeita de venda sem documento.');
    expect(text).toContain('Nome da empresa: Auto Teste');
  });

  it('renders pre_purchase_check with and without vehicle info', () => {
    expect(renderPrompt('pre_purchase_check', { cnpj: VALID_CNPJ_FORMATTED }).text).toContain(
      `lojista CNPJ ${VALID_CNPJ_FORMATTED} para compra de veículo.`,
    );
    expect(
      renderPrompt('pre_purchase_check', { cnpj: VALID_CNPJ_FORMATTED, vehicle_info: 'Gol 2015' }).text,
    ).toContain('para compra do veículo: Gol 2015.');
  });

  it('describes pre_purchase_check with the CNPJ', () => {
    expect(renderPrompt('pre_purchase_check', { cnpj: VALID_CNPJ_FORMATTED }).description).toBe(
      `Verificação pré-compra para lojista CNPJ ${VALID_CNPJ_FORMATTED}`,
    );
  });

  it('throws for an unknown prompt', () => {
    expect(() => renderPrompt('nope')).toThrow('Prompt not found: nope');
  });
});
