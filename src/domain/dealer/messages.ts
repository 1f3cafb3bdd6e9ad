import { RiskLevel } from "./types.js";

// ============================================================================
// Risk Level Configuration
// ============================================================================

export const RISK_LEVEL_CONFIG = {
  CRÍTICO: {
    recommendation:
      "🚫 EVITAR - Não recomendamos fazer negócios com este lojista",
    next_steps: [
      "Evitar qualquer negociação",
      "Procurar outros lojistas",
      "Se já houve negociação, consultar advogado",
    ],
  },
  ALTO: {
    recommendation:
      "🚨 CUIDADO - Investigar mais profundamente antes de negociar",
    next_steps: [
      "Solicitar documentação adicional",
      "Verificar credenciamento em órgãos do setor",
      "Visitar fisicamente o estabelecimento",
      "Consultar outros clientes recentes",
    ],
  },
  MÉDIO: {
    recommendation: "⚠️ CAUTELA - Prosseguir com verificações adicionais",
    next_steps: [
      "Verificar documentos do veículo cuidadosamente",
      "Pedir referências de outros clientes",
      "Fazer vistoria técnica independente",
      "Negociar garantias adicionais",
    ],
  },
  BAIXO: {
    recommendation: "✅ APARENTEMENTE SEGURO - Prosseguir com cautela normal",
    next_steps: [
      "Verificar documentação padrão",
      "Fazer test drive completo",
      "Confirmar procedência do veículo",
      "Manter cautela normal na compra",
    ],
  },
} as const satisfies Record<
  RiskLevel,
  { recommendation: string; next_steps: readonly string[] }
>;

// ============================================================================
// Risk Factor Messages
// ============================================================================

export const RISK_FACTORS = {
  irregular_registration: "Situação cadastral irregular",
  low_reputation: "Baixa reputação online",
  serious_legal_issues: "Problemas legais graves",
} as const;

// ============================================================================
// Tool Messages
// ============================================================================

export const DISCLAIMER =
  "Informações de caráter exclusivamente informativo, obtidas por busca web via modelo de linguagem. Confirme os dados em fontes oficiais antes de qualquer decisão.";

export function invalidCnpjMessage(cnpj: string): string {
  return `CNPJ inválido: ${cnpj || "(vazio)"}`;
}

/**
 * Recommendation and next steps for a tier. `next_steps` is a fresh array so
 * callers can't mutate the shared table.
 */
export function getLevelGuidance(level: RiskLevel): {
  recommendation: string;
  next_steps: string[];
} {
  const config = RISK_LEVEL_CONFIG[level];
  return {
    recommendation: config.recommendation,
    next_steps: [...config.next_steps],
  };
}
