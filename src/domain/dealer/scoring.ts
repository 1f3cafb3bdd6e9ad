import {
  CheckRecord,
  CheckRecords,
  FieldValue,
  RiskAssessment,
  RiskLevel,
  RiskThresholds,
} from './types.js';
import { RISK_FACTORS, getLevelGuidance } from './messages.js';

const MAX_RISK_SCORE = 100;
const ACTIVE_REGISTRATION = 'ATIVA';
const SERIOUS_LEGAL_LEVELS: readonly string[] = ['ALTO', 'CRÍTICO'];

interface RiskSignal {
  fired: boolean;
  factor: string;
  weight: number;
}

// ============================================================================
// Field Readers (malformed input is "no signal", never an error)
// ============================================================================

function isFieldMap(value: FieldValue | undefined): value is { [key: string]: FieldValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an integer the way a model tends to write one: a number, or a string
 * such as "30" or " 45 ". Decimals and anything else yield null.
 */
export function parseIntegerField(value: FieldValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

// ============================================================================
// Individual Signals
// ============================================================================

/**
 * Signal 1: Registration status
 * Fires when the nested `company_data.situacao_cadastral` is present and not
 * "ATIVA". The flat `situacao_cadastral` field requested from the model is
 * deliberately not read here (see DESIGN.md, open questions).
 */
export function checkRegistrationSignal(record: CheckRecord | undefined, t: RiskThresholds): RiskSignal {
  const companyData = record?.company_data;
  const situation = isFieldMap(companyData) ? companyData.situacao_cadastral : undefined;
  const present = situation !== undefined && situation !== null;

  return {
    fired: present && situation !== ACTIVE_REGISTRATION,
    factor: RISK_FACTORS.irregular_registration,
    weight: t.weightRegistration,
  };
}

/**
 * Signal 2: Online reputation
 * Fires when `reputation_score` is an integer below the configured minimum.
 */
export function checkReputationSignal(record: CheckRecord | undefined, t: RiskThresholds): RiskSignal {
  const score = parseIntegerField(record?.reputation_score);

  return {
    fired: score !== null && score < t.reputationMinScore,
    factor: RISK_FACTORS.low_reputation,
    weight: t.weightReputation,
  };
}

/**
 * Signal 3: Legal issues
 * Fires when the legal check reports risk level ALTO or CRÍTICO.
 */
export function checkLegalSignal(record: CheckRecord | undefined, t: RiskThresholds): RiskSignal {
  const level = record?.risk_level;

  return {
    fired: typeof level === 'string' && SERIOUS_LEGAL_LEVELS.includes(level),
    factor: RISK_FACTORS.serious_legal_issues,
    weight: t.weightLegal,
  };
}

// ============================================================================
// Classification
// ============================================================================

export function getRiskLevel(score: number, t: RiskThresholds): RiskLevel {
  if (score >= t.levelCriticalMin) {
    return 'CRÍTICO';
  } else if (score >= t.levelHighMin) {
    return 'ALTO';
  } else if (score >= t.levelMediumMin) {
    return 'MÉDIO';
  } else {
    return 'BAIXO';
  }
}

// ============================================================================
// Consolidated Risk Analysis
// ============================================================================

/**
 * Combine the four check records into one assessment.
 *
 * Signals are evaluated in a fixed order (registration, reputation, legal),
 * which only affects the order of `risk_factors`. Scores add up and are
 * clamped to 100. The image check carries no signal.
 */
export function analyzeRisk(
  records: Partial<CheckRecords>,
  t: RiskThresholds,
): RiskAssessment {
  const signals = [
    checkRegistrationSignal(records.cnpj_status, t),
    checkReputationSignal(records.reputation, t),
    checkLegalSignal(records.legal_issues, t),
  ];

  const riskFactors: string[] = [];
  let score = 0;

  for (const signal of signals) {
    if (signal.fired) {
      riskFactors.push(signal.factor);
      score += signal.weight;
    }
  }

  const riskScore = Math.min(score, MAX_RISK_SCORE);
  const riskLevel = getRiskLevel(riskScore, t);
  const { recommendation, next_steps } = getLevelGuidance(riskLevel);

  return {
    risk_score: riskScore,
    risk_level: riskLevel,
    risk_factors: riskFactors,
    recommendation,
    next_steps,
  };
}
