import dotenv from 'dotenv';
import { RiskThresholds } from '../domain/dealer/types.js';
import { logWarn } from './logging.js';

// Load environment variables
dotenv.config();

export interface OpenAIConfig {
  apiBaseUrl: string;
  apiKey: string | undefined;
  searchModel: string;
  fallbackModel: string;
  maxTokens: number;
  timeoutMs: number;
  rateLimitMs: number;
}

export interface ChecksConfig {
  taskTimeoutMs: number;
}

export interface AppConfig {
  openai: OpenAIConfig;
  checks: ChecksConfig;
  thresholds: RiskThresholds;
}

// Security: only the official OpenAI endpoint receives the API key
const ALLOWED_API_BASE_URL = 'https://api.openai.com/v1';

function envNum(key: string, fallback: number, validate: (n: number) => boolean): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === '') return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envString(key: string, fallback: string): string {
  const val = process.env[key]?.trim();
  return val ? val : fallback;
}

/**
 * Loads OpenAI client configuration from environment variables.
 * The API key is optional here: CNPJ validation works without it, and
 * whoever builds a query client is responsible for requiring it.
 */
export function loadOpenAIConfig(): OpenAIConfig {
  const apiKey = process.env.OPENAI_API_KEY?.trim();
  return {
    apiBaseUrl: ALLOWED_API_BASE_URL,
    apiKey: apiKey ? apiKey : undefined,
    searchModel: envString('OPENAI_SEARCH_MODEL', 'gpt-4o-search-preview'),
    fallbackModel: envString('OPENAI_FALLBACK_MODEL', 'gpt-4o'),
    maxTokens: Math.max(256, envInt('OPENAI_MAX_TOKENS', 4000)),
    timeoutMs: Math.max(1000, envInt('OPENAI_TIMEOUT_MS', 60000)),
    rateLimitMs: Math.max(0, envInt('OPENAI_RATE_LIMIT_MS', 200)),
  };
}

export function loadChecksConfig(): ChecksConfig {
  return {
    taskTimeoutMs: Math.max(1000, envInt('CHECK_TIMEOUT_MS', 130000)),
  };
}

/**
 * Loads risk thresholds from environment variables.
 * Defaults reproduce the fixed scoring table (50/30/40, cutoffs 80/50/25).
 */
export function loadRiskThresholds(): RiskThresholds {
  return {
    weightRegistration: envInt('RISK_WEIGHT_REGISTRATION', 50),
    weightReputation: envInt('RISK_WEIGHT_REPUTATION', 30),
    weightLegal: envInt('RISK_WEIGHT_LEGAL', 40),

    reputationMinScore: envInt('RISK_REPUTATION_MIN_SCORE', 50),

    levelCriticalMin: envInt('RISK_LEVEL_CRITICAL_MIN', 80),
    levelHighMin: envInt('RISK_LEVEL_HIGH_MIN', 50),
    levelMediumMin: envInt('RISK_LEVEL_MEDIUM_MIN', 25),
  };
}

/**
 * Validate threshold invariants at startup.
 * Throws on misconfiguration rather than silently running with broken logic.
 */
export function validateRiskThresholds(t: RiskThresholds): void {
  const errors: string[] = [];

  const weights = [t.weightRegistration, t.weightReputation, t.weightLegal];
  if (weights.some((w) => w < 0)) {
    errors.push('All weights must be non-negative');
  }

  if (t.reputationMinScore < 0 || t.reputationMinScore > 100) {
    errors.push('reputationMinScore must be between 0 and 100');
  }

  if (t.levelMediumMin > t.levelHighMin) errors.push('levelMediumMin must be <= levelHighMin');
  if (t.levelHighMin > t.levelCriticalMin) errors.push('levelHighMin must be <= levelCriticalMin');
  if (t.levelCriticalMin < 0 || t.levelCriticalMin > 100) errors.push('levelCriticalMin must be between 0 and 100');
  if (t.levelHighMin < 0 || t.levelHighMin > 100) errors.push('levelHighMin must be between 0 and 100');
  if (t.levelMediumMin < 0 || t.levelMediumMin > 100) errors.push('levelMediumMin must be between 0 and 100');

  if (errors.length > 0) {
    throw new Error(`Invalid risk thresholds:\n  - ${errors.join('\n  - ')}`);
  }
}

/**
 * Loads full application config.
 */
export function loadConfig(): AppConfig {
  const thresholds = loadRiskThresholds();
  validateRiskThresholds(thresholds);
  const openai = loadOpenAIConfig();
  const checks = loadChecksConfig();

  // A check may spend one request on each model
  if (checks.taskTimeoutMs < 2 * openai.timeoutMs) {
    logWarn(
      `CHECK_TIMEOUT_MS (${checks.taskTimeoutMs}) is shorter than two model requests ` +
        `(2 x OPENAI_TIMEOUT_MS = ${2 * openai.timeoutMs}); the fallback model may be cut off`,
    );
  }

  return { openai, checks, thresholds };
}
