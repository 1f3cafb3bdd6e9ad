import { z } from 'zod';
import { IMAGE_SLOTS } from './prompts.js';
import { CheckKind, CheckRecord, FieldMap, FieldValue } from './types.js';

// ============================================================================
// Field Schemas
// ============================================================================

export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ]),
);

const fieldMapSchema = z.record(fieldValueSchema);

type FieldSchema = z.ZodType<FieldValue, z.ZodTypeDef, unknown>;

// Models routinely answer numbers for fields documented as strings and vice versa
const text: FieldSchema = z.union([z.string(), z.number()]);
const textList: FieldSchema = z.array(z.union([z.string(), z.number()]).transform((v) => String(v)));
const flag: FieldSchema = z.boolean();
const nested: FieldSchema = fieldMapSchema;

interface RecordSchema {
  fields: Record<string, FieldSchema>;
  lists: readonly string[];
}

/**
 * Known fields per check kind. Anything else the model returns, or a known
 * field with the wrong shape, is kept under `extra_fields` instead of
 * rejecting the record.
 */
export const RECORD_SCHEMAS: Record<CheckKind, RecordSchema> = {
  cnpj_status: {
    fields: {
      cnpj: text,
      cnpj_valid: flag,
      razao_social: text,
      nome_fantasia: text,
      situacao_cadastral: text,
      data_abertura: text,
      atividade_principal: text,
      capital_social: text,
      endereco: text,
      socios: textList,
      porte_empresa: text,
      anos_funcionamento: text,
      adequacao_cnae: text,
      red_flags: textList,
      status_summary: text,
      // Not part of the requested schema; read by the registration risk signal
      company_data: nested,
    },
    lists: ['socios', 'red_flags'],
  },
  reputation: {
    fields: {
      cnpj: text,
      company_name: text,
      reputation_summary: text,
      reclame_aqui_score: text,
      google_rating: text,
      complaint_count: text,
      main_issues: textList,
      business_size: text,
      red_flags: textList,
      reputation_score: text,
      sources_checked: textList,
    },
    lists: ['main_issues', 'red_flags', 'sources_checked'],
  },
  legal_issues: {
    fields: {
      cnpj: text,
      company_name: text,
      legal_summary: text,
      criminal_cases: textList,
      civil_cases: textList,
      investigations: textList,
      sanctions: textList,
      fraud_indicators: textList,
      risk_level: text,
      sources_found: textList,
    },
    lists: ['criminal_cases', 'civil_cases', 'investigations', 'sanctions', 'fraud_indicators', 'sources_found'],
  },
  business_images: {
    fields: {
      cnpj: text,
      company_name: text,
      business_images: nested,
      image_analysis: nested,
      social_media_presence: nested,
    },
    lists: [],
  },
};

// ============================================================================
// JSON Extraction
// ============================================================================

function parseJsonObject(candidate: string): FieldMap | null {
  if (!candidate) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const result = fieldMapSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Contents of the first ```json fenced block, or null when there is none.
 * An unterminated fence runs to the end of the text.
 */
export function extractFencedJson(responseText: string): string | null {
  const match = /```json\s*([\s\S]*?)(?:```|$)/i.exec(responseText);
  return match ? match[1].trim() : null;
}

/**
 * Two-stage extraction: the whole text as JSON first, then the fenced block.
 * Returns null when neither yields a JSON object.
 */
export function extractJsonObject(responseText: string): FieldMap | null {
  const whole = parseJsonObject(responseText.trim());
  if (whole) return whole;

  const fenced = extractFencedJson(responseText);
  return fenced === null ? null : parseJsonObject(fenced);
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Turn a parsed model answer into a `success` record:
 * - `status` forced to "success", `query_date` filled when missing;
 * - null or absent list fields become [], other nulls become "N/A";
 * - unknown or mistyped fields are moved to `extra_fields`;
 * - registration-status records are stamped `cnpj_valid: true`
 *   (validation gated the query).
 */
export function normalizeRecord(
  kind: CheckKind,
  parsed: FieldMap,
  now: Date = new Date(),
): CheckRecord {
  const { fields, lists } = RECORD_SCHEMAS[kind];
  const known: FieldMap = {};
  const extra: FieldMap = {};

  for (const [key, value] of Object.entries(parsed)) {
    if (key === 'status' || key === 'query_date') continue;

    const isKnown = Object.prototype.hasOwnProperty.call(fields, key);

    if (value === null) {
      const placeholder = lists.includes(key) ? [] : 'N/A';
      if (isKnown) known[key] = placeholder;
      else extra[key] = placeholder;
      continue;
    }

    if (!isKnown) {
      extra[key] = value;
      continue;
    }

    const result = fields[key].safeParse(value);
    if (result.success) {
      known[key] = result.data;
    } else {
      extra[key] = value;
    }
  }

  for (const key of lists) {
    if (!(key in known)) known[key] = [];
  }

  if (kind === 'cnpj_status') {
    known.cnpj_valid = true;
  }

  const queryDate = parsed.query_date;
  const record: CheckRecord = {
    ...known,
    status: 'success',
    query_date: typeof queryDate === 'string' && queryDate ? queryDate : now.toISOString(),
  };
  if (Object.keys(extra).length > 0) {
    record.extra_fields = extra;
  }
  return record;
}

// ============================================================================
// Degraded Records
// ============================================================================

export const RAW_RESPONSE_PREVIEW_LENGTH = 500;

export function errorRecord(
  kind: CheckKind,
  formattedCnpj: string,
  error: string,
  now: Date = new Date(),
): CheckRecord {
  return {
    cnpj: formattedCnpj,
    ...(kind === 'cnpj_status' ? { cnpj_valid: true } : {}),
    error,
    status: 'error',
    query_date: now.toISOString(),
  };
}

/**
 * The model answered, but not with a JSON object. The text is still useful to
 * a human reader, so it is kept verbatim.
 */
export function textRecord(
  kind: CheckKind,
  formattedCnpj: string,
  companyName: string | undefined,
  rawResponse: string,
  now: Date = new Date(),
): CheckRecord {
  if (kind === 'cnpj_status') {
    return {
      cnpj: formattedCnpj,
      cnpj_valid: true,
      raw_response: rawResponse,
      status: 'success_text',
      query_date: now.toISOString(),
    };
  }
  return {
    cnpj: formattedCnpj,
    company_name: companyName ?? null,
    raw_response: rawResponse,
    status: 'success_text',
    query_date: now.toISOString(),
  };
}

function truncate(value: string, limit: number): string {
  return value.length > limit ? `${value.slice(0, limit)}...` : value;
}

/**
 * Placeholder for an image search that produced no usable structure:
 * every slot present, every value "N/A" or empty.
 */
export function partialImagesRecord(
  formattedCnpj: string,
  companyName: string | undefined,
  rawResponse: string,
  now: Date = new Date(),
): CheckRecord {
  const images: FieldMap = {};
  for (const slot of IMAGE_SLOTS) {
    images[slot] = { url: 'N/A', description: 'N/A', source: 'N/A', verified: false };
  }

  return {
    status: 'partial_success',
    cnpj: formattedCnpj,
    company_name: companyName ?? 'N/A',
    business_images: images,
    image_analysis: {
      total_images_found: 0,
      verified_images: 0,
      legitimacy_indicators: [],
      red_flags: ['Não foi possível encontrar imagens'],
      visual_consistency: 'N/A',
      business_appearance: 'N/A',
    },
    social_media_presence: {
      instagram: { url: 'N/A', followers: 'N/A', posts: 'N/A', recent_activity: 'N/A' },
      facebook: { url: 'N/A', likes: 'N/A', reviews: 'N/A', recent_activity: 'N/A' },
    },
    raw_response: truncate(rawResponse, RAW_RESPONSE_PREVIEW_LENGTH),
    query_date: now.toISOString(),
  };
}

/**
 * Map a raw model answer for `kind` to its CheckRecord, degrading instead of
 * failing when the answer has no JSON object in it.
 */
export function toCheckRecord(
  kind: CheckKind,
  responseText: string,
  formattedCnpj: string,
  companyName: string | undefined,
  now: Date = new Date(),
): CheckRecord {
  const parsed = extractJsonObject(responseText);
  if (parsed) return normalizeRecord(kind, parsed, now);

  if (kind === 'business_images') {
    return partialImagesRecord(formattedCnpj, companyName, responseText, now);
  }
  return textRecord(kind, formattedCnpj, companyName, responseText, now);
}
