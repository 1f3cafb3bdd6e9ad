/**
 * CNPJ (Cadastro Nacional da Pessoa Jurídica) validation and formatting.
 *
 * A CNPJ is 14 digits: a 12-digit base followed by two mod-11 check digits.
 * Input may carry the usual `DD.DDD.DDD/DDDD-DD` punctuation or none at all.
 */

const CNPJ_LENGTH = 14;
const FIRST_CHECK_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const SECOND_CHECK_WEIGHTS = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

/**
 * Remove every non-digit character.
 */
export function stripCnpj(input: string): string {
  return input.replace(/\D/g, '');
}

function checkDigit(digits: number[], weights: number[]): number {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) {
    sum += digits[i] * weights[i];
  }
  const digit = 11 - (sum % 11);
  return digit >= 10 ? 0 : digit;
}

function toDigits(value: string): number[] {
  return value.split('').map((c) => c.charCodeAt(0) - 48);
}

/**
 * Compute both check digits for a 12-digit base.
 * The second digit is weighted over the base plus the first computed digit.
 *
 * @throws Error if `base` is not exactly 12 digits
 */
export function computeCheckDigits(base: string): [number, number] {
  if (!/^\d{12}$/.test(base)) {
    throw new Error('CNPJ base must be exactly 12 digits');
  }
  const digits = toDigits(base);
  const first = checkDigit(digits, FIRST_CHECK_WEIGHTS);
  const second = checkDigit([...digits, first], SECOND_CHECK_WEIGHTS);
  return [first, second];
}

/**
 * Validate a CNPJ using the official check-digit algorithm.
 * Never throws: anything that is not a well-formed CNPJ is simply invalid.
 */
export function isValidCnpj(input: string): boolean {
  const cnpj = stripCnpj(input);

  if (cnpj.length !== CNPJ_LENGTH) return false;

  // 00000000000000, 11111111111111, ... pass the checksum but are never issued
  if (/^(\d)\1+$/.test(cnpj)) return false;

  const [first, second] = computeCheckDigits(cnpj.slice(0, 12));
  return cnpj === `${cnpj.slice(0, 12)}${first}${second}`;
}

/**
 * Format as `DD.DDD.DDD/DDDD-DD`. Input that does not reduce to exactly
 * 14 digits is returned as its bare digits, without partial formatting.
 */
export function formatCnpj(input: string): string {
  const cnpj = stripCnpj(input);
  if (cnpj.length !== CNPJ_LENGTH) return cnpj;
  return `${cnpj.slice(0, 2)}.${cnpj.slice(2, 5)}.${cnpj.slice(5, 8)}/${cnpj.slice(8, 12)}-${cnpj.slice(12)}`;
}
