/**
 * Validação de CPF (11 dígitos) e CNPJ (14 dígitos) por dígitos verificadores módulo 11.
 * Aceita a entrada formatada ou não ("123.456.789-09", "12.345.678/0001-95").
 */

export type TaxIdKind = "CPF" | "CNPJ";

export type TaxIdError = "INVALID_INPUT" | "INVALID_LENGTH" | "ALL_DIGITS_EQUAL" | "INVALID_CHECKSUM";

export type TaxIdResult = { ok: true; kind: TaxIdKind } | { ok: false; error: TaxIdError };

export const TAX_ID_STANDARD_LENGTH: Readonly<Record<TaxIdKind, number>> = {
  CPF: 11,
  CNPJ: 14
};

// length - 1 pesos por tipo; o primeiro DV usa a tabela sem o primeiro peso
export const TAX_ID_WEIGHTS: Readonly<Record<TaxIdKind, readonly number[]>> = {
  CPF: [11, 10, 9, 8, 7, 6, 5, 4, 3, 2],
  CNPJ: [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]
};

const VALIDATION_MODULUS = 11;

export const TAX_ID_ERROR_MESSAGES: Readonly<Record<TaxIdError, string>> = {
  INVALID_INPUT: "nenhum dígito informado",
  INVALID_LENGTH: "deve ter 11 dígitos (CPF) ou 14 dígitos (CNPJ)",
  ALL_DIGITS_EQUAL: "todos os dígitos são iguais",
  INVALID_CHECKSUM: "dígitos verificadores inválidos"
};

export function sanitizeTaxId(input: string): string {
  return (input ?? "").replace(/[^0-9]/g, "");
}

export function classifyTaxId(digits: string): TaxIdKind | null {
  if (digits.length === TAX_ID_STANDARD_LENGTH.CPF) return "CPF";
  if (digits.length === TAX_ID_STANDARD_LENGTH.CNPJ) return "CNPJ";
  return null;
}

export function hasAllEqualDigits(digits: string): boolean {
  if (digits.length === 0) return false;
  const first = digits[0];
  for (const c of digits) {
    if (c !== first) return false;
  }
  return true;
}

export function calculateCheckDigit(digits: string, weights: readonly number[]): number {
  if (digits.length !== weights.length) {
    throw new Error(`calculateCheckDigit: ${digits.length} dígitos para ${weights.length} pesos`);
  }
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    sum += Number(digits[i]) * weights[i];
  }
  const remainder = sum % VALIDATION_MODULUS;
  return remainder < 2 ? 0 : VALIDATION_MODULUS - remainder;
}

/**
 * Recalcula os dois DVs e compara com os dois últimos dígitos informados.
 * O segundo DV é calculado sobre o dígito informado na penúltima posição, não sobre o recalculado.
 */
export function hasValidCheckDigits(digits: string, kind: TaxIdKind): boolean {
  const length = TAX_ID_STANDARD_LENGTH[kind];
  const weights = TAX_ID_WEIGHTS[kind];
  const first = calculateCheckDigit(digits.slice(0, length - 2), weights.slice(1));
  const second = calculateCheckDigit(digits.slice(0, length - 1), weights);
  return digits.slice(length - 2) === `${first}${second}`;
}

export function validateTaxId(input: string): TaxIdResult {
  const digits = sanitizeTaxId(input);
  if (digits.length === 0) return { ok: false, error: "INVALID_INPUT" };

  const kind = classifyTaxId(digits);
  if (!kind) return { ok: false, error: "INVALID_LENGTH" };

  if (hasAllEqualDigits(digits)) return { ok: false, error: "ALL_DIGITS_EQUAL" };
  if (!hasValidCheckDigits(digits, kind)) return { ok: false, error: "INVALID_CHECKSUM" };

  return { ok: true, kind };
}

export function isValidTaxId(input: string): boolean {
  return validateTaxId(input).ok;
}
