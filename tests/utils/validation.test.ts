import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodError, zTaxId } from "../../src/utils/validation";

function issuesOf<I, O>(result: z.SafeParseReturnType<I, O>) {
  return result.success ? [] : result.error.issues;
}

function messageOf(schema: z.ZodTypeAny, input: unknown): string {
  const parsed = schema.safeParse(input);
  if (parsed.success) throw new Error("expected a parse failure");
  return formatZodError(parsed.error);
}

describe("zTaxId", () => {
  it("passes a valid CPF through unchanged", () => {
    const parsed = zTaxId().safeParse("123.456.789-09");
    expect(parsed.success).toBe(true);
    expect(parsed.success && parsed.data).toBe("123.456.789-09");
  });

  it("reports the error kind as a custom issue", () => {
    const issues = issuesOf(zTaxId().safeParse("000.000.000-00"));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      code: "custom",
      message: "todos os dígitos são iguais",
      params: { taxIdError: "ALL_DIGITS_EQUAL" }
    });
  });

  it("rejects a document of the other kind", () => {
    const issues = issuesOf(zTaxId({ kind: "CNPJ" }).safeParse("123.456.789-09"));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      code: "custom",
      message: "deve ser um CNPJ",
      params: { taxIdError: "KIND_MISMATCH", expected: "CNPJ", received: "CPF" }
    });
  });

  it("accepts a document of the requested kind", () => {
    expect(zTaxId({ kind: "CNPJ" }).safeParse("12.345.678/0001-95").success).toBe(true);
  });

  it("rejects non-strings", () => {
    const issues = issuesOf(zTaxId().safeParse(12345678909));
    expect(issues[0]?.code).toBe("invalid_type");
  });
});

describe("formatZodError", () => {
  it("prefixes the field display name", () => {
    expect(messageOf(z.object({ cnpj: zTaxId() }), { cnpj: "12.345.678/0001-99" })).toBe(
      "CNPJ: dígitos verificadores inválidos"
    );
  });

  it("reports missing fields", () => {
    expect(messageOf(z.object({ cpf: zTaxId() }), {})).toBe("CPF: obrigatório");
  });

  it("joins several issues", () => {
    const schema = z.object({ cpf: zTaxId(), cnpj: zTaxId() });
    expect(messageOf(schema, { cpf: "123", cnpj: "00000000000000" })).toBe(
      "CPF: deve ter 11 dígitos (CPF) ou 14 dígitos (CNPJ). CNPJ: todos os dígitos são iguais"
    );
  });

  it("describes array bounds", () => {
    const schema = z.object({ values: z.array(z.string()).min(1).max(2) });
    expect(messageOf(schema, { values: [] })).toBe("Valores: informe ao menos 1 valor(es)");
    expect(messageOf(schema, { values: ["a", "b", "c"] })).toBe("Valores: máximo 2 valores");
  });

  it("falls back to the raw field name", () => {
    expect(messageOf(z.object({ taxId: zTaxId() }), { taxId: "abc" })).toBe("taxId: nenhum dígito informado");
  });
});
