import { z } from "zod";
import { TAX_ID_ERROR_MESSAGES, validateTaxId, type TaxIdKind } from "./taxId";

const CAMPO_PT: Record<string, string> = {
  cpf: "CPF",
  cnpj: "CNPJ",
  value: "Valor",
  values: "Valores"
};

export type TaxIdSchemaOptions = {
  kind?: TaxIdKind;
};

/**
 * Schema zod para CPF/CNPJ. Em caso de falha gera uma issue `custom` com o motivo
 * em `message` e o código do erro em `params.taxIdError`. O valor passa sem alteração.
 */
export function zTaxId(options: TaxIdSchemaOptions = {}) {
  return z.string().superRefine((value, ctx) => {
    const result = validateTaxId(value);
    if (!result.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: TAX_ID_ERROR_MESSAGES[result.error],
        params: { taxIdError: result.error }
      });
      return;
    }
    if (options.kind && result.kind !== options.kind) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `deve ser um ${options.kind}`,
        params: { taxIdError: "KIND_MISMATCH", expected: options.kind, received: result.kind }
      });
    }
  });
}

/**
 * Converte erros do Zod em uma única mensagem em português para o cliente da API.
 */
export function formatZodError(error: z.ZodError): string {
  const mensagens = error.issues.map((issue) => {
    const campo = issue.path[0] !== undefined ? CAMPO_PT[String(issue.path[0])] || String(issue.path[0]) : "";
    const pref = campo ? `${campo}: ` : "";

    switch (issue.code) {
      case "too_small":
        if (issue.type === "string") return `${pref}mínimo ${issue.minimum} caracteres`;
        if (issue.type === "array") return `${pref}informe ao menos ${issue.minimum} valor(es)`;
        return `${pref}muito curto`;
      case "too_big":
        if (issue.type === "string") return `${pref}máximo ${issue.maximum} caracteres`;
        if (issue.type === "array") return `${pref}máximo ${issue.maximum} valores`;
        return `${pref}muito longo`;
      case "invalid_type":
        if (issue.received === "undefined") return `${pref}obrigatório`;
        return `${pref}tipo inválido`;
      default:
        return pref + (issue.message || "inválido");
    }
  });
  return mensagens.join(". ") || "Dados inválidos";
}
