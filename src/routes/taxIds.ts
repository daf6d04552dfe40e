import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { env } from "../config";
import { TAX_ID_ERROR_MESSAGES, validateTaxId, type TaxIdError, type TaxIdKind, type TaxIdResult } from "../utils/taxId";
import { formatZodError, zTaxId } from "../utils/validation";
import { errorPayload, successPayload } from "../utils/response";

const validateSchema = z.object({
  value: z.string()
});

const batchSchema = z.object({
  values: z.array(z.string()).min(1).max(env.BATCH_MAX_VALUES)
});

const cpfSchema = z.object({
  cpf: zTaxId({ kind: "CPF" })
});

const cnpjSchema = z.object({
  cnpj: zTaxId({ kind: "CNPJ" })
});

export type TaxIdOutcome = { valid: true; kind: TaxIdKind } | { valid: false; error: TaxIdError; reason: string };

function toOutcome(result: TaxIdResult): TaxIdOutcome {
  if (result.ok) return { valid: true, kind: result.kind };
  return { valid: false, error: result.error, reason: TAX_ID_ERROR_MESSAGES[result.error] };
}

export const taxIdRoutes: FastifyPluginAsync = async (app) => {
  app.post("/validate", async (req, reply) => {
    const parsed = validateSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send(errorPayload("Erro ao validar documento: " + formatZodError(parsed.error)));
    }
    const outcome = toOutcome(validateTaxId(parsed.data.value));
    req.log.info(outcome.valid ? { kind: outcome.kind } : { error: outcome.error }, "tax_id_validated");
    return reply.send(successPayload(outcome));
  });

  app.post("/validate/batch", async (req, reply) => {
    const parsed = batchSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send(errorPayload("Erro ao validar documentos: " + formatZodError(parsed.error)));
    }
    const results = parsed.data.values.map((value, index) => ({ index, ...toOutcome(validateTaxId(value)) }));
    req.log.info(
      { total: results.length, invalid: results.filter((r) => !r.valid).length },
      "tax_id_batch_validated"
    );
    return reply.send(successPayload({ results }));
  });

  app.post("/cpf", async (req, reply) => {
    const parsed = cpfSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send(errorPayload("Erro ao validar CPF: " + formatZodError(parsed.error)));
    }
    return reply.send(successPayload({ kind: "CPF" }));
  });

  app.post("/cnpj", async (req, reply) => {
    const parsed = cnpjSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send(errorPayload("Erro ao validar CNPJ: " + formatZodError(parsed.error)));
    }
    return reply.send(successPayload({ kind: "CNPJ" }));
  });
};
