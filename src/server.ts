import Fastify, { type FastifyError, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import sensible from "@fastify/sensible";
import { env } from "./config";
import { taxIdRoutes } from "./routes/taxIds";
import { errorPayload, statusFromError } from "./utils/response";

export function buildServer() {
  const app = Fastify({
    trustProxy: env.NODE_ENV === "production",
    logger: {
      level: env.LOG_LEVEL,
      // Corpo da requisição não é serializado; as rotas registram só kind/error, nunca o documento
      redact: {
        paths: ["req.headers.authorization", "req.headers.cookie"],
        remove: true
      }
    }
  });

  app.register(sensible);

  // Troca o parser padrão de application/json para aceitar body vazio e responder 400 em JSON malformado
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser<string>(
    "application/json",
    { parseAs: "string" },
    async (_req: FastifyRequest, body: string) => {
      if (typeof body !== "string" || body.trim() === "") return {};
      try {
        return JSON.parse(body);
      } catch {
        throw app.httpErrors.badRequest("JSON inválido");
      }
    }
  );

  app.register(helmet, {
    global: true,
    contentSecurityPolicy: false // API only
  });

  app.register(cors, {
    origin: true,
    credentials: false,
    methods: "GET,HEAD,POST,OPTIONS",
    allowedHeaders: ["Content-Type"],
    preflight: true,
    optionsSuccessStatus: 204
  });

  app.register(rateLimit, {
    global: true,
    max: env.RATE_LIMIT_MAX,
    timeWindow: `${env.RATE_LIMIT_WINDOW} second`
  });

  // Healthcheck
  app.get("/health", async () => ({ ok: true }));

  app.register(taxIdRoutes, { prefix: "/tax-ids" });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    req.log.error({ err }, "request_error");
    if (reply.sent) return;
    const status = statusFromError(err);
    const message = status >= 500 ? "Erro interno. Tente novamente." : err.message || "Erro";
    reply.status(status).send(errorPayload(message));
  });

  app.setNotFoundHandler((req, reply) => {
    reply.status(404).send(errorPayload(`Rota não encontrada: ${req.method} ${req.url}`));
  });

  return app;
}
