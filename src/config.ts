import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  // Render/Heroku etc. injetam PORT; nesse caso é preciso escutar em 0.0.0.0
  HOST: z.string().default(process.env.PORT ? "0.0.0.0" : "127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  RATE_LIMIT_MAX: z.coerce.number().int().min(1).max(100_000).default(200),
  RATE_LIMIT_WINDOW: z.coerce.number().int().min(1).max(3600).default(60),
  BATCH_MAX_VALUES: z.coerce.number().int().min(1).max(10_000).default(100)
});

function loadEnv() {
  const result = envSchema.safeParse(process.env);
  if (result.success) return result.data;

  const invalid = result.error.issues.map((i) => i.path.join(".")).filter(Boolean);
  // eslint-disable-next-line no-console
  console.error(
    "\n❌ Variáveis de ambiente inválidas.\n\n" +
      "Confira no .env (ou no ambiente) os valores de:\n   " +
      invalid.join(", ") +
      "\n\n" +
      "Todas são opcionais; remova a variável para usar o padrão.\n"
  );
  throw result.error;
}

export const env = loadEnv();

export type Env = typeof env;
