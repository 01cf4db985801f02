import { z } from "zod";

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default("0.0.0.0"),
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    REPO_PROVIDER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().optional(),
    DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().nonnegative().default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(25),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1_048_576),
    MAX_PARAM_LENGTH: z.coerce.number().int().positive().default(100),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    CLIENTS_API_URL: z.string().url().optional(),
    STATEMENT_CONCURRENCY: z.coerce.number().int().positive().max(64).default(4)
  })
  .superRefine((value, ctx) => {
    if (value.REPO_PROVIDER === "postgres" && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "DATABASE_URL is required when REPO_PROVIDER=postgres",
        path: ["DATABASE_URL"]
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
