import type { FastifyBaseLogger } from "fastify";

// Narrow slice of the pino logger Fastify hands out; context first, message second.
export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
