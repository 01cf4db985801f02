import Fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { SwaggerOptions } from "@fastify/swagger";
import type { FastifySwaggerUiOptions } from "@fastify/swagger-ui";
import { ZodError } from "zod";
import { AppError } from "./common/errors";
import { ContainerOptions, createContainer } from "./di";
import { registerAccountsRoutes } from "./modules/accounts/routes";
import { registerAccountTypesRoutes } from "./modules/account-types/routes";
import { registerClientsRoutes } from "./modules/clients/routes";
import { registerMovementsRoutes } from "./modules/movements/routes";
import { registerPersonsRoutes } from "./modules/persons/routes";
import { openapiDocument } from "./common/openapi";
import { config } from "./config";
import { closePool, probePool } from "./infra/postgres/pool";

// Fastify's own 4xx errors: schema validation, malformed JSON, body limit, rate limit
function isFastifyClientError(
  error: unknown
): error is Error & { statusCode: number; code?: string } {
  if (!(error instanceof Error) || !("statusCode" in error)) {
    return false;
  }
  const { statusCode } = error;
  return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500;
}

export function buildApp(options: ContainerOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: config.NODE_ENV === "test" ? false : { level: config.LOG_LEVEL },
    bodyLimit: config.BODY_LIMIT_BYTES,
    maxParamLength: config.MAX_PARAM_LENGTH,
    connectionTimeout: config.REQUEST_TIMEOUT_MS,
    requestTimeout: config.REQUEST_TIMEOUT_MS
  });
  const container = createContainer({ logger: app.log, ...options });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true
    }
  });

  const swaggerOptions: SwaggerOptions = {
    mode: "static",
    specification: {
      document: openapiDocument
    }
  };

  const swaggerUiOptions: FastifySwaggerUiOptions = {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      url: "/docs/json"
    }
  };

  app.register(swagger, swaggerOptions);
  app.register(swaggerUi, swaggerUiOptions);

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/health/db", async () => {
    if (config.REPO_PROVIDER !== "postgres") {
      return { status: "skipped" };
    }
    try {
      const { latencyMs, ...poolInfo } = await probePool(app.log);

      const utilizationPct = poolInfo.totalCount === 0
        ? 0
        : ((poolInfo.totalCount - poolInfo.idleCount) / poolInfo.totalCount) * 100;
      const status = utilizationPct > 90 ? "degraded" : "ok";

      return {
        status,
        latency: latencyMs,
        pool: poolInfo,
        utilization: `${utilizationPct.toFixed(1)}%`
      };
    } catch (error) {
      // Details stay in the log
      app.log.error({ err: error }, "Database health check failed");
      return { status: "down" };
    }
  });

  registerPersonsRoutes(app, container.personsController);
  registerClientsRoutes(app, container.clientsController);
  registerAccountsRoutes(app, container.accountsController);
  registerAccountTypesRoutes(app, container.accountTypesService);
  registerMovementsRoutes(app, container.movementsController);

  app.setErrorHandler((error: unknown, request, reply) => {
    if (error instanceof AppError) {
      return reply
        .status(error.status)
        .send({ error: error.code, message: error.message });
    }

    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => ({
        path: issue.path.join("."),
        code: issue.code,
        message: issue.message
      }));

      const amountIssue = error.issues.find(
        (issue) => issue.path.includes("valueCents") && issue.code === "custom"
      );

      if (amountIssue) {
        return reply.status(400).send({
          error: "INVALID_AMOUNT",
          message: amountIssue.message,
          details: issues
        });
      }

      return reply.status(400).send({
        error: "INVALID_REQUEST",
        message: "Validation failed",
        details: issues
      });
    }

    if (isFastifyClientError(error)) {
      return reply.status(error.statusCode).send({
        error: error.statusCode === 400 ? "INVALID_REQUEST" : error.code ?? "CLIENT_ERROR",
        message: error.message
      });
    }

    const err = error instanceof Error ? error : new Error("Unknown error");
    request.log.error({ err }, "Unhandled error");
    return reply.status(500).send({
      error: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error"
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`
    });
  });

  app.addHook("onClose", async () => {
    container.mutexMap.destroy();

    if (config.REPO_PROVIDER === "postgres") {
      await closePool();
    }
  });

  return app;
}
