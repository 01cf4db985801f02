import "dotenv/config";
import { buildApp } from "./app";
import { config } from "./config";
import { probePool } from "./infra/postgres/pool";

async function start() {
  const app = buildApp();

  if (config.REPO_PROVIDER === "postgres") {
    try {
      const { latencyMs } = await probePool(app.log);
      app.log.info({ latencyMs }, "Database connection successful");
    } catch (error) {
      app.log.error({ err: error }, "Database connection failed");
      process.exit(1);
    }
  }
  const port = config.PORT;
  const host = config.HOST;

  if (config.REPO_PROVIDER === "memory") {
    app.log.warn("Running with in-memory storage (non-durable)");
  }
  if (config.CLIENTS_API_URL) {
    app.log.info({ url: config.CLIENTS_API_URL }, "Resolving client names through the clients API");
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, "Shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  app
    .listen({ port, host })
    .catch((error: unknown) => {
      app.log.error(error);
      process.exit(1);
    });
}

start().catch((error: unknown) => {
  console.error("Failed to start server", error);
  process.exit(1);
});
