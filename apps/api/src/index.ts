import dotenv from "dotenv";
import path from "path";
import { shutdownTracing, startTracing } from "./observability/tracing";

// Local development reads the repository .env; deployed environments inject variables directly.
dotenv.config({ path: path.resolve(__dirname, "..", "..", "..", ".env") });

async function main(): Promise<void> {
  // Tracing patches fastify and pg, so it starts before the app module loads.
  startTracing();
  const { buildApp } = await import("./app");
  const { pool } = await import("./db");
  const app = await buildApp(true);
  const port = Number(process.env.PORT || process.env.API_PORT || 3001);
  const host = process.env.API_HOST || "0.0.0.0";

  const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS) || 15_000;
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    app.log.info(`Received ${signal}, shutting down (timeout ${SHUTDOWN_TIMEOUT_MS}ms)`);

    const forceExit = setTimeout(() => {
      app.log.error("Graceful shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await app.close();
      await pool.end();
      await shutdownTracing();
      clearTimeout(forceExit);
      app.log.info("Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      clearTimeout(forceExit);
      app.log.error(err, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  try {
    await app.listen({ port, host });
  } catch (err) {
    app.log.error(err);
    await pool.end();
    await shutdownTracing();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal startup error", err);
  process.exit(1);
});
