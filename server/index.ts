import { buildApp } from "./app";
import { env } from "./config/env";

async function bootstrap() {
  const app = await buildApp();

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info(`[SHUTDOWN] ${signal} received; closing server`);
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error(err, "[SHUTDOWN] Failed to close cleanly");
      process.exit(1);
    }
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));

  try {
    const port = Number(env.PORT);
    await app.listen({ port, host: env.HOST });
    app.log.info(`[STARTUP] Translation QA server started on port ${port}`);
  } catch (err) {
    app.log.error(err, "[FATAL] Failed to start server");
    process.exit(1);
  }
}

bootstrap().catch((err) => {
  console.error("[FATAL] Failed to build server", err);
  process.exit(1);
});
