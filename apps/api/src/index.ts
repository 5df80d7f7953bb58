import "dotenv/config";
import { ConfigurationError, createLogger, loadConfig } from "@tollgate/shared";
import { buildApp } from "./app.js";
import { initTelemetry } from "./telemetry/init.js";

const bootLogger = createLogger("info", { component: "boot" });

async function main(): Promise<void> {
  const config = loadConfig();
  const shutdownTelemetry = await initTelemetry(config);

  let built: Awaited<ReturnType<typeof buildApp>>;
  try {
    built = await buildApp(config);
    await built.app.ready();
  } catch (error) {
    await shutdownTelemetry();
    throw error;
  }

  const { app, close, reloadRules } = built;
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    app.log.info({ signal }, "Graceful shutdown started");

    try {
      await close();
      await shutdownTelemetry();
      app.log.info("Graceful shutdown completed");
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Graceful shutdown failed");
      process.exit(1);
    }
  };

  const reload = async () => {
    try {
      const next = await reloadRules();
      app.log.info({ rules: next.size }, "Rules reloaded on SIGHUP");
    } catch (error) {
      app.log.error({ err: error }, "Rule reload on SIGHUP failed, keeping active rules");
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGHUP", () => void reload());

  try {
    await app.listen({
      host: config.HOST,
      port: config.PORT
    });
  } catch (error) {
    app.log.error({ err: error }, "Failed to start server");
    await close();
    await shutdownTelemetry();
    process.exit(1);
  }
}

try {
  await main();
} catch (error) {
  if (error instanceof ConfigurationError) {
    bootLogger.fatal({ err: error, issues: error.issues }, "Invalid configuration, refusing to start");
  } else {
    bootLogger.fatal({ err: error }, "Startup failed");
  }
  process.exit(1);
}
