import { logger } from "./logging.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { createDefaultService } from "./analysis/defaults.js";
import { startRestServer } from "./rest/server.js";

async function main() {
  const { errors, warnings } = validateConfig(config);
  for (const w of warnings) logger.warn(`[Config] ${w}`);
  if (errors.length > 0) {
    for (const e of errors) logger.error(`[Config] ${e}`);
    process.exitCode = 1;
    return;
  }

  const service = createDefaultService();
  logger.info({ engines: service.registry.names() }, "Engine consensus starting");
  const server = await startRestServer(service, config.rest.port);

  // Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down...");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });
  process.on("SIGTERM", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });

  process.on("unhandledRejection", (reason) => {
    logger.error({ err: reason }, "Unhandled rejection");
  });
}

main().catch((e) => {
  logger.fatal({ err: e }, "Fatal startup error");
  process.exit(1);
});
