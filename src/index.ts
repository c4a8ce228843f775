import pino from "pino";

import { buildApp } from "./app";
import { loadConfig, loadEnvFile } from "./config/app_config";
import { createAppContext } from "./context";
import { createLogger } from "./logger";

async function main() {
  loadEnvFile();
  const config = loadConfig();
  const log = createLogger(config);
  const app = buildApp(createAppContext(config, log));

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, "server.shutdown");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, "server.shutdown_failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.port, host: config.host });
  log.info(
    { port: config.port, apiPrefix: config.apiPrefix, provider: config.llm.provider },
    "server.started"
  );
}

main().catch((err: unknown) => {
  // config may be what failed, so no configured logger yet
  pino({ timestamp: pino.stdTimeFunctions.isoTime }).fatal({ err }, "server.start_failed");
  process.exit(1);
});
