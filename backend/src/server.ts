import type { Server } from "node:http";
import { createApp } from "./app.js";
import { describeError, loadConfig, startTokenKeeper } from "./auth/index.js";
import { createLogger } from "./logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  const keeper = await startTokenKeeper(config);

  let server: Server | undefined;
  if (config.port > 0) {
    server = createApp(keeper).listen(config.port, () => {
      logger.info(`Status up on :${config.port}`);
    });
  }

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    keeper.stop();
    server?.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logger.error(`Startup failed: ${describeError(err)}`);
  process.exit(1);
});
