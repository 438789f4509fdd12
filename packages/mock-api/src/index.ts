import { resolve } from "path";
import { loadConfig } from "./config";
import { Logger } from "./logger";
import { MockRegistry } from "./registry";
import { MockApiServer } from "./server";

async function main(): Promise<void> {
  // Repository root, relative to this file.
  const repoRoot = resolve(__dirname, "..", "..", "..");
  const { config, configPath, fromFile } = loadConfig(repoRoot);
  const logger = new Logger(config.verboseLogs, config.logFile);

  logger.info(fromFile ? `Loaded configuration from ${configPath}` : "Using environment and default configuration.");
  if (!config.authEnabled) {
    logger.warn("Authorization checks are disabled; every protected route accepts any caller.");
  }
  if (config.logFile) {
    logger.info(`Appending request log to ${config.logFile}`);
  }

  const server = new MockApiServer(config, new MockRegistry(), logger);

  try {
    await server.start();
  } catch (error) {
    logger.error(`Fatal startup error: ${String(error)}`);
    process.exit(1);
  }

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down.`);
    await server.stop();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error(`Shutdown failed: ${String(error)}`);
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error(`[mock-api] Fatal startup error: ${String(error)}`);
  process.exit(1);
});
