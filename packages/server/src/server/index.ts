import { createInspectionDaemon } from "./bootstrap.js";
import { resolveDaemonConfig, resolveHome } from "./config.js";
import { createRootLogger } from "./logger.js";
import { loadPersistedConfig } from "./persisted-config.js";

async function main(): Promise<void> {
  const home = resolveHome();
  const bootLogger = createRootLogger(undefined);
  const persisted = loadPersistedConfig(home, bootLogger);
  const logger = createRootLogger(persisted);
  const config = resolveDaemonConfig(persisted);

  const daemon = createInspectionDaemon(config, logger);
  await daemon.start();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    try {
      await daemon.close();
      process.exit(0);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

main().catch((error: unknown) => {
  console.error("Failed to start inspection daemon:", error);
  process.exit(1);
});
