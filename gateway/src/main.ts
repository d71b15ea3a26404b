import "dotenv/config";
import { loadConfig } from "./config/load-config.js";
import { createGatewayRuntime } from "./runtime.js";
import { createLogger, errorMessage } from "./utils/logger.js";

const log = createLogger("main");

export async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = createGatewayRuntime(config);
  const server = await runtime.start();
  log.info("Gateway started", { port: server.port, feeds: runtime.poller.size });

  const stop = (signal: string) => {
    log.info("Shutting down", { signal });
    runtime.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

// Start when run directly
const isMain = process.argv[1]?.endsWith("main.ts") || process.argv[1]?.endsWith("main.js");
if (isMain) {
  main().catch((err: unknown) => {
    log.error("Gateway failed to start", { error: errorMessage(err) });
    process.exit(1);
  });
}
