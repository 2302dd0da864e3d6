#!/usr/bin/env node

import { loadConfig } from "./config.js";
import { RelayServer } from "./server.js";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger("main");

async function main(): Promise<void> {
  const config = loadConfig();
  const server = new RelayServer(config);

  const shutdown = async (signal: string) => {
    log.info({ signal }, "Shutting down...");
    await server.stop();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  await server.start();
  await server.waitUntilDisconnected();

  log.info("Channel disconnected, exiting");
  await server.stop();
}

main().catch((err) => {
  log.fatal({ err }, "Fatal error");
  process.exit(1);
});
