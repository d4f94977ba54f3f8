#!/usr/bin/env node
import { createConsoleLogger } from "@formpilot/core";
import { createJobApplicationFromConfig, loadConfig } from "@formpilot/job-application";

import { createFormServer } from "./FormServer.js";

async function main() {
  const config = loadConfig();
  const logger = createConsoleLogger({ name: "formpilot-server", level: config.logLevel });
  const server = createFormServer({
    workflow: createJobApplicationFromConfig(config, logger.child("workflow")),
    uploadDir: config.uploadDir,
    logger,
  });

  const controller = new AbortController();
  server.listen({ port: config.server.port, hostname: config.server.host, signal: controller.signal });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, removing uploaded files`);
    controller.abort();
    void server
      .cleanup()
      .catch((error: unknown) => {
        logger.error("Cleanup failed", { error });
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void main().catch((error) => {
  console.error("formpilot-server failed to start", error);
  process.exit(1);
});
