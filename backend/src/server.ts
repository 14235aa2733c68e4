/* SPDX-License-Identifier: MIT */
import { buildApp, createDispatcher } from "@/app";
import config, { configProviderDefaults } from "@/config";
import logger from "@/logging";
import { initializeMetrics } from "@/metrics";

const start = async () => {
  if (config.metrics.enabled) {
    initializeMetrics();
  }

  const app = await buildApp({
    dispatcher: createDispatcher(config, configProviderDefaults),
    bodyLimit: config.api.bodyLimit,
    metricsEnabled: config.metrics.enabled,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "[Server] shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "[Server] error while closing");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ host: config.api.host, port: config.api.port });
  logger.info(
    { host: config.api.host, port: config.api.port },
    "[Server] chat completions gateway listening",
  );
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "[Server] failed to start");
  process.exit(1);
});
