import { buildApp } from "./app";
import { loadConfig } from "./config";
import { EWebClient } from "./eweb/client";
import { logger } from "./logger";
import { createRequestOrchestrator } from "./orchestrator";
import { startTelemetry, stopTelemetry } from "./telemetry";

async function start(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;
  await startTelemetry(config.serviceName);

  const client = new EWebClient({
    credentials: config.eweb.credentials,
    timeoutMs: config.eweb.timeoutMs,
    pageSize: config.eweb.pageSize,
    retry: config.eweb.retry
  });
  const orchestrator = createRequestOrchestrator({
    client,
    defaultSupplierId: config.eweb.defaultSupplierId
  });
  const app = await buildApp({ orchestrator });

  async function shutdown(): Promise<void> {
    logger.info({ traceId: "system" }, "Shutting down intent service");
    await app.close();
    await stopTelemetry();
  }

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port, upstream: config.eweb.credentials.baseUrl.origin, traceId: "system" }, "Intent service listening");
}

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start intent service");
  process.exit(1);
});
