import "dotenv/config";
import type { FastifyInstance } from "fastify";
import { createOpenAiAnalyzer } from "./analysis/openaiAnalyzer.js";
import { loadConfig } from "./config/env.js";
import { createLogger } from "./logger.js";
import { createProviderClient } from "./providers/registry.js";
import { reviewPullRequest } from "./review/pipeline.js";
import { ReviewScheduler } from "./scheduler/pollLoop.js";
import { buildStatusServer } from "./server/status.js";
import { JsonFileStateBackend, ReviewStateStore } from "./state/store.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info(
    {
      platform: config.platform,
      repository: config.repository,
      model: config.openaiModel,
      mode: config.reviewMode,
      threshold: config.commentThreshold,
      pollIntervalMs: config.pollIntervalMs
    },
    "starting pull request review service"
  );

  const client = createProviderClient(config);
  const analyzer = createOpenAiAnalyzer({
    baseUrl: config.openaiBaseUrl,
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    timeoutMs: config.openaiTimeoutMs,
    maxRetries: config.openaiMaxRetries,
    logger: logger.child({ component: "analyzer" })
  });
  const store = new ReviewStateStore(new JsonFileStateBackend(config.stateFile), logger.child({ component: "state" }));
  await store.load();

  const settings = {
    mode: config.reviewMode,
    threshold: config.commentThreshold,
    tolerance: config.placementTolerance,
    maxInlineComments: config.maxInlineComments,
    partialPublishPolicy: config.partialPublishPolicy,
    ignorePaths: config.ignorePaths,
    platformTimeoutMs: config.platformTimeoutMs,
    // the analyzer retries internally; leave room for every attempt plus backoff
    analyzerTimeoutMs: config.openaiTimeoutMs * (config.openaiMaxRetries + 1) + 10000 * config.openaiMaxRetries
  };
  const pipelineLogger = logger.child({ component: "pipeline" });
  const scheduler = new ReviewScheduler({
    client,
    store,
    review: (pr) => reviewPullRequest(pr, { client, analyzer, settings, logger: pipelineLogger }),
    pollIntervalMs: config.pollIntervalMs,
    listTimeoutMs: config.platformTimeoutMs,
    reviewDrafts: config.reviewDrafts,
    logger: logger.child({ component: "scheduler" })
  });

  let server: FastifyInstance | null = null;
  if (config.statusPort !== null) {
    server = buildStatusServer({ scheduler, store, repository: config.repository, logLevel: config.logLevel });
    await server.listen({ port: config.statusPort, host: "0.0.0.0" });
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutdown signal received; finishing in-flight pull request");
    scheduler.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await scheduler.run();
  if (server) await server.close();
  logger.info("service stopped");
}

main().catch((err) => {
  console.error("Service cannot start. Please check your configuration.", err);
  process.exit(1);
});
