import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { createGitHubApp } from "./auth/github-app.ts";
import { loadConfig } from "./config.ts";
import { createGitHubCheckReporter } from "./dispatch/check-reporter.ts";
import { createDryRunDispatcher, createGitHubDispatcher } from "./dispatch/github-dispatcher.ts";
import { createMessageBatcher } from "./jobs/batcher.ts";
import { createDispatchQueue } from "./jobs/queue.ts";
import { createLogger } from "./lib/logger.ts";
import { loadMappingConfig } from "./mapping/config.ts";
import { toQueueRecord } from "./processor/message.ts";
import { createBatchProcessor } from "./processor/batch.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { createWebhookRoutes } from "./routes/webhooks.ts";
import { createDeduplicator } from "./webhook/dedup.ts";
import type { MessageSink, QueueRecord } from "./webhook/types.ts";

// Fail fast on missing or invalid config
const config = await loadConfig();
const logger = createLogger({ level: config.logLevel });
const dedup = createDeduplicator();

// Validate the mapping file once at startup so a broken file is caught on
// deploy; batches still reload it so edits apply without a restart.
await loadMappingConfig(config.mappingConfigPath, logger);
const readMappingConfig = () => loadMappingConfig(config.mappingConfigPath);

// Initialize GitHub App auth -- validates credentials and logs the app slug.
// Crashes the process if credentials are invalid (fail-fast).
const githubApp = createGitHubApp(config, logger);
await githubApp.initialize();

const dispatcher = config.dryRun
  ? createDryRunDispatcher(logger)
  : createGitHubDispatcher({ clients: githubApp, logger });
if (config.dryRun) {
  logger.warn("DRY_RUN enabled: resolved workflows are logged, not dispatched");
}

// Check runs are writes to GitHub, so a dry run never reports them
const checkReporter =
  config.reportCheckRuns && !config.dryRun
    ? createGitHubCheckReporter({ clients: githubApp, logger })
    : undefined;

const dispatchQueue = createDispatchQueue(logger, { concurrency: config.dispatchConcurrency });
const batchProcessor = createBatchProcessor({
  dispatcher,
  queue: dispatchQueue,
  logger,
  failOnAnyError: config.failOnAnyError,
  checkReporter,
  loadMappingConfig: readMappingConfig,
});

const batcher = createMessageBatcher<QueueRecord>({
  maxBatchSize: config.batchMaxSize,
  flushIntervalMs: config.batchFlushIntervalMs,
  maxAttempts: config.batchMaxAttempts,
  logger,
  onBatch: async (records) => {
    await batchProcessor.process(records);
  },
});

const sink: MessageSink = {
  submit: (message) => batcher.add(toQueueRecord(message)),
};

const app = new Hono();
app.route("/webhooks", createWebhookRoutes({
  config,
  logger,
  dedup,
  sink,
  loadMappingConfig: readMappingConfig,
}));
app.route("/", createHealthRoutes({
  githubApp,
  dispatchQueue,
  loadMappingConfig: readMappingConfig,
  logger,
}));

// Global error handler
app.onError((err, c) => {
  logger.error({ err, path: c.req.path, method: c.req.method }, "Unhandled error");
  return c.json({ error: "Internal Server Error" }, 500);
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, mappingConfigPath: config.mappingConfigPath }, "Server started");
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    logger.warn({ signal }, "Shutdown already in progress, ignoring duplicate signal");
    return;
  }
  shuttingDown = true;
  logger.info({ signal, buffered: batcher.size() }, "Shutdown signal received, draining buffered messages");

  server.close();
  await batcher.stop();
  logger.info("Drain complete");
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err, signal }, "Shutdown failed");
      process.exit(1);
    });
  });
}
