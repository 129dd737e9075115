import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppConfig } from "../config.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { MappingConfig } from "../mapping/types.ts";
import type { Deduplicator } from "../webhook/dedup.ts";
import { createEventFilter } from "../webhook/filters.ts";
import type { MessageSink, WebhookEvent } from "../webhook/types.ts";
import { verifyWebhookSignature } from "../webhook/verify.ts";

interface WebhookRouteDeps {
  config: Pick<AppConfig, "webhookSecret">;
  logger: Logger;
  dedup: Deduplicator;
  sink: MessageSink;
  loadMappingConfig: () => Promise<MappingConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createWebhookRoutes(deps: WebhookRouteDeps): Hono {
  const { config, logger, dedup, sink, loadMappingConfig } = deps;
  const app = new Hono();

  /**
   * Returns true when the delivery should be queued. A mapping file that
   * cannot be loaded here does not drop the delivery; the batch reports it.
   */
  async function isSubscribed(eventName: string, action: string, deliveryId: string): Promise<boolean> {
    try {
      const mapping = await loadMappingConfig();
      return createEventFilter(mapping, logger).shouldQueue(eventName, action);
    } catch (err) {
      logger.error({ err, deliveryId, eventName }, "Mapping config unavailable at ingress, queueing unfiltered");
      return true;
    }
  }

  app.post("/github", async (c) => {
    const signature = c.req.header("x-hub-signature-256");
    const deliveryId = c.req.header("x-github-delivery") ?? "unknown";
    const eventName = c.req.header("x-github-event") ?? "unknown";

    // CRITICAL: Get raw body text BEFORE any JSON parsing.
    // Parsing first can alter whitespace/encoding and break HMAC verification.
    const body = await c.req.text();

    if (!(await verifyWebhookSignature(config.webhookSecret, body, signature))) {
      logger.warn({ deliveryId, eventName }, "Webhook signature verification failed");
      return c.json({ error: "Invalid signature" }, 401);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      logger.warn({ err, deliveryId, eventName }, "Webhook payload is not valid JSON");
      return c.json({ error: "Invalid JSON payload" }, 400);
    }
    if (!isRecord(parsed)) {
      logger.warn({ deliveryId, eventName }, "Webhook payload is not a JSON object");
      return c.json({ error: "Invalid JSON payload" }, 400);
    }

    if (dedup.isDuplicate(deliveryId)) {
      logger.info({ deliveryId, eventName }, "Duplicate delivery skipped");
      return c.json({ received: true });
    }

    const event: WebhookEvent = { id: deliveryId, name: eventName, payload: parsed };
    const action = typeof parsed.action === "string" ? parsed.action : "";

    if (!(await isSubscribed(event.name, action, deliveryId))) {
      logger.info({ deliveryId, eventName, action, filtered: true }, "Event not subscribed by any mapping rule");
      return c.json({ received: true, filtered: true });
    }

    logger.info({ deliveryId, eventName, action }, "Webhook accepted and queued");

    // Fire-and-fork: GitHub expects an answer within 10 seconds, and a
    // submit that completes a batch waits for that batch.
    const childLogger = createChildLogger(logger, { deliveryId, eventName });
    Promise.resolve()
      .then(() =>
        sink.submit({ eventType: event.name, action, deliveryId: event.id, payload: event.payload }),
      )
      .catch((err: unknown) => childLogger.error({ err }, "Queue submit failed"));

    return c.json({ received: true, queued: true });
  });

  return app;
}
