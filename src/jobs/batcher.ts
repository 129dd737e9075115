import PQueue from "p-queue";
import type { Logger } from "pino";
import type { MessageBatcher } from "./types.ts";

interface BatcherOptions<T> {
  maxBatchSize: number;
  /** 0 flushes every add immediately */
  flushIntervalMs: number;
  onBatch: (items: T[]) => Promise<void>;
  /** Deliveries per item, counting the first; 1 disables redelivery. Default 1. */
  maxAttempts?: number;
  logger: Logger;
}

interface Envelope<T> {
  item: T;
  attempts: number;
}

/**
 * In-process stand-in for the ingestion queue: buffers items and hands them
 * to `onBatch` when the batch is full or the flush interval elapses.
 *
 * Batches run one at a time (PQueue concurrency 1) in arrival order. When
 * `onBatch` rejects, the batch's items go back to the front of the buffer
 * and are delivered again on the next flush, until each has been attempted
 * `maxAttempts` times; then they are dropped with an error log. A failing
 * batch never stops later ones.
 */
export function createMessageBatcher<T>(options: BatcherOptions<T>): MessageBatcher<T> {
  const { maxBatchSize, flushIntervalMs, onBatch, logger } = options;
  const maxAttempts = options.maxAttempts ?? 1;
  const runner = new PQueue({ concurrency: 1 });
  let buffer: Envelope<T>[] = [];
  let timer: ReturnType<typeof setTimeout> | undefined;
  let stopped = false;
  let batchNumber = 0;

  function clearTimer(): void {
    if (timer !== undefined) {
      clearTimeout(timer);
      timer = undefined;
    }
  }

  async function runBatch(envelopes: Envelope<T>[], batchId: number): Promise<void> {
    const startedAt = Date.now();
    try {
      await onBatch(envelopes.map((envelope) => envelope.item));
      logger.debug(
        { batchId, size: envelopes.length, durationMs: Date.now() - startedAt },
        "Batch handled",
      );
    } catch (err) {
      const retry = envelopes.filter((envelope) => envelope.attempts < maxAttempts);
      const dropped = envelopes.length - retry.length;

      logger.error(
        {
          err,
          batchId,
          size: envelopes.length,
          redelivered: retry.length,
          dropped,
          durationMs: Date.now() - startedAt,
        },
        "Batch handler failed",
      );
      if (dropped > 0) {
        logger.error({ batchId, dropped, maxAttempts }, `Batch items dropped after ${maxAttempts} attempt(s)`);
      }

      if (retry.length > 0) {
        buffer = [...retry, ...buffer];
        scheduleFlush();
      }
    }
  }

  async function flush(): Promise<void> {
    clearTimer();
    if (buffer.length === 0) {
      await runner.onIdle();
      return;
    }

    const envelopes = buffer;
    buffer = [];
    for (const envelope of envelopes) envelope.attempts++;
    const batchId = ++batchNumber;
    await runner.add(() => runBatch(envelopes, batchId));
  }

  function scheduleFlush(): void {
    if (timer !== undefined) return;
    timer = setTimeout(() => {
      timer = undefined;
      flush().catch((err: unknown) => logger.error({ err }, "Scheduled batch flush failed"));
    }, flushIntervalMs);
    timer.unref();
  }

  return {
    async add(item: T): Promise<void> {
      if (stopped) {
        throw new Error("Batcher is stopped; item rejected");
      }

      buffer.push({ item, attempts: 0 });
      if (buffer.length >= maxBatchSize || flushIntervalMs === 0) {
        await flush();
        return;
      }
      scheduleFlush();
    },

    flush,

    async stop(): Promise<void> {
      stopped = true;
      // Redelivered items land back in the buffer; attempts are bounded
      do {
        await flush();
        await runner.onIdle();
      } while (buffer.length > 0);
      clearTimer();
    },

    size(): number {
      return buffer.length;
    },
  };
}
