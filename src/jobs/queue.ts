import PQueue from "p-queue";
import type { Logger } from "pino";
import type { DispatchQueue, JobContext } from "./types.ts";

/**
 * Create a job queue with per-key concurrency control.
 *
 * Each key (the target "owner/repo" for workflow dispatches) gets its own
 * PQueue, so a burst of dispatches against one repository is throttled while
 * other repositories proceed in parallel. Idle queues are pruned to prevent
 * the map from growing unbounded.
 */
export function createDispatchQueue(
  logger: Logger,
  options: { concurrency?: number } = {},
): DispatchQueue {
  const concurrency = options.concurrency ?? 1;
  const queues = new Map<string, PQueue>();
  let nextJobId = 1;

  function getOrCreateQueue(key: string): PQueue {
    let queue = queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency });
      queues.set(key, queue);
      logger.debug({ key, concurrency }, "Created new dispatch queue");
    }
    return queue;
  }

  return {
    async enqueue<T>(key: string, fn: () => Promise<T>, context?: JobContext): Promise<T> {
      const queue = getOrCreateQueue(key);
      const jobId = `${key}#${nextJobId++}`;
      const queuedAt = Date.now();

      logger.debug(
        {
          jobId,
          key,
          deliveryId: context?.deliveryId,
          eventName: context?.eventName,
          workflowFile: context?.workflowFile,
          queueSize: queue.size,
          pendingCount: queue.pending,
        },
        "Enqueuing dispatch job",
      );

      try {
        return await queue.add(
          async () => {
            const startedAt = Date.now();
            try {
              const value = await fn();
              logger.info(
                {
                  jobId,
                  key,
                  deliveryId: context?.deliveryId,
                  workflowFile: context?.workflowFile,
                  waitMs: startedAt - queuedAt,
                  durationMs: Date.now() - startedAt,
                },
                "Dispatch job completed",
              );
              return value;
            } catch (err) {
              logger.error(
                {
                  err,
                  jobId,
                  key,
                  deliveryId: context?.deliveryId,
                  workflowFile: context?.workflowFile,
                  durationMs: Date.now() - startedAt,
                },
                "Dispatch job failed",
              );
              throw err;
            }
          },
          { throwOnTimeout: true },
        );
      } finally {
        // Prune idle queue after job completes
        if (queue.size === 0 && queue.pending === 0) {
          queues.delete(key);
          logger.debug({ key, jobId }, "Pruned idle dispatch queue");
        }
      }
    },

    activeKeys(): number {
      return queues.size;
    },
  };
}
