import type { Logger } from "pino";
import type { CheckRunReporter, DispatchResult } from "../dispatch/check-reporter.ts";
import type { WorkflowDispatcher } from "../dispatch/types.ts";
import type { DispatchQueue } from "../jobs/types.ts";
import {
  BatchProcessingError,
  classifyError,
  errorMessage,
  formatErrorSummary,
  type ErrorCategory,
} from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { resolveMessage } from "../mapping/dispatch-request.ts";
import type { DispatchRequest, MappingConfig } from "../mapping/types.ts";
import type { QueueRecord } from "../webhook/types.ts";
import { parseQueueRecord } from "./message.ts";

export interface BatchFailure {
  messageId: string;
  deliveryId?: string;
  workflowFile?: string;
  category: ErrorCategory;
  summary: string;
}

export interface BatchResult {
  /** Messages handled without any failure, including those that matched nothing */
  processed: number;
  /** Messages that were malformed or had at least one failed dispatch */
  errors: number;
  /** Workflow dispatches accepted by the dispatcher */
  dispatched: number;
  failures: BatchFailure[];
}

export interface BatchProcessorDeps {
  dispatcher: WorkflowDispatcher;
  queue: DispatchQueue;
  logger: Logger;
  /** Reject the batch (queue redelivery) when any message failed */
  failOnAnyError: boolean;
  /** Reports each message's dispatch outcome on its source commit */
  checkReporter?: CheckRunReporter;
}

interface MessageOutcome {
  dispatched: number;
  failures: BatchFailure[];
}

interface DispatchOutcome extends MessageOutcome {
  results: DispatchResult[];
}

function toFailure(
  err: unknown,
  messageId: string,
  extra: { deliveryId?: string; workflowFile?: string } = {},
): BatchFailure {
  const category = classifyError(err);
  return {
    messageId,
    ...extra,
    category,
    summary: formatErrorSummary(category, errorMessage(err)),
  };
}

async function dispatchAll(
  requests: DispatchRequest[],
  context: { messageId: string; deliveryId: string; eventName: string },
  deps: BatchProcessorDeps,
): Promise<DispatchOutcome> {
  const settled = await Promise.allSettled(
    requests.map((request) =>
      deps.queue.enqueue(
        `${request.owner}/${request.repository}`,
        () => deps.dispatcher.dispatch(request, context),
        { ...context, workflowFile: request.workflowFile },
      ),
    ),
  );

  const outcome: DispatchOutcome = { dispatched: 0, failures: [], results: [] };
  for (const [index, request] of requests.entries()) {
    const result = settled[index];
    if (result?.status === "rejected") {
      const failure = toFailure(result.reason, context.messageId, {
        deliveryId: context.deliveryId,
        workflowFile: request.workflowFile,
      });
      outcome.failures.push(failure);
      outcome.results.push({ request, error: failure.summary });
    } else {
      outcome.dispatched++;
      outcome.results.push({ request });
    }
  }
  return outcome;
}

async function processRecord(
  record: QueueRecord,
  config: MappingConfig,
  deps: BatchProcessorDeps,
): Promise<MessageOutcome> {
  const { logger } = deps;

  try {
    const message = parseQueueRecord(record);
    const messageLogger = createChildLogger(logger, {
      deliveryId: message.deliveryId,
      eventName: message.eventType,
      action: message.action,
    });

    const { event, requests } = resolveMessage(message, config, messageLogger);
    if (requests.length === 0) {
      messageLogger.info(
        { owner: event.repo.owner, repository: event.repo.name },
        "No matching workflows for event",
      );
      return { dispatched: 0, failures: [] };
    }

    messageLogger.info(
      {
        owner: event.repo.owner,
        repository: event.repo.name,
        headBranch: event.headBranch,
        baseBranch: event.baseBranch,
        requestCount: requests.length,
      },
      `Resolved ${requests.length} workflow dispatch(es)`,
    );

    const outcome = await dispatchAll(
      requests,
      { messageId: record.messageId, deliveryId: message.deliveryId, eventName: message.eventType },
      deps,
    );
    if (outcome.failures.length > 0) {
      messageLogger.warn(
        { dispatched: outcome.dispatched, failed: outcome.failures.length },
        "Some workflow dispatches failed",
      );
    }

    if (deps.checkReporter) {
      try {
        await deps.checkReporter.report(event, outcome.results);
      } catch (err) {
        messageLogger.warn({ err }, "Check run report failed");
      }
    }
    return { dispatched: outcome.dispatched, failures: outcome.failures };
  } catch (err) {
    logger.error({ err, messageId: record.messageId }, "Failed to process record");
    return { dispatched: 0, failures: [toFailure(err, record.messageId)] };
  }
}

/**
 * Process every record of a batch against one mapping config snapshot.
 *
 * Records are handled concurrently and in isolation: a malformed record or a
 * failed dispatch is counted and reported without affecting its siblings.
 * With failOnAnyError the call rejects with BatchProcessingError after all
 * records have been attempted; otherwise partial failure still resolves.
 */
export async function processBatch(
  records: ReadonlyArray<QueueRecord>,
  config: MappingConfig,
  deps: BatchProcessorDeps,
): Promise<BatchResult> {
  const outcomes = await Promise.all(records.map((record) => processRecord(record, config, deps)));

  const result: BatchResult = { processed: 0, errors: 0, dispatched: 0, failures: [] };
  for (const outcome of outcomes) {
    result.dispatched += outcome.dispatched;
    if (outcome.failures.length > 0) {
      result.errors++;
      result.failures.push(...outcome.failures);
    } else {
      result.processed++;
    }
  }

  deps.logger.info(
    {
      recordCount: records.length,
      processed: result.processed,
      errors: result.errors,
      dispatched: result.dispatched,
    },
    "Batch processed",
  );

  if (deps.failOnAnyError && result.errors > 0) {
    throw new BatchProcessingError(result.processed, result.errors);
  }
  return result;
}

export interface BatchProcessor {
  process(records: ReadonlyArray<QueueRecord>): Promise<BatchResult>;
}

/**
 * Binds processBatch to a config source. The mapping config is loaded once
 * per batch and passed down; a config that fails to load fails the whole
 * batch.
 */
export function createBatchProcessor(
  deps: BatchProcessorDeps & { loadMappingConfig: () => Promise<MappingConfig> },
): BatchProcessor {
  return {
    async process(records: ReadonlyArray<QueueRecord>): Promise<BatchResult> {
      let config: MappingConfig;
      try {
        config = await deps.loadMappingConfig();
      } catch (err) {
        deps.logger.error({ err, recordCount: records.length }, "Mapping config unavailable, batch not processed");
        throw err;
      }
      return processBatch(records, config, deps);
    },
  };
}
