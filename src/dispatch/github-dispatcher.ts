import type { Logger } from "pino";
import { WorkflowDispatchError, errorMessage } from "../lib/errors.ts";
import { redactGitHubTokens } from "../lib/sanitizer.ts";
import type { DispatchRequest } from "../mapping/types.ts";
import type { DispatchClientProvider, DispatchContext, WorkflowDispatcher } from "./types.ts";

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Dispatcher that triggers workflow_dispatch runs through the GitHub REST API.
 * GitHub answers 204 with no run id, so success means "accepted", not "ran".
 */
export function createGitHubDispatcher(deps: {
  clients: DispatchClientProvider;
  logger: Logger;
}): WorkflowDispatcher {
  const { clients, logger } = deps;

  return {
    async dispatch(request: DispatchRequest, context?: DispatchContext): Promise<void> {
      const target = `${request.owner}/${request.repository}`;
      const client = await clients.getDispatchClient(request.owner, request.repository);

      try {
        await client.createWorkflowDispatch({
          owner: request.owner,
          repo: request.repository,
          workflow_id: request.workflowFile,
          ref: request.ref,
          inputs: request.inputs,
        });
      } catch (err) {
        const status = statusOf(err);
        throw new WorkflowDispatchError(
          redactGitHubTokens(
            `Dispatch of ${request.workflowFile} in ${target} on ${request.ref} failed` +
              `${status !== undefined ? ` (HTTP ${status})` : ""}: ${errorMessage(err)}`,
          ),
          { cause: err, status },
        );
      }

      logger.info(
        {
          deliveryId: context?.deliveryId,
          eventName: context?.eventName,
          target,
          workflowFile: request.workflowFile,
          ref: request.ref,
          inputKeys: Object.keys(request.inputs),
        },
        "Workflow dispatched",
      );
    },
  };
}

/** Dispatcher used with DRY_RUN: logs the request it would have sent. */
export function createDryRunDispatcher(logger: Logger): WorkflowDispatcher {
  return {
    async dispatch(request: DispatchRequest, context?: DispatchContext): Promise<void> {
      logger.info(
        {
          deliveryId: context?.deliveryId,
          eventName: context?.eventName,
          target: `${request.owner}/${request.repository}`,
          workflowFile: request.workflowFile,
          ref: request.ref,
          inputs: request.inputs,
          dryRun: true,
        },
        "Dry run: workflow dispatch skipped",
      );
    },
  };
}
