import type { Logger } from "pino";
import type { CanonicalEvent, DispatchRequest } from "../mapping/types.ts";
import type { ChecksClientProvider } from "./types.ts";

export const CHECK_RUN_NAME = "Workflow dispatch";

export interface DispatchResult {
  request: DispatchRequest;
  /** Redacted failure summary; absent when GitHub accepted the dispatch */
  error?: string;
}

export interface CheckRunOutput {
  conclusion: "success" | "failure";
  title: string;
  summary: string;
}

export interface CheckRunReporter {
  /**
   * Record the dispatch outcome of one message as a completed check run on
   * the source commit. Does nothing when the event has no head commit or
   * nothing was dispatched.
   */
  report(event: CanonicalEvent, results: ReadonlyArray<DispatchResult>): Promise<void>;
}

function describeResult(result: DispatchResult): string {
  const { owner, repository, workflowFile, ref } = result.request;
  const status = result.error === undefined ? "dispatched" : `failed: ${result.error}`;
  return `- ${owner}/${repository} ${workflowFile} @ ${ref}: ${status}`;
}

export function renderCheckRunOutput(results: ReadonlyArray<DispatchResult>): CheckRunOutput {
  const failed = results.filter((result) => result.error !== undefined).length;

  return {
    conclusion: failed === 0 ? "success" : "failure",
    title:
      failed === 0
        ? `Dispatched ${results.length} workflow(s)`
        : `${failed} of ${results.length} workflow dispatch(es) failed`,
    summary: results.map(describeResult).join("\n"),
  };
}

export function createGitHubCheckReporter(deps: {
  clients: ChecksClientProvider;
  logger: Logger;
  name?: string;
}): CheckRunReporter {
  const { clients, logger } = deps;
  const name = deps.name ?? CHECK_RUN_NAME;

  return {
    async report(event: CanonicalEvent, results: ReadonlyArray<DispatchResult>): Promise<void> {
      if (event.headSha === "" || results.length === 0) return;

      const { owner, name: repo } = event.repo;
      const output = renderCheckRunOutput(results);
      const client = await clients.getChecksClient(owner, repo);
      await client.create({
        owner,
        repo,
        name,
        head_sha: event.headSha,
        status: "completed",
        conclusion: output.conclusion,
        output: { title: output.title, summary: output.summary },
      });

      logger.info(
        {
          deliveryId: event.deliveryId,
          target: `${owner}/${repo}`,
          headSha: event.headSha,
          conclusion: output.conclusion,
        },
        "Check run reported",
      );
    },
  };
}
