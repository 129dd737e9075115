import type { DispatchRequest } from "../mapping/types.ts";

/** Parameters of `POST /repos/{owner}/{repo}/actions/workflows/{workflow_id}/dispatches` */
export type WorkflowDispatchParams = {
  owner: string;
  repo: string;
  workflow_id: string;
  ref: string;
  inputs: Record<string, string>;
};

/** The slice of Octokit's `rest.actions` the dispatcher needs. */
export interface WorkflowDispatchApi {
  createWorkflowDispatch(params: WorkflowDispatchParams): Promise<unknown>;
}

export interface DispatchClientProvider {
  /**
   * Return a client authorized to dispatch workflows in owner/repo.
   * Rejects with RepositoryNotInstalledError when the app cannot act there.
   */
  getDispatchClient(owner: string, repo: string): Promise<WorkflowDispatchApi>;
}

export interface DispatchContext {
  deliveryId?: string;
  eventName?: string;
}

export interface WorkflowDispatcher {
  /** Trigger one workflow run. Rejects when GitHub does not accept the dispatch. */
  dispatch(request: DispatchRequest, context?: DispatchContext): Promise<void>;
}

/** Parameters of `POST /repos/{owner}/{repo}/check-runs` for a run created already completed */
export type CheckRunParams = {
  owner: string;
  repo: string;
  name: string;
  head_sha: string;
  status: "completed";
  conclusion: "success" | "failure";
  output: { title: string; summary: string };
};

/** The slice of Octokit's `rest.checks` the check reporter needs. */
export interface CheckRunApi {
  create(params: CheckRunParams): Promise<unknown>;
}

export interface ChecksClientProvider {
  /** Rejects with RepositoryNotInstalledError when the app cannot act on owner/repo. */
  getChecksClient(owner: string, repo: string): Promise<CheckRunApi>;
}
