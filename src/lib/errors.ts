/**
 * Error classification and summary formatting for batch processing.
 *
 * Failures are collected per message and per dispatch request; these helpers
 * turn a caught error into a category and a one-line summary that is safe to
 * log or return (GitHub tokens are redacted).
 */

import { redactGitHubTokens } from "./sanitizer.ts";

/** The error categories reported in batch results */
export type ErrorCategory =
  | "malformed_message"
  | "config_error"
  | "not_installed"
  | "dispatch_error"
  | "internal_error";

export class MappingConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid mapping config ${source}: ${issues.join("; ")}`);
    this.name = "MappingConfigError";
    this.issues = issues;
  }
}

export class MalformedMessageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedMessageError";
  }
}

export class RepositoryNotInstalledError extends Error {
  readonly owner: string;
  readonly repo: string;

  constructor(owner: string, repo: string) {
    super(`GitHub App is not installed on ${owner}/${repo}`);
    this.name = "RepositoryNotInstalledError";
    this.owner = owner;
    this.repo = repo;
  }
}

export class WorkflowDispatchError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = "WorkflowDispatchError";
    this.status = options?.status;
  }
}

/**
 * Classify a caught error into a reporting category.
 *
 * @param error - The caught error (unknown type from catch blocks)
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof MalformedMessageError) return "malformed_message";
  if (error instanceof MappingConfigError) return "config_error";
  if (error instanceof RepositoryNotInstalledError) return "not_installed";
  if (error instanceof WorkflowDispatchError) return "dispatch_error";

  const message = error instanceof Error ? error.message : String(error);
  if (/rate limit|API|\b[45]\d{2}\b/i.test(message)) return "dispatch_error";

  return "internal_error";
}

const LABELS: Record<ErrorCategory, string> = {
  malformed_message: "Malformed message",
  config_error: "Mapping configuration error",
  not_installed: "Target repository not installed",
  dispatch_error: "Workflow dispatch failed",
  internal_error: "Internal error",
};

/** One-line summary with any GitHub token in the detail redacted. */
export function formatErrorSummary(category: ErrorCategory, detail: string): string {
  return `${LABELS[category]}: ${redactGitHubTokens(detail)}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised at the end of a batch when failOnAnyError is set and at least one
 * message failed, so the ingestion queue redelivers the batch.
 */
export class BatchProcessingError extends Error {
  readonly processed: number;
  readonly errors: number;

  constructor(processed: number, errors: number) {
    super(`Batch finished with ${errors} failed message(s) and ${processed} processed`);
    this.name = "BatchProcessingError";
    this.processed = processed;
    this.errors = errors;
  }
}
