import type { Logger } from "pino";
import { normalizeEvent } from "./normalizer.ts";
import { resolveWorkflows } from "./resolver.ts";
import { buildTemplateVariables, substituteWorkflow } from "./template.ts";
import type {
  CanonicalEvent,
  DispatchRequest,
  EventMessage,
  MappingConfig,
  WorkflowSpec,
} from "./types.ts";

export const DEFAULT_REF = "main";

/**
 * The dispatch endpoint takes a workflow file name or id, not a path:
 * ".github/workflows/ci.yml" and "/ci.yml" both become "ci.yml".
 */
export function toWorkflowId(workflowFile: string): string {
  const trimmed = workflowFile.replace(/^\/+/, "");
  const segments = trimmed.split("/");
  return segments[segments.length - 1] ?? trimmed;
}

export function toDispatchRequest(spec: WorkflowSpec): DispatchRequest {
  return {
    owner: spec.owner,
    repository: spec.repository,
    workflowFile: toWorkflowId(spec.workflowFile),
    ref: spec.ref || DEFAULT_REF,
    inputs: { ...spec.inputs },
  };
}

/** Resolve and substitute every workflow the event maps to. Pure apart from optional logging. */
export function resolveDispatchRequests(
  event: CanonicalEvent,
  config: MappingConfig,
  logger?: Logger,
): DispatchRequest[] {
  const workflows = resolveWorkflows(event, config.eventMappings, logger);
  if (workflows.length === 0) return [];

  const variables = buildTemplateVariables(event);
  return workflows.map((spec) => toDispatchRequest(substituteWorkflow(spec, variables)));
}

export interface ResolvedMessage {
  event: CanonicalEvent;
  requests: DispatchRequest[];
}

export function resolveMessage(
  message: EventMessage,
  config: MappingConfig,
  logger?: Logger,
): ResolvedMessage {
  const event = normalizeEvent(message);
  return { event, requests: resolveDispatchRequests(event, config, logger) };
}
