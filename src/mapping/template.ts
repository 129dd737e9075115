import type { CanonicalEvent, WorkflowSpec } from "./types.ts";

export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<TemplateValue>
  | { readonly [key: string]: TemplateValue };

export type TemplateVariables = Readonly<Record<string, string>>;

const PLACEHOLDER = /\{([^{}]+)\}/g;

export function buildTemplateVariables(event: CanonicalEvent): TemplateVariables {
  return {
    owner: event.repo.owner,
    repository: event.repo.name,
    head_sha: event.headSha,
    head_branch: event.headBranch,
    base_branch: event.baseBranch,
    base_sha: event.baseSha,
    pr_number: event.prNumber,
    merged: event.merged,
    is_merge_group: event.isMergeGroup,
    event_id: event.eventId,
    check_suite_id: event.checkSuiteId,
    event_type: event.eventType,
    action: event.action,
    delivery_id: event.deliveryId,
  };
}

/**
 * Replace `{name}` tokens in one pass. Unknown names are kept verbatim and
 * substituted values are not scanned again.
 */
export function substituteString(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (token: string, name: string) =>
    Object.hasOwn(variables, name) ? variables[name] : token,
  );
}

function isTemplateArray(value: TemplateValue): value is ReadonlyArray<TemplateValue> {
  return Array.isArray(value);
}

/** Deep, structure-preserving substitution over strings, arrays and plain objects. */
export function substitute(value: TemplateValue, variables: TemplateVariables): TemplateValue {
  if (typeof value === "string") return substituteString(value, variables);
  if (value === null || typeof value !== "object") return value;

  if (isTemplateArray(value)) {
    return value.map((item) => substitute(item, variables));
  }

  const result: Record<string, TemplateValue> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = substitute(item, variables);
  }
  return result;
}

function substituteText(template: string, variables: TemplateVariables): string {
  const value = substitute(template, variables);
  return typeof value === "string" ? value : template;
}

/** Applies `substitute` to every field and input value of a workflow spec. */
export function substituteWorkflow(spec: WorkflowSpec, variables: TemplateVariables): WorkflowSpec {
  const inputs: Record<string, string> = {};
  for (const [key, item] of Object.entries(spec.inputs)) {
    inputs[key] = substituteText(item, variables);
  }

  return {
    owner: substituteText(spec.owner, variables),
    repository: substituteText(spec.repository, variables),
    workflowFile: substituteText(spec.workflowFile, variables),
    ref: substituteText(spec.ref, variables),
    inputs,
  };
}
