/** Repository identity taken from `payload.repository`. Empty strings when absent. */
export interface RepoInfo {
  readonly owner: string;
  readonly name: string;
}

/** Stringly-typed boolean, matching what workflow_dispatch inputs accept. */
export type BooleanString = "true" | "false";

/**
 * One webhook delivery reduced to the fields the mapping engine cares about.
 *
 * Every scalar is a string and defaults to "" when the event type does not
 * carry it, so templates and matchers never have to handle undefined.
 */
export interface CanonicalEvent {
  readonly eventType: string;
  readonly action: string;
  readonly deliveryId: string;
  readonly repo: RepoInfo;
  readonly headBranch: string;
  readonly baseBranch: string;
  readonly headSha: string;
  readonly baseSha: string;
  readonly prNumber: string;
  readonly merged: BooleanString;
  readonly isMergeGroup: BooleanString;
  readonly eventId: string;
  readonly checkSuiteId: string;
  /** Paths touched by the delivery. Only push events populate this. */
  readonly changedFiles?: ReadonlySet<string>;
}

/** Raw queue message as produced by the webhook receiver. */
export interface EventMessage {
  eventType: string;
  action: string;
  deliveryId: string;
  payload: Record<string, unknown>;
}

export type BranchConstraint =
  | { readonly kind: "wildcard" }
  | { readonly kind: "single"; readonly pattern: string }
  | { readonly kind: "list"; readonly patterns: ReadonlyArray<string> }
  | {
      readonly kind: "structured";
      readonly base?: ReadonlyArray<string>;
      readonly head?: ReadonlyArray<string>;
    };

/** A workflow to dispatch. String values may contain `{variable}` placeholders. */
export interface WorkflowSpec {
  readonly owner: string;
  readonly repository: string;
  readonly workflowFile: string;
  readonly ref: string;
  readonly inputs: Readonly<Record<string, string>>;
}

export interface RepoPattern {
  readonly ownerPattern: string;
  readonly repositoryPattern: string;
  readonly branches: BranchConstraint;
  readonly filePatterns: ReadonlyArray<string>;
  readonly workflows: ReadonlyArray<WorkflowSpec>;
}

export interface MappingRule {
  readonly eventType: string;
  /** When undefined the rule applies to every action. */
  readonly actions?: ReadonlySet<string>;
  readonly repositoryPatterns: ReadonlyArray<RepoPattern>;
}

export interface MappingConfig {
  readonly eventMappings: ReadonlyArray<MappingRule>;
}

/** Fully substituted request handed to the workflow dispatcher. */
export interface DispatchRequest {
  owner: string;
  repository: string;
  workflowFile: string;
  ref: string;
  inputs: Record<string, string>;
}
