import { z } from "zod";
import type { CanonicalEvent, EventMessage, RepoInfo } from "./types.ts";

/**
 * Payload readers. Every leaf carries a `.catch` so parsing a webhook payload
 * can never fail: missing or mistyped fields collapse to "" / [] / false.
 */
const text = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))
  .catch("");

const pathList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === "string"));

const refSchema = z
  .object({ ref: text, sha: text })
  .catch({ ref: "", sha: "" });

const repositorySchema = z
  .object({
    owner: z.object({ login: text }).catch({ login: "" }),
    name: text,
  })
  .catch({ owner: { login: "" }, name: "" });

const commitSchema = z
  .object({ added: pathList, modified: pathList, removed: pathList })
  .catch({ added: [], modified: [], removed: [] });

const pushSchema = z.object({
  ref: text,
  after: text,
  commits: z.array(commitSchema).catch([]),
});

const mergeGroupSchema = z
  .object({
    id: text,
    head_ref: text,
    base_ref: text,
    head_sha: text,
    base_sha: text,
  })
  .catch({ id: "", head_ref: "", base_ref: "", head_sha: "", base_sha: "" });

const pullRequestSchema = z
  .object({
    id: text,
    number: text,
    merged: z.boolean().catch(false),
    head: refSchema,
    base: refSchema,
  })
  .catch({
    id: "",
    number: "",
    merged: false,
    head: { ref: "", sha: "" },
    base: { ref: "", sha: "" },
  });

const associatedPullRequestSchema = z
  .object({ number: text, base: refSchema })
  .catch({ number: "", base: { ref: "", sha: "" } });

const checkObjectSchema = z
  .object({
    id: text,
    head_branch: text,
    head_sha: text,
    pull_requests: z.array(z.unknown()).catch([]),
    // check_run nests its suite; the suite carries head_branch when the run does not
    check_suite: z.object({ head_branch: text }).catch({ head_branch: "" }),
  })
  .catch({
    id: "",
    head_branch: "",
    head_sha: "",
    pull_requests: [],
    check_suite: { head_branch: "" },
  });

const HEADS_PREFIX = "refs/heads/";

export function stripHeadsPrefix(ref: string): string {
  return ref.startsWith(HEADS_PREFIX) ? ref.slice(HEADS_PREFIX.length) : ref;
}

export function extractRepoInfo(payload: Record<string, unknown>): RepoInfo {
  const repository = repositorySchema.parse(payload.repository);
  return Object.freeze({ owner: repository.owner.login, name: repository.name });
}

/**
 * Builds an event with only the envelope fields set. Used directly for event
 * types without a dedicated normalizer.
 */
function baseEvent(message: EventMessage): CanonicalEvent {
  return {
    eventType: message.eventType,
    action: message.action,
    deliveryId: message.deliveryId,
    repo: extractRepoInfo(message.payload),
    headBranch: "",
    baseBranch: "",
    headSha: "",
    baseSha: "",
    prNumber: "",
    merged: "false",
    isMergeGroup: "false",
    eventId: "",
    checkSuiteId: "",
  };
}

type EventNormalizer = (base: CanonicalEvent, payload: Record<string, unknown>) => CanonicalEvent;

function normalizePush(base: CanonicalEvent, payload: Record<string, unknown>): CanonicalEvent {
  const push = pushSchema.parse(payload);

  const changedFiles = new Set<string>();
  for (const commit of push.commits) {
    for (const path of [...commit.added, ...commit.modified, ...commit.removed]) {
      changedFiles.add(path);
    }
  }

  return {
    ...base,
    headBranch: stripHeadsPrefix(push.ref),
    headSha: push.after,
    changedFiles,
  };
}

function normalizeMergeGroup(base: CanonicalEvent, payload: Record<string, unknown>): CanonicalEvent {
  const group = mergeGroupSchema.parse(payload.merge_group);
  return {
    ...base,
    headBranch: stripHeadsPrefix(group.head_ref),
    baseBranch: stripHeadsPrefix(group.base_ref),
    headSha: group.head_sha,
    baseSha: group.base_sha,
    isMergeGroup: "true",
    eventId: group.id,
    checkSuiteId: group.id,
  };
}

function normalizePullRequest(base: CanonicalEvent, payload: Record<string, unknown>): CanonicalEvent {
  const pr = pullRequestSchema.parse(payload.pull_request);

  return {
    ...base,
    headBranch: pr.head.ref,
    baseBranch: pr.base.ref,
    headSha: pr.head.sha,
    baseSha: pr.base.sha,
    prNumber: pr.number,
    merged: pr.merged ? "true" : "false",
    eventId: pr.id,
  };
}

/**
 * Shared by check_suite and check_run. A check_run payload that omits
 * `head_branch` takes it from its parent `check_run.check_suite.head_branch`.
 */
function normalizeCheck(base: CanonicalEvent, payload: Record<string, unknown>): CanonicalEvent {
  const check = checkObjectSchema.parse(payload[base.eventType]);
  const firstPr =
    check.pull_requests.length > 0
      ? associatedPullRequestSchema.parse(check.pull_requests[0])
      : undefined;

  return {
    ...base,
    headBranch: check.head_branch || check.check_suite.head_branch,
    headSha: check.head_sha,
    prNumber: firstPr?.number ?? "",
    baseBranch: firstPr?.base.ref ?? "",
    baseSha: firstPr?.base.sha ?? "",
    eventId: check.id,
    checkSuiteId: check.id,
  };
}

const NORMALIZERS = {
  push: normalizePush,
  merge_group: normalizeMergeGroup,
  pull_request: normalizePullRequest,
  check_suite: normalizeCheck,
  check_run: normalizeCheck,
} satisfies Record<string, EventNormalizer>;

export type KnownEventType = keyof typeof NORMALIZERS;

export const KNOWN_EVENT_TYPES: ReadonlyArray<KnownEventType> = [
  "push",
  "merge_group",
  "pull_request",
  "check_suite",
  "check_run",
];

export function isKnownEventType(eventType: string): eventType is KnownEventType {
  return Object.hasOwn(NORMALIZERS, eventType);
}

/**
 * Convert one queue message into a canonical event.
 *
 * Never throws: unknown event types get the envelope-only event, and malformed
 * payload fields degrade to their defaults.
 */
export function normalizeEvent(message: EventMessage): CanonicalEvent {
  const base = baseEvent(message);
  if (!isKnownEventType(message.eventType)) {
    return base;
  }
  return NORMALIZERS[message.eventType](base, message.payload);
}
