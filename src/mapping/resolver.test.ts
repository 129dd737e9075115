import { describe, expect, test } from "vitest";
import pino from "pino";
import { resolveWorkflows } from "./resolver.ts";
import type { BranchConstraint, CanonicalEvent, MappingRule, RepoPattern, WorkflowSpec } from "./types.ts";

interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function createCapturingLogger() {
  const entries: LogEntry[] = [];
  const logger = pino({ level: "debug" }, {
    write: (line: string) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

function makeEvent(overrides: Partial<CanonicalEvent> = {}): CanonicalEvent {
  return {
    eventType: "pull_request",
    action: "opened",
    deliveryId: "delivery-1",
    repo: { owner: "acme", name: "app-billing" },
    headBranch: "feature/x",
    baseBranch: "main",
    headSha: "abc123",
    baseSha: "def456",
    prNumber: "42",
    merged: "false",
    isMergeGroup: "false",
    eventId: "1001",
    checkSuiteId: "",
    ...overrides,
  };
}

function workflow(workflowFile: string): WorkflowSpec {
  return { owner: "acme", repository: "ci", workflowFile, ref: "main", inputs: {} };
}

function pattern(overrides: Partial<RepoPattern> & { workflows: WorkflowSpec[] }): RepoPattern {
  return {
    ownerPattern: "*",
    repositoryPattern: "*",
    branches: { kind: "wildcard" },
    filePatterns: [],
    ...overrides,
  };
}

function rule(eventType: string, repositoryPatterns: RepoPattern[], actions?: string[]): MappingRule {
  return {
    eventType,
    actions: actions === undefined ? undefined : new Set(actions),
    repositoryPatterns,
  };
}

const FILES = (names: string[]) => new Set(names);

describe("resolveWorkflows", () => {
  test("returns nothing when no rule has the event type", () => {
    const rules = [rule("push", [pattern({ workflows: [workflow("push.yml")] })])];
    expect(resolveWorkflows(makeEvent(), rules)).toEqual([]);
  });

  test("unions every matching pattern across rules in config order", () => {
    const rules = [
      rule("pull_request", [
        pattern({ repositoryPattern: "app-*", workflows: [workflow("a.yml"), workflow("b.yml")] }),
        pattern({ repositoryPattern: "other-*", workflows: [workflow("skipped.yml")] }),
        pattern({ ownerPattern: "acme", workflows: [workflow("c.yml")] }),
      ]),
      rule("push", [pattern({ workflows: [workflow("push.yml")] })]),
      rule("pull_request", [pattern({ workflows: [workflow("a.yml")] })]),
    ];

    const files = resolveWorkflows(makeEvent(), rules).map((spec) => spec.workflowFile);
    expect(files).toEqual(["a.yml", "b.yml", "c.yml", "a.yml"]);
  });

  test("honours the actions filter", () => {
    const rules = [
      rule("pull_request", [pattern({ workflows: [workflow("opened.yml")] })], ["opened", "reopened"]),
      rule("pull_request", [pattern({ workflows: [workflow("closed.yml")] })], ["closed"]),
      rule("pull_request", [pattern({ workflows: [workflow("any.yml")] })]),
    ];

    expect(resolveWorkflows(makeEvent({ action: "closed" }), rules).map((w) => w.workflowFile)).toEqual([
      "closed.yml",
      "any.yml",
    ]);
  });

  test("an empty action set matches no action", () => {
    const rules = [rule("pull_request", [pattern({ workflows: [workflow("never.yml")] })], [])];
    expect(resolveWorkflows(makeEvent(), rules)).toEqual([]);
  });

  test("requires owner and repository globs to match", () => {
    const rules = [
      rule("pull_request", [
        pattern({ ownerPattern: "other-org", workflows: [workflow("owner.yml")] }),
        pattern({ repositoryPattern: "app-billing", workflows: [workflow("exact.yml")] }),
      ]),
    ];
    expect(resolveWorkflows(makeEvent(), rules).map((w) => w.workflowFile)).toEqual(["exact.yml"]);
  });

  test("single branch constraints use the base branch of pull requests", () => {
    const branches: BranchConstraint = { kind: "single", pattern: "main" };
    const rules = [rule("pull_request", [pattern({ branches, workflows: [workflow("pr.yml")] })])];

    expect(resolveWorkflows(makeEvent(), rules)).toHaveLength(1);
    expect(resolveWorkflows(makeEvent({ headBranch: "main", baseBranch: "develop" }), rules)).toEqual([]);
  });

  test("structured constraints without patterns are skipped with a warning", () => {
    const { logger, entries } = createCapturingLogger();
    const rules = [
      rule("pull_request", [
        pattern({ branches: { kind: "structured" }, workflows: [workflow("dead.yml")] }),
        pattern({ workflows: [workflow("live.yml")] }),
      ]),
    ];

    const result = resolveWorkflows(makeEvent(), rules, logger);

    expect(result.map((w) => w.workflowFile)).toEqual(["live.yml"]);
    const warnings = entries.filter((entry) => entry.level === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.msg).toBe(
      "Repository pattern skipped: structured branch constraint has neither base nor head patterns",
    );
    expect(warnings[0]).toMatchObject({ ruleIndex: 0, patternIndex: 0, deliveryId: "delivery-1" });
  });

  test("structured constraints never match push events", () => {
    const { logger, entries } = createCapturingLogger();
    const push = makeEvent({
      eventType: "push",
      action: "",
      headBranch: "main",
      baseBranch: "",
      changedFiles: FILES(["src/app.ts"]),
    });
    const rules = [
      rule("push", [pattern({ branches: { kind: "structured", head: ["*"] }, workflows: [workflow("push.yml")] })]),
    ];

    expect(resolveWorkflows(push, rules, logger)).toEqual([]);
    expect(entries.find((entry) => entry.level === 40)?.msg).toBe(
      "Repository pattern skipped: structured branch constraints are not supported for push events",
    );
  });

  test("file patterns filter push events", () => {
    const rules = [
      rule("push", [
        pattern({ filePatterns: ["src/*"], workflows: [workflow("build.yml")] }),
        pattern({ filePatterns: ["docs/*", "*.md"], workflows: [workflow("docs.yml")] }),
      ]),
    ];

    const codePush = makeEvent({ eventType: "push", action: "", changedFiles: FILES(["src/lib/util.ts"]) });
    expect(resolveWorkflows(codePush, rules).map((w) => w.workflowFile)).toEqual(["build.yml"]);

    const docsPush = makeEvent({ eventType: "push", action: "", changedFiles: FILES(["README.md"]) });
    expect(resolveWorkflows(docsPush, rules).map((w) => w.workflowFile)).toEqual(["docs.yml"]);

    const emptyPush = makeEvent({ eventType: "push", action: "", changedFiles: FILES([]) });
    expect(resolveWorkflows(emptyPush, rules)).toEqual([]);
  });

  test("file patterns are ignored for other event types", () => {
    const rules = [
      rule("pull_request", [pattern({ filePatterns: ["src/*"], workflows: [workflow("pr.yml")] })]),
    ];
    expect(resolveWorkflows(makeEvent(), rules)).toHaveLength(1);
  });

  test("logs each matched pattern at debug level", () => {
    const { logger, entries } = createCapturingLogger();
    const rules = [rule("pull_request", [pattern({ workflows: [workflow("a.yml"), workflow("b.yml")] })])];

    resolveWorkflows(makeEvent(), rules, logger);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 20,
      msg: "Repository pattern matched",
      ruleIndex: 0,
      patternIndex: 0,
      owner: "acme",
      repository: "app-billing",
      workflowCount: 2,
    });
  });
});
