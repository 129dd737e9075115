import { describe, expect, test } from "vitest";
import {
  extractRepoInfo,
  isKnownEventType,
  normalizeEvent,
  stripHeadsPrefix,
} from "./normalizer.ts";
import type { EventMessage } from "./types.ts";

const REPOSITORY = { owner: { login: "acme" }, name: "widgets" };

function message(eventType: string, payload: Record<string, unknown>, action = ""): EventMessage {
  return { eventType, action, deliveryId: "delivery-1", payload };
}

describe("stripHeadsPrefix", () => {
  test("removes refs/heads/ only", () => {
    expect(stripHeadsPrefix("refs/heads/main")).toBe("main");
    expect(stripHeadsPrefix("refs/heads/feature/x")).toBe("feature/x");
    expect(stripHeadsPrefix("refs/tags/v1.0.0")).toBe("refs/tags/v1.0.0");
    expect(stripHeadsPrefix("main")).toBe("main");
  });
});

describe("extractRepoInfo", () => {
  test("reads owner login and name", () => {
    expect(extractRepoInfo({ repository: REPOSITORY })).toEqual({ owner: "acme", name: "widgets" });
  });

  test("falls back to empty strings", () => {
    expect(extractRepoInfo({})).toEqual({ owner: "", name: "" });
    expect(extractRepoInfo({ repository: "acme/widgets" })).toEqual({ owner: "", name: "" });
    expect(extractRepoInfo({ repository: { owner: null, name: "widgets" } })).toEqual({
      owner: "",
      name: "widgets",
    });
  });
});

describe("normalizeEvent", () => {
  test("push collects the union of changed paths across commits", () => {
    const event = normalizeEvent(
      message("push", {
        ref: "refs/heads/main",
        after: "abc123",
        repository: REPOSITORY,
        commits: [
          { added: ["a"], modified: ["b", "c"], removed: ["d"] },
          { added: [], modified: ["e"], removed: [] },
        ],
      }),
    );

    expect(event.headBranch).toBe("main");
    expect(event.headSha).toBe("abc123");
    expect(event.baseBranch).toBe("");
    expect(event.prNumber).toBe("");
    expect(event.repo).toEqual({ owner: "acme", name: "widgets" });
    expect(event.changedFiles).toEqual(new Set(["a", "b", "c", "d", "e"]));
  });

  test("push de-duplicates paths touched by several commits", () => {
    const event = normalizeEvent(
      message("push", {
        ref: "refs/heads/main",
        commits: [
          { added: ["src/app.ts"], modified: [], removed: [] },
          { added: [], modified: ["src/app.ts"], removed: [] },
          { added: [], modified: [], removed: ["src/app.ts"] },
        ],
      }),
    );

    expect(event.changedFiles?.size).toBe(1);
    expect(event.changedFiles?.has("src/app.ts")).toBe(true);
  });

  test("push skips malformed commit entries", () => {
    const event = normalizeEvent(
      message("push", {
        ref: "refs/heads/main",
        commits: [{ added: ["a", 3, null], modified: "b", removed: undefined }, "not-a-commit"],
      }),
    );

    expect(event.changedFiles).toEqual(new Set(["a"]));
  });

  test("push keeps tag refs unchanged", () => {
    const event = normalizeEvent(message("push", { ref: "refs/tags/v2.0.0", commits: [] }));
    expect(event.headBranch).toBe("refs/tags/v2.0.0");
    expect(event.changedFiles).toEqual(new Set());
  });

  test("merge_group strips both refs and leaves pr_number empty", () => {
    const event = normalizeEvent(
      message(
        "merge_group",
        {
          repository: REPOSITORY,
          merge_group: {
            head_ref: "refs/heads/gh-readonly-queue/R1-2025/pr-42-abc123",
            base_ref: "refs/heads/R1-2025",
            head_sha: "abc123",
            base_sha: "def456",
          },
        },
        "checks_requested",
      ),
    );

    expect(event.headBranch).toBe("gh-readonly-queue/R1-2025/pr-42-abc123");
    expect(event.baseBranch).toBe("R1-2025");
    expect(event.headSha).toBe("abc123");
    expect(event.baseSha).toBe("def456");
    expect(event.isMergeGroup).toBe("true");
    expect(event.prNumber).toBe("");
    expect(event.changedFiles).toBeUndefined();
  });

  test("merge_group id is empty when the payload has none", () => {
    const withoutId = normalizeEvent(
      message("merge_group", { merge_group: { head_sha: "abc123" } }),
    );
    expect(withoutId.eventId).toBe("");
    expect(withoutId.checkSuiteId).toBe("");
    expect(withoutId.headSha).toBe("abc123");

    const withId = normalizeEvent(
      message("merge_group", { merge_group: { id: 9001, head_sha: "abc123" } }),
    );
    expect(withId.eventId).toBe("9001");
    expect(withId.checkSuiteId).toBe("9001");
  });

  test("pull_request copies head/base and stringifies number and merged", () => {
    const event = normalizeEvent(
      message(
        "pull_request",
        {
          repository: REPOSITORY,
          pull_request: {
            id: 1001,
            number: 42,
            merged: true,
            head: { ref: "feature/x", sha: "abc123" },
            base: { ref: "main", sha: "def456" },
          },
        },
        "closed",
      ),
    );

    expect(event).toMatchObject({
      eventType: "pull_request",
      action: "closed",
      deliveryId: "delivery-1",
      headBranch: "feature/x",
      baseBranch: "main",
      headSha: "abc123",
      baseSha: "def456",
      prNumber: "42",
      merged: "true",
      isMergeGroup: "false",
      eventId: "1001",
      checkSuiteId: "",
    });
  });

  test("pull_request with missing sub-objects degrades to defaults", () => {
    const event = normalizeEvent(message("pull_request", { pull_request: { number: 7, merged: "yes" } }));

    expect(event.prNumber).toBe("7");
    expect(event.merged).toBe("false");
    expect(event.headBranch).toBe("");
    expect(event.baseSha).toBe("");
  });

  test("check_suite takes the base branch from the first pull request", () => {
    const event = normalizeEvent(
      message("check_suite", {
        repository: REPOSITORY,
        check_suite: {
          id: 555,
          head_branch: "feature/x",
          head_sha: "abc123",
          pull_requests: [
            { number: 7, base: { ref: "main", sha: "def456" } },
            { number: 8, base: { ref: "develop", sha: "fff000" } },
          ],
        },
      }),
    );

    expect(event.headBranch).toBe("feature/x");
    expect(event.headSha).toBe("abc123");
    expect(event.prNumber).toBe("7");
    expect(event.baseBranch).toBe("main");
    expect(event.baseSha).toBe("def456");
    expect(event.eventId).toBe("555");
    expect(event.checkSuiteId).toBe("555");
  });

  test("check_suite without pull requests leaves base fields empty", () => {
    const event = normalizeEvent(
      message("check_suite", {
        check_suite: { id: 555, head_branch: "main", head_sha: "abc123", pull_requests: [] },
      }),
    );

    expect(event.prNumber).toBe("");
    expect(event.baseBranch).toBe("");
    expect(event.baseSha).toBe("");
  });

  test("check_run falls back to its suite's head branch", () => {
    const event = normalizeEvent(
      message("check_run", {
        check_run: {
          id: 77,
          head_branch: null,
          head_sha: "abc123",
          check_suite: { head_branch: "feature/y" },
        },
      }),
    );

    expect(event.headBranch).toBe("feature/y");
    expect(event.eventId).toBe("77");
    expect(event.checkSuiteId).toBe("77");
  });

  test("unknown event types only carry the envelope and repository", () => {
    const event = normalizeEvent(message("issues", { repository: REPOSITORY, issue: { number: 3 } }, "opened"));

    expect(event).toEqual({
      eventType: "issues",
      action: "opened",
      deliveryId: "delivery-1",
      repo: { owner: "acme", name: "widgets" },
      headBranch: "",
      baseBranch: "",
      headSha: "",
      baseSha: "",
      prNumber: "",
      merged: "false",
      isMergeGroup: "false",
      eventId: "",
      checkSuiteId: "",
    });
  });

  test("never throws on payloads of the wrong shape", () => {
    for (const eventType of ["push", "merge_group", "pull_request", "check_suite", "check_run"]) {
      const event = normalizeEvent(
        message(eventType, { repository: [], [eventType]: "garbage", commits: { not: "a list" } }),
      );
      expect(event.eventType).toBe(eventType);
      expect(event.repo).toEqual({ owner: "", name: "" });
      expect(event.headBranch).toBe("");
    }
  });
});

describe("isKnownEventType", () => {
  test("recognizes the normalized event types only", () => {
    expect(isKnownEventType("push")).toBe(true);
    expect(isKnownEventType("check_run")).toBe(true);
    expect(isKnownEventType("issues")).toBe(false);
    expect(isKnownEventType("toString")).toBe(false);
  });
});
