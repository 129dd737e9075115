import type { Logger } from "pino";
import {
  describeBranchConstraintProblem,
  matchGlob,
  matchesBranches,
  matchesFiles,
} from "./matcher.ts";
import type { CanonicalEvent, MappingRule, RepoPattern, WorkflowSpec } from "./types.ts";

function ruleApplies(rule: MappingRule, event: CanonicalEvent): boolean {
  if (rule.eventType !== event.eventType) return false;
  return rule.actions === undefined || rule.actions.has(event.action);
}

function patternMatches(
  pattern: RepoPattern,
  event: CanonicalEvent,
  location: { ruleIndex: number; patternIndex: number },
  logger?: Logger,
): boolean {
  if (!matchGlob(event.repo.owner, pattern.ownerPattern)) return false;
  if (!matchGlob(event.repo.name, pattern.repositoryPattern)) return false;

  const problem = describeBranchConstraintProblem(event.eventType, pattern.branches);
  if (problem) {
    logger?.warn(
      { ...location, eventType: event.eventType, deliveryId: event.deliveryId },
      `Repository pattern skipped: ${problem}`,
    );
    return false;
  }
  if (!matchesBranches(event, pattern.branches)) return false;

  if (event.eventType === "push" && !matchesFiles(event.changedFiles ?? [], pattern.filePatterns)) {
    return false;
  }
  return true;
}

/**
 * Collect the workflows of every repository pattern that matches the event.
 *
 * Every matching pattern of every applicable rule contributes, in config
 * order; nothing is de-duplicated.
 */
export function resolveWorkflows(
  event: CanonicalEvent,
  rules: ReadonlyArray<MappingRule>,
  logger?: Logger,
): WorkflowSpec[] {
  const matched: WorkflowSpec[] = [];

  for (const [ruleIndex, rule] of rules.entries()) {
    if (!ruleApplies(rule, event)) continue;

    for (const [patternIndex, pattern] of rule.repositoryPatterns.entries()) {
      if (!patternMatches(pattern, event, { ruleIndex, patternIndex }, logger)) continue;

      logger?.debug(
        {
          ruleIndex,
          patternIndex,
          owner: event.repo.owner,
          repository: event.repo.name,
          workflowCount: pattern.workflows.length,
        },
        "Repository pattern matched",
      );
      matched.push(...pattern.workflows);
    }
  }

  return matched;
}
