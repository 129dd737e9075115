import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import yaml from "js-yaml";
import type { Logger } from "pino";
import { z } from "zod";
import { MappingConfigError, errorMessage } from "../lib/errors.ts";
import { describeBranchConstraintProblem } from "./matcher.ts";
import type { BranchConstraint, MappingConfig, MappingRule, RepoPattern, WorkflowSpec } from "./types.ts";

/** workflow_dispatch inputs are strings; numbers and booleans in the file are stringified. */
const inputValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

/**
 * Read-only view over a private Set. It has no `add`, `delete` or `clear`,
 * so freezing the view freezes the membership too.
 */
function readonlySet<T>(values: Iterable<T>): ReadonlySet<T> {
  const set = new Set(values);
  const view: ReadonlySet<T> = {
    get size() {
      return set.size;
    },
    has: (value) => set.has(value),
    entries: () => set.entries(),
    keys: () => set.keys(),
    values: () => set.values(),
    forEach(callback, thisArg?: unknown) {
      for (const value of set) callback.call(thisArg, value, value, view);
    },
    [Symbol.iterator]: () => set.values(),
  };
  return view;
}

/** A single pattern is accepted wherever a list is. */
const patternListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

const branchesSchema = z
  .union([
    z.string(),
    z.array(z.string()),
    z
      .object({
        base: patternListSchema.optional(),
        head: patternListSchema.optional(),
      })
      .strict(),
  ])
  .default("*")
  .transform((value): BranchConstraint => {
    if (typeof value === "string") {
      return value === "*" ? { kind: "wildcard" } : { kind: "single", pattern: value };
    }
    if (Array.isArray(value)) {
      return { kind: "list", patterns: value };
    }
    return { kind: "structured", base: value.base, head: value.head };
  });

const workflowSchema = z
  .object({
    owner: z.string().min(1),
    repository: z.string().min(1),
    workflow_file: z.string().min(1),
    ref: z.string().min(1).default("main"),
    inputs: z.record(inputValueSchema).default({}),
  })
  .transform(
    (workflow): WorkflowSpec => ({
      owner: workflow.owner,
      repository: workflow.repository,
      workflowFile: workflow.workflow_file,
      ref: workflow.ref,
      inputs: workflow.inputs,
    }),
  );

const repoPatternSchema = z
  .object({
    owner: z.string().default("*"),
    repository: z.string().default("*"),
    branches: branchesSchema,
    file_patterns: z.array(z.string()).default([]),
    workflows: z.array(workflowSchema).default([]),
  })
  .transform(
    (pattern): RepoPattern => ({
      ownerPattern: pattern.owner,
      repositoryPattern: pattern.repository,
      branches: pattern.branches,
      filePatterns: pattern.file_patterns,
      workflows: pattern.workflows,
    }),
  );

const mappingRuleSchema = z
  .object({
    event_type: z.string().min(1),
    actions: z.array(z.string()).optional(),
    repository_patterns: z.array(repoPatternSchema).default([]),
  })
  .transform(
    (rule): MappingRule => ({
      eventType: rule.event_type,
      actions: rule.actions === undefined ? undefined : readonlySet(rule.actions),
      repositoryPatterns: rule.repository_patterns,
    }),
  );

const mappingConfigSchema = z.object({
  event_mappings: z.array(mappingRuleSchema).default([]),
});

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function warnAboutDeadPatterns(config: MappingConfig, logger: Logger): void {
  for (const [ruleIndex, rule] of config.eventMappings.entries()) {
    for (const [patternIndex, pattern] of rule.repositoryPatterns.entries()) {
      const problem = describeBranchConstraintProblem(rule.eventType, pattern.branches);
      if (problem) {
        logger.warn(
          { ruleIndex, patternIndex, eventType: rule.eventType },
          `Mapping config: ${problem}; pattern will never match`,
        );
      }
    }
  }
}

/**
 * Validate an already-parsed mapping document and convert it into the
 * immutable in-memory form.
 *
 * @throws MappingConfigError listing every schema violation as `path: message`
 */
export function parseMappingConfig(
  raw: unknown,
  options: { source?: string; logger?: Logger } = {},
): MappingConfig {
  const source = options.source ?? "<inline>";
  const result = mappingConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new MappingConfigError(source, issues);
  }

  const config: MappingConfig = deepFreeze({ eventMappings: result.data.event_mappings });
  if (options.logger) {
    warnAboutDeadPatterns(config, options.logger);
  }
  return config;
}

function parseDocument(raw: string, path: string): unknown {
  const ext = extname(path).toLowerCase();
  try {
    return ext === ".yml" || ext === ".yaml" ? yaml.load(raw) : JSON.parse(raw);
  } catch (err) {
    const format = ext === ".yml" || ext === ".yaml" ? "YAML" : "JSON";
    throw new MappingConfigError(path, [`${format} parse error: ${errorMessage(err)}`]);
  }
}

/**
 * Read the mapping file (JSON, or YAML for .yml/.yaml) and validate it.
 *
 * Loaded once per batch by the caller and passed down explicitly; nothing is
 * cached here.
 */
export async function loadMappingConfig(path: string, logger?: Logger): Promise<MappingConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new MappingConfigError(path, [`unable to read file: ${errorMessage(err)}`]);
  }

  const config = parseMappingConfig(parseDocument(raw, path), { source: path, logger });
  logger?.info(
    { path, ruleCount: config.eventMappings.length },
    "Mapping config loaded",
  );
  return config;
}

/** Event type / action pairs some rule can match; `undefined` actions means any action. */
export function listSubscriptions(config: MappingConfig): Map<string, ReadonlySet<string> | undefined> {
  const subscriptions = new Map<string, ReadonlySet<string> | undefined>();

  for (const rule of config.eventMappings) {
    if (subscriptions.has(rule.eventType) && subscriptions.get(rule.eventType) === undefined) {
      continue;
    }
    if (rule.actions === undefined) {
      subscriptions.set(rule.eventType, undefined);
      continue;
    }
    const merged = new Set(subscriptions.get(rule.eventType) ?? []);
    for (const action of rule.actions) merged.add(action);
    subscriptions.set(rule.eventType, merged);
  }

  return subscriptions;
}
