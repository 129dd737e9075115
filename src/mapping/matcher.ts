import picomatch from "picomatch";
import type { BranchConstraint, CanonicalEvent } from "./types.ts";

/**
 * picomatch in bash mode, so `*` crosses `/`. Dot files are ordinary names,
 * and brace, extglob and leading-`!` syntax stays literal.
 */
const GLOB_OPTIONS = {
  bash: true,
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
} as const;

const ONLY_STARS = /^\*+$/;

/** picomatch syntax that a shell glob treats as plain text */
const LITERAL_CHARS = new Set(["(", ")", "|", "+", "@"]);

/** Index of the `]` closing the bracket expression opened at `start`, or -1. */
function bracketEnd(pattern: string, start: number): number {
  let index = start + 1;
  if (pattern[index] === "!" || pattern[index] === "^") index++;
  // A `]` right after the opening bracket is a member, not the end
  if (pattern[index] === "]") index++;
  return pattern.indexOf("]", index);
}

/**
 * Rewrites a shell glob into an equivalent picomatch pattern. `?` matches
 * any single character including `/`, and characters picomatch would read
 * as groups or alternation (or a leading `./` it would strip) are wrapped
 * in brackets. Bracket expressions pass through, with `[!` spelled `[^`.
 */
export function toPicomatchPattern(pattern: string): string {
  let result = "";
  let index = 0;

  while (index < pattern.length) {
    const char = pattern[index];

    if (char === "[") {
      const end = bracketEnd(pattern, index);
      if (end === -1) {
        result += "[[]";
        index++;
        continue;
      }
      const body = pattern.slice(index + 1, end);
      result += `[${body.startsWith("!") ? `^${body.slice(1)}` : body}]`;
      index = end + 1;
      continue;
    }

    if (char === "?") {
      result += "[\\s\\S]";
    } else if (LITERAL_CHARS.has(char) || (index === 0 && char === ".")) {
      result += `[${char}]`;
    } else {
      result += char;
    }
    index++;
  }

  return result;
}

/**
 * Shell-style glob match of a whole string: `*` matches any run of
 * characters, `?` exactly one, `[...]` one character from a set, and
 * everything else only itself.
 *
 * Empty strings are compared literally: an empty pattern matches only the
 * empty value, and the empty value matches only patterns made of `*`.
 * Patterns picomatch cannot compile match nothing.
 */
export function matchGlob(value: string, pattern: string): boolean {
  if (pattern === "") return value === "";
  if (value === "") return ONLY_STARS.test(pattern);

  try {
    return picomatch(toPicomatchPattern(pattern), GLOB_OPTIONS)(value);
  } catch {
    return false;
  }
}

export function matchAny(value: string, patterns: ReadonlyArray<string>): boolean {
  return patterns.some((pattern) => matchGlob(value, pattern));
}

/**
 * The branch that single and list constraints are checked against: the
 * destination branch for pull requests, the head branch for everything else.
 */
export function primaryBranch(event: CanonicalEvent): string {
  return event.eventType === "pull_request" ? event.baseBranch : event.headBranch;
}

function hasPatterns(patterns: ReadonlyArray<string> | undefined): patterns is ReadonlyArray<string> {
  return patterns !== undefined && patterns.length > 0;
}

/**
 * Returns a configuration warning when the constraint can never match for
 * this event type, otherwise undefined.
 */
export function describeBranchConstraintProblem(
  eventType: string,
  constraint: BranchConstraint,
): string | undefined {
  if (constraint.kind !== "structured") return undefined;

  if (!hasPatterns(constraint.base) && !hasPatterns(constraint.head)) {
    return "structured branch constraint has neither base nor head patterns";
  }
  if (eventType === "push") {
    return "structured branch constraints are not supported for push events";
  }
  return undefined;
}

export function matchesBranches(event: CanonicalEvent, constraint: BranchConstraint): boolean {
  switch (constraint.kind) {
    case "wildcard":
      return true;
    case "single":
      return matchGlob(primaryBranch(event), constraint.pattern);
    case "list":
      return matchAny(primaryBranch(event), constraint.patterns);
    case "structured": {
      if (describeBranchConstraintProblem(event.eventType, constraint) !== undefined) {
        return false;
      }
      if (hasPatterns(constraint.base) && !matchAny(event.baseBranch, constraint.base)) {
        return false;
      }
      if (hasPatterns(constraint.head) && !matchAny(event.headBranch, constraint.head)) {
        return false;
      }
      return true;
    }
  }
}

/** True when no file patterns are configured or any changed path matches one. */
export function matchesFiles(
  changedFiles: Iterable<string>,
  patterns: ReadonlyArray<string>,
): boolean {
  if (patterns.length === 0) return true;

  for (const file of changedFiles) {
    if (matchAny(file, patterns)) return true;
  }
  return false;
}
