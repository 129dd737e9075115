const TOKEN_PATTERNS: ReadonlyArray<RegExp> = [
  /\bghp_[A-Za-z0-9]{36}\b/g,
  /\bgho_[A-Za-z0-9]{36}\b/g,
  /\bghs_[A-Za-z0-9]{36}\b/g,
  /\bghr_[A-Za-z0-9]{36}\b/g,
  /\bghu_[A-Za-z0-9]{36}\b/g,
  /\bgithub_pat_[A-Za-z0-9_]{11,221}\b/g,
];

/**
 * Redact GitHub tokens (classic, OAuth, installation, refresh, user-to-server
 * and fine-grained) from text that may end up in logs or batch results.
 */
export function redactGitHubTokens(content: string): string {
  let redacted = content;
  for (const pattern of TOKEN_PATTERNS) {
    redacted = redacted.replace(pattern, "[REDACTED_GITHUB_TOKEN]");
  }
  return redacted;
}

