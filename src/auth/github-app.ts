import { Octokit } from "@octokit/rest";
import { createAppAuth } from "@octokit/auth-app";
import type { Logger } from "pino";
import type { AppConfig } from "../config.ts";
import type {
  CheckRunApi,
  ChecksClientProvider,
  DispatchClientProvider,
  WorkflowDispatchApi,
} from "../dispatch/types.ts";
import { RepositoryNotInstalledError } from "../lib/errors.ts";
import { createInMemoryCache } from "../lib/in-memory-cache.ts";

const INSTALLATION_CACHE_TTL_MS = 10 * 60 * 1000;
const INSTALLATION_CACHE_MAX = 500;

export interface GitHubApp extends DispatchClientProvider, ChecksClientProvider {
  /** Fetch and log the app identity. Must be called before other methods. */
  initialize(): Promise<void>;
  /** Check GitHub API connectivity. Caches result for 30 seconds. */
  checkConnectivity(): Promise<boolean>;
  /**
   * Installation id that can act on owner/repo: the configured fixed
   * installation, or the one GitHub reports for the repository (cached).
   * Null when the app is not installed there.
   */
  getRepoInstallationId(owner: string, repo: string): Promise<number | null>;
}

type AppConfigSubset = Pick<AppConfig, "githubAppId" | "githubPrivateKey" | "githubInstallationId">;

function hasStatusCode(error: unknown, statusCode: number): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === statusCode;
}

export function createGitHubApp(config: AppConfigSubset, logger: Logger): GitHubApp {
  // Connectivity check cache (30-second TTL)
  let lastCheckTime = 0;
  let lastCheckResult = false;
  const CONNECTIVITY_CACHE_MS = 30_000;

  // Workflow targets are often a different repository than the webhook source,
  // so installations are looked up per target and remembered for a while.
  const installationCache = createInMemoryCache<string, number | null>({
    maxSize: INSTALLATION_CACHE_MAX,
    ttlMs: INSTALLATION_CACHE_TTL_MS,
  });

  // App-level Octokit for non-installation API calls (getAuthenticated, installation lookup)
  const appOctokit = new Octokit({
    authStrategy: createAppAuth,
    auth: {
      appId: config.githubAppId,
      privateKey: config.githubPrivateKey,
    },
  });

  async function getInstallationOctokit(installationId: number): Promise<Octokit> {
    logger.debug({ installationId }, "Creating installation Octokit client");

    // Create a fresh Octokit per call; auth-app handles token caching internally
    return new Octokit({
      authStrategy: createAppAuth,
      auth: {
        appId: config.githubAppId,
        privateKey: config.githubPrivateKey,
        installationId,
      },
    });
  }

  async function lookupInstallationId(owner: string, repo: string): Promise<number | null> {
    try {
      const response = await appOctokit.rest.apps.getRepoInstallation({ owner, repo });
      logger.debug({ owner, repo, installationId: response.data.id }, "Resolved repository installation");
      return response.data.id;
    } catch (error) {
      if (hasStatusCode(error, 404)) {
        logger.warn({ owner, repo }, "Repository not installed for this GitHub App");
        return null;
      }
      throw error;
    }
  }

  async function getRepoInstallationId(owner: string, repo: string): Promise<number | null> {
    if (config.githubInstallationId !== undefined) {
      return config.githubInstallationId;
    }
    return installationCache.getOrLoad(`${owner}/${repo}`.toLowerCase(), () =>
      lookupInstallationId(owner, repo),
    );
  }

  async function getRepoOctokit(owner: string, repo: string): Promise<Octokit> {
    const installationId = await getRepoInstallationId(owner, repo);
    if (installationId === null) {
      throw new RepositoryNotInstalledError(owner, repo);
    }
    return getInstallationOctokit(installationId);
  }

  return {
    getRepoInstallationId,

    async initialize(): Promise<void> {
      // Authenticate as the app (JWT) and fetch identity
      const response = await appOctokit.rest.apps.getAuthenticated();
      const data = response.data;
      if (!data) {
        throw new Error("GitHub App getAuthenticated returned no data");
      }
      const appSlug = data.slug ?? String(data.id);

      logger.info({ slug: appSlug }, `GitHub App authenticated as ${appSlug}`);

      // Prime connectivity cache on successful init
      lastCheckTime = Date.now();
      lastCheckResult = true;
    },

    async checkConnectivity(): Promise<boolean> {
      const now = Date.now();
      if (now - lastCheckTime < CONNECTIVITY_CACHE_MS) {
        return lastCheckResult;
      }

      try {
        await appOctokit.rest.apps.getAuthenticated();
        lastCheckResult = true;
      } catch (err) {
        logger.debug({ err }, "GitHub connectivity check failed");
        lastCheckResult = false;
      }

      lastCheckTime = Date.now();
      return lastCheckResult;
    },

    async getDispatchClient(owner: string, repo: string): Promise<WorkflowDispatchApi> {
      const octokit = await getRepoOctokit(owner, repo);
      return octokit.rest.actions;
    },

    async getChecksClient(owner: string, repo: string): Promise<CheckRunApi> {
      const octokit = await getRepoOctokit(owner, repo);
      return octokit.rest.checks;
    },
  };
}
