import { Hono } from "hono";
import type { Logger } from "pino";
import type { GitHubApp } from "../auth/github-app.ts";
import type { DispatchQueue } from "../jobs/types.ts";
import type { MappingConfig } from "../mapping/types.ts";

interface HealthRouteDeps {
  githubApp: Pick<GitHubApp, "checkConnectivity">;
  dispatchQueue: Pick<DispatchQueue, "activeKeys">;
  loadMappingConfig: () => Promise<MappingConfig>;
  logger: Logger;
}

export function createHealthRoutes(deps: HealthRouteDeps): Hono {
  const { githubApp, dispatchQueue, loadMappingConfig, logger } = deps;
  const app = new Hono();

  app.get("/healthz", (c) => c.json({ status: "ok" }));

  // Ready when the mapping file loads and GitHub answers
  app.get("/readiness", async (c) => {
    let ruleCount: number;
    try {
      ruleCount = (await loadMappingConfig()).eventMappings.length;
    } catch (err) {
      logger.warn({ err }, "Readiness check failed: mapping config unavailable");
      return c.json({ status: "not ready", reason: "Mapping config unavailable" }, 503);
    }

    if (!(await githubApp.checkConnectivity())) {
      logger.warn("Readiness check failed: GitHub API unreachable");
      return c.json({ status: "not ready", reason: "GitHub API unreachable" }, 503);
    }

    return c.json({ status: "ready", rules: ruleCount, activeDispatchQueues: dispatchQueue.activeKeys() });
  });

  return app;
}
