import { readFile } from "node:fs/promises";
import { z } from "zod";

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ["1", "true", "yes"].includes(value.trim().toLowerCase()));

const requiredString = (message: string) => z.string({ required_error: message }).min(1, message);

const configSchema = z.object({
  githubAppId: requiredString("GITHUB_APP_ID is required"),
  githubPrivateKey: requiredString("Private key is required"),
  webhookSecret: requiredString("GITHUB_WEBHOOK_SECRET is required"),
  githubInstallationId: z.coerce.number().int().positive().optional(),
  mappingConfigPath: z.string().min(1).default("./config/event-mappings.json"),
  port: z.coerce.number().default(3000),
  logLevel: z.string().default("info"),
  failOnAnyError: booleanFlag,
  dryRun: booleanFlag,
  reportCheckRuns: booleanFlag,
  dispatchConcurrency: z.coerce.number().int().min(1).max(20).default(1),
  batchMaxSize: z.coerce.number().int().min(1).max(100).default(10),
  batchFlushIntervalMs: z.coerce.number().int().min(0).default(1000),
  batchMaxAttempts: z.coerce.number().int().min(1).max(10).default(3),
});

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/**
 * Resolve GITHUB_PRIVATE_KEY: an inline PEM string, a path to a PEM file, or
 * a base64-encoded PEM.
 */
export async function loadPrivateKey(keyEnv: string | undefined): Promise<string> {
  if (!keyEnv) {
    throw new Error("GITHUB_PRIVATE_KEY environment variable is required");
  }

  // Inline PEM string
  if (keyEnv.startsWith("-----BEGIN")) {
    return keyEnv;
  }

  // File path
  if (keyEnv.startsWith("/") || keyEnv.startsWith("./")) {
    try {
      return await readFile(keyEnv, "utf8");
    } catch (err) {
      throw new Error(
        `Failed to read private key from file "${keyEnv}": ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  const decoded = Buffer.from(keyEnv, "base64").toString("utf8");
  if (!decoded.startsWith("-----BEGIN")) {
    throw new Error(
      "GITHUB_PRIVATE_KEY is not a valid PEM string, file path, or base64-encoded value",
    );
  }
  return decoded;
}

/**
 * Validate configuration values without touching the process. Empty strings
 * count as unset so optional variables fall back to their defaults.
 */
export function parseConfig(env: Env, privateKey: string): AppConfig {
  const value = (name: string): string | undefined => {
    const raw = env[name];
    return raw === undefined || raw.trim() === "" ? undefined : raw;
  };

  const result = configSchema.safeParse({
    githubAppId: value("GITHUB_APP_ID"),
    githubPrivateKey: privateKey,
    webhookSecret: value("GITHUB_WEBHOOK_SECRET"),
    githubInstallationId: value("GITHUB_INSTALLATION_ID"),
    mappingConfigPath: value("MAPPING_CONFIG_PATH"),
    port: value("PORT"),
    logLevel: value("LOG_LEVEL"),
    failOnAnyError: value("FAIL_ON_ANY_ERROR"),
    dryRun: value("DRY_RUN"),
    reportCheckRuns: value("REPORT_CHECK_RUNS"),
    dispatchConcurrency: value("DISPATCH_CONCURRENCY"),
    batchMaxSize: value("BATCH_MAX_SIZE"),
    batchFlushIntervalMs: value("BATCH_FLUSH_INTERVAL_MS"),
    batchMaxAttempts: value("BATCH_MAX_ATTEMPTS"),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}

export async function loadConfig(env: Env = process.env): Promise<AppConfig> {
  try {
    const privateKey = await loadPrivateKey(env.GITHUB_PRIVATE_KEY);
    return parseConfig(env, privateKey);
  } catch (err) {
    console.error(`FATAL: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
