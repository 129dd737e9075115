/**
 * Resolve-event CLI
 *
 * Runs a saved webhook payload through normalization and workflow resolution
 * against a mapping file and prints the dispatch requests that would be sent.
 * Nothing is dispatched.
 *
 * Usage: tsx scripts/resolve-event.ts --event pull_request --payload ./pr.json [options]
 */
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { createLogger } from "../src/lib/logger.ts";
import { loadMappingConfig } from "../src/mapping/config.ts";
import { resolveMessage } from "../src/mapping/dispatch-request.ts";
import type { CanonicalEvent, DispatchRequest, EventMessage } from "../src/mapping/types.ts";
import { parseQueueRecord } from "../src/processor/message.ts";

const DEFAULT_CONFIG_PATH = "./config/event-mappings.json";

export interface ResolveCliValues {
  help: boolean;
  json: boolean;
  verbose: boolean;
  config: string;
  event?: string;
  action?: string;
  delivery?: string;
  payload?: string;
  message?: string;
}

export interface ResolveReport {
  event: CanonicalEvent;
  requests: DispatchRequest[];
}

export function parseResolveCliArgs(args: string[]): ResolveCliValues {
  const { values } = parseArgs({
    args,
    options: {
      help: { type: "boolean", short: "h", default: false },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      config: { type: "string", short: "c", default: DEFAULT_CONFIG_PATH },
      event: { type: "string", short: "e" },
      action: { type: "string", short: "a" },
      delivery: { type: "string", short: "d" },
      payload: { type: "string", short: "p" },
      message: { type: "string", short: "m" },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    help: values.help ?? false,
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    config: values.config ?? DEFAULT_CONFIG_PATH,
    event: values.event,
    action: values.action,
    delivery: values.delivery,
    payload: values.payload,
    message: values.message,
  };
}

function printUsage(): void {
  console.log(`Resolve a webhook payload against an event mapping file (dry run)

Usage:
  tsx scripts/resolve-event.ts --event <type> --payload <file> [options]
  tsx scripts/resolve-event.ts --message <file> [options]

Options:
  -c, --config <file>     mapping file, JSON or YAML (default: ${DEFAULT_CONFIG_PATH})
  -e, --event <type>      webhook event type (X-GitHub-Event)
  -a, --action <action>   payload action (default: payload.action)
  -d, --delivery <id>     delivery id (default: "local")
  -p, --payload <file>    raw webhook payload JSON
  -m, --message <file>    queue message JSON ({event_type, action, delivery_id, payload})
      --json              print the canonical event and requests as JSON
  -v, --verbose           log matcher decisions to stderr
  -h, --help              show this help`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readMessage(values: ResolveCliValues): Promise<EventMessage> {
  if (values.message) {
    const body = await readFile(resolve(values.message), "utf8");
    return parseQueueRecord({ messageId: values.message, body });
  }

  if (!values.event || !values.payload) {
    throw new Error("Either --message or both --event and --payload are required");
  }

  const payload: unknown = JSON.parse(await readFile(resolve(values.payload), "utf8"));
  if (!isRecord(payload)) {
    throw new Error(`Payload file ${values.payload} must contain a JSON object`);
  }

  return {
    eventType: values.event,
    action: values.action ?? (typeof payload.action === "string" ? payload.action : ""),
    deliveryId: values.delivery ?? "local",
    payload,
  };
}

export async function resolveFromFiles(values: ResolveCliValues): Promise<ResolveReport> {
  const logger = values.verbose
    ? createLogger({ level: "debug", destination: process.stderr })
    : undefined;
  const config = await loadMappingConfig(resolve(values.config), logger);
  const message = await readMessage(values);
  return resolveMessage(message, config, logger);
}

export function renderResolveReport(report: ResolveReport, options: { json?: boolean } = {}): string {
  const { event, requests } = report;

  if (options.json) {
    return JSON.stringify(
      {
        event: {
          ...event,
          changedFiles: event.changedFiles ? [...event.changedFiles].sort() : undefined,
        },
        requests,
      },
      null,
      2,
    );
  }

  const eventKey = event.action ? `${event.eventType}.${event.action}` : event.eventType;
  const lines = [
    `Event: ${eventKey} (delivery ${event.deliveryId || "-"})`,
    `Repository: ${event.repo.owner}/${event.repo.name}`,
    `Head: ${event.headBranch || "-"} @ ${event.headSha || "-"}`,
    `Base: ${event.baseBranch || "-"} @ ${event.baseSha || "-"}`,
  ];
  if (event.prNumber) lines.push(`Pull request: #${event.prNumber}`);
  if (event.changedFiles) lines.push(`Changed files: ${event.changedFiles.size}`);

  lines.push("", `Dispatches: ${requests.length}`);
  for (const [index, request] of requests.entries()) {
    lines.push(
      `  ${index + 1}. ${request.owner}/${request.repository} ${request.workflowFile} @ ${request.ref} ${JSON.stringify(request.inputs)}`,
    );
  }

  return lines.join("\n");
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const values = parseResolveCliArgs(args);
  if (values.help) {
    printUsage();
    return 0;
  }

  const report = await resolveFromFiles(values);
  console.log(renderResolveReport(report, { json: values.json }));
  return 0;
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(`resolve-event failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
}
