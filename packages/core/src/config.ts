import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { DEFAULT_CATALOG_DELIMITER } from "./catalog.js";

export const DEFAULT_SLEEP_MS = 60_000;
export const DEFAULT_ERROR_BACKOFF_MS = 60_000;
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_LOG_FILE = "/tmp/wallshade-select.log";
export const DEFAULT_PID_FILE = "/tmp/wallshade-select.pid";

export function defaultConfigPath(): string {
  return join(homedir(), ".config", "wallshade", "config.yaml");
}

/** Values a config file may set. Everything is optional; flags win over these. */
export interface ConfigFileValues {
  input?: string;
  delimiter?: string;
  exec?: string;
  sleepMs?: number;
  errorBackoffMs?: number;
  pollIntervalMs?: number;
  logFile?: string;
  pidFile?: string;
  telemetryPath?: string;
}

function stripInlineComment(value: string): string {
  const index = value.indexOf(" #");
  if (index === -1) return value.trim();
  return value.slice(0, index).trim();
}

/** Nested `key: value` YAML mappings flattened to dotted paths. Lists and anchors are not supported. */
export function parseYamlScalars(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  const stack: Array<{ indent: number; key: string }> = [];

  for (const rawLine of content.split("\n")) {
    const line = rawLine.replace(/\t/g, "  ").replace(/\r$/, "");
    if (!line.trim() || line.trim().startsWith("#")) continue;

    const match = line.match(/^(\s*)([A-Za-z0-9_-]+):\s*(.*)$/);
    if (!match) continue;

    const indent = match[1].length;
    const key = match[2];
    const remainder = stripInlineComment(match[3]);

    while (stack.length > 0 && indent <= stack[stack.length - 1].indent) {
      stack.pop();
    }

    if (!remainder) {
      stack.push({ indent, key });
      continue;
    }

    const value = remainder.replace(/^["']|["']$/g, "");
    const path = [...stack.map((node) => node.key), key].join(".");
    result[path] = value;
  }

  return result;
}

function readPositiveInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function readString(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export function configValuesFromScalars(scalars: Record<string, string>): ConfigFileValues {
  return {
    input: readString(scalars["catalog.path"]),
    delimiter: readString(scalars["catalog.delimiter"]),
    exec: readString(scalars["action.exec"]),
    sleepMs: readPositiveInt(scalars["loop.sleep_ms"]),
    errorBackoffMs: readPositiveInt(scalars["loop.error_backoff_ms"]),
    pollIntervalMs: readPositiveInt(scalars["loop.poll_interval_ms"]),
    logFile: readString(scalars["daemon.log_file"]),
    pidFile: readString(scalars["daemon.pid_file"]),
    telemetryPath: readString(scalars["telemetry.path"]),
  };
}

/**
 * Read a config file. Returns undefined when the file does not exist;
 * unreadable files propagate their error to the caller.
 */
export function readConfigFile(path: string): ConfigFileValues | undefined {
  if (!existsSync(path)) return undefined;
  const content = readFileSync(path, "utf-8");
  return configValuesFromScalars(parseYamlScalars(content));
}

// ─── Merged options ──────────────────────────────────────────────────────────

export const schedulerOptionsSchema = z.object({
  input: z
    .string({ required_error: "--input is required" })
    .min(1, "--input is required"),
  exec: z.string().default(""),
  daemon: z.boolean().default(false),
  loop: z.boolean().default(false),
  sleepMs: z.number().int().positive().default(DEFAULT_SLEEP_MS),
  errorBackoffMs: z.number().int().positive().default(DEFAULT_ERROR_BACKOFF_MS),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  delimiter: z
    .string()
    .length(1, "catalog delimiter must be a single character")
    .default(DEFAULT_CATALOG_DELIMITER),
  logFile: z.string().min(1).default(DEFAULT_LOG_FILE),
  pidFile: z.string().min(1).default(DEFAULT_PID_FILE),
  telemetryPath: z.string().min(1).optional(),
  /** Stop after this many selections. */
  count: z.number().int().positive().optional(),
});

export type SchedulerOptions = z.infer<typeof schedulerOptionsSchema>;
export type SchedulerOptionsInput = z.input<typeof schedulerOptionsSchema>;

export type SchedulerOptionsResult =
  | { ok: true; value: SchedulerOptions }
  | { ok: false; error: string };

/** Defaults, then config file, then flags. Unset (undefined) values fall through. */
export function resolveSchedulerOptions(
  fromFile: ConfigFileValues,
  fromFlags: Partial<SchedulerOptionsInput>,
): SchedulerOptionsResult {
  const merged: Partial<SchedulerOptionsInput> = { ...fromFile };
  for (const [key, value] of Object.entries(fromFlags)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  const parsed = schedulerOptionsSchema.safeParse(merged);
  if (parsed.success) return { ok: true, value: parsed.data };
  const message = parsed.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  return { ok: false, error: message };
}
