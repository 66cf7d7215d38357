import type { SchedulerOptionsInput } from "@wallshade/core";

export type ControlCommand = "status" | "stop" | "next";

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string }
  | { kind: "control"; command: ControlCommand; configPath?: string; pidFile?: string }
  | { kind: "run"; configPath?: string; flags: Partial<SchedulerOptionsInput> };

export const USAGE = `Usage: wallshade-select [options]

Pick a wallpaper from a darkness-scored catalog to suit the time of day
(night = dark, day = bright) and pass it to a command.

Options:
  -i, --input <file.csv>     Catalog written by the darkness scorer (required)
  -e, --exec <command>       Run <command> <image> for each pick (e.g. plasma-apply-wallpaperimage)
  -d, --daemon               Detach and keep changing wallpapers in the background
  -l, --loop                 Keep changing wallpapers while attached; any key skips the wait
  -s, --sleep <ms>           Time between changes (default: 60000)
  -n, --count <n>            Stop after <n> changes
      --backoff <ms>         Wait after a failed pick (default: 60000)
      --poll-interval <ms>   Keypress check interval (default: 100)
      --delimiter <char>     Catalog field delimiter (default: ",")
      --config <file>        Config file (default: ~/.config/wallshade/config.yaml)
      --telemetry <file>     Append JSONL events to <file>
      --log-file <file>      Daemon log (default: /tmp/wallshade-select.log)
      --pid-file <file>      Daemon pid file (default: /tmp/wallshade-select.pid)
      --status               Report whether the daemon is running
      --stop                 Stop the running daemon
      --next                 Make the running daemon change wallpaper now
  -h, --help                 Show this help
  -V, --version              Show version`;

type StringOption = "input" | "exec" | "delimiter" | "telemetryPath" | "logFile" | "pidFile";

type IntegerOption = "sleepMs" | "errorBackoffMs" | "pollIntervalMs" | "count";

const VALUE_FLAGS = new Map<string, StringOption | "configPath">([
  ["-i", "input"],
  ["--input", "input"],
  ["-e", "exec"],
  ["--exec", "exec"],
  ["--delimiter", "delimiter"],
  ["--config", "configPath"],
  ["--telemetry", "telemetryPath"],
  ["--log-file", "logFile"],
  ["--pid-file", "pidFile"],
]);

const INTEGER_FLAGS = new Map<string, IntegerOption>([
  ["-s", "sleepMs"],
  ["--sleep", "sleepMs"],
  ["-n", "count"],
  ["--count", "count"],
  ["--backoff", "errorBackoffMs"],
  ["--poll-interval", "pollIntervalMs"],
]);

const CONTROL_FLAGS = new Map<string, ControlCommand>([
  ["--status", "status"],
  ["--stop", "stop"],
  ["--next", "next"],
]);

function parsePositiveInt(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const parsed = Number(raw);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/** `argv` without the node binary and script path. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: Partial<SchedulerOptionsInput> = {};
  let configPath: string | undefined;
  let control: ControlCommand | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") return { kind: "help" };
    if (arg === "-V" || arg === "--version") return { kind: "version" };

    if (arg === "-d" || arg === "--daemon") {
      flags.daemon = true;
      continue;
    }
    if (arg === "-l" || arg === "--loop") {
      flags.loop = true;
      continue;
    }

    const controlCommand = CONTROL_FLAGS.get(arg);
    if (controlCommand) {
      if (control && control !== controlCommand) {
        return { kind: "error", message: `${arg} cannot be combined with --${control}` };
      }
      control = controlCommand;
      continue;
    }

    const valueKey = VALUE_FLAGS.get(arg);
    const integerKey = INTEGER_FLAGS.get(arg);
    if (!valueKey && !integerKey) {
      return { kind: "error", message: `Unknown argument: ${arg}` };
    }

    const value = argv[i + 1];
    if (value === undefined) {
      return { kind: "error", message: `${arg} requires a value` };
    }
    i++;

    if (integerKey) {
      const parsed = parsePositiveInt(value);
      if (parsed === undefined) {
        return { kind: "error", message: `${arg} expects a positive integer, got "${value}"` };
      }
      flags[integerKey] = parsed;
    } else if (valueKey === "configPath") {
      configPath = value;
    } else if (valueKey) {
      flags[valueKey] = value;
    }
  }

  if (control) {
    return { kind: "control", command: control, configPath, pidFile: flags.pidFile };
  }
  return { kind: "run", configPath, flags };
}
