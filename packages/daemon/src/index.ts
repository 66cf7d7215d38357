#!/usr/bin/env npx tsx
/**
 * @wallshade/daemon
 *
 * Time-of-day wallpaper selector. Reads a darkness-scored image catalog,
 * sorts it into six brightness buckets, and picks dark images at night and
 * bright ones during the day, without repeating an image within a bucket
 * until the whole bucket has been shown.
 *
 * Usage:
 *   wallshade-select -i <catalog.csv> [-e <command>] [-l | -d] [-s <ms>]
 *   wallshade-select --status | --stop | --next
 *
 * Run `wallshade-select --help` for every option.
 */

import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { runCli } from "./cli.js";

export { runCli, VERSION } from "./cli.js";
export type { CliDependencies, SignalSource } from "./cli.js";
export { parseArgs, USAGE } from "./args.js";
export type { ParsedArgs, ControlCommand } from "./args.js";
export { runSingleShot, applySelection, SelectionLoop } from "./selection-loop.js";
export type { SelectionDependencies, LoopOptions, LoopSummary } from "./selection-loop.js";
export { sleepFor, WakeSignal } from "./sleep.js";
export type { SleepOptions, SleepOutcome } from "./sleep.js";
export { TerminalInputPoller } from "./input-poller.js";
export type { TerminalInput } from "./input-poller.js";
export { createProcessActionInvoker } from "./action-invoker.js";
export {
  NodeLifecycleProvider,
  daemonChildArgs,
  findRunningDaemon,
  isDetachedChild,
  isProcessAlive,
  readPidFile,
  removePidFile,
  writePidFile,
} from "./lifecycle.js";
export { createConsoleLogger, formatTickLine } from "./log.js";
export type { Logger } from "./log.js";

// ─── Main ─────────────────────────────────────────────────────────────────────

function isDirectExecution(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  runCli(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error("[wallshade] failed", error);
      process.exit(1);
    });
}
