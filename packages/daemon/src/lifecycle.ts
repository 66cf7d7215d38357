/**
 * lifecycle.ts — background daemon plumbing
 *
 * Node cannot fork, so detaching re-launches the same entry point as a
 * detached child (own session, cwd `/`, stdin closed, stdout/stderr appended
 * to the log file). The child is told what it is through an environment
 * marker and answers `detachToBackground()` with role "daemon".
 */

import { spawn } from "child_process";
import type { SpawnOptions } from "child_process";
import { closeSync, existsSync, mkdirSync, openSync, readFileSync, unlinkSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { errorCode } from "@wallshade/core";
import type { DetachOutcome, LifecycleProvider, SchedulerOptions } from "@wallshade/core";

export const DETACHED_ENV = "WALLSHADE_DETACHED";

export interface SpawnedChild {
  pid?: number;
  unref(): void;
}

export type SpawnDetachedFn = (command: string, args: string[], options: SpawnOptions) => SpawnedChild;

export interface NodeLifecycleOptions {
  /** Script the child runs: this CLI's entry file. */
  entryPath: string;
  /** Arguments for the child, see `daemonChildArgs`. */
  args: string[];
  logFile: string;
  env?: NodeJS.ProcessEnv;
  execPath?: string;
  execArgv?: string[];
  spawnProcess?: SpawnDetachedFn;
  onHangup?: (listener: () => void) => void;
}

export function isDetachedChild(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[DETACHED_ENV] === "1";
}

export class NodeLifecycleProvider implements LifecycleProvider {
  constructor(private readonly options: NodeLifecycleOptions) {}

  detachToBackground(): DetachOutcome {
    const env = this.options.env ?? process.env;

    if (isDetachedChild(env)) {
      // No controlling terminal to lose, but a stray SIGHUP must not end the daemon.
      const onHangup = this.options.onHangup ?? ((listener) => process.on("SIGHUP", listener));
      onHangup(() => {});
      return { role: "daemon" };
    }

    const logFile = resolve(this.options.logFile);
    mkdirSync(dirname(logFile), { recursive: true });
    const logFd = openSync(logFile, "a");
    try {
      const spawnProcess = this.options.spawnProcess ?? spawn;
      const child = spawnProcess(
        this.options.execPath ?? process.execPath,
        [...(this.options.execArgv ?? process.execArgv), this.options.entryPath, ...this.options.args],
        {
          detached: true,
          cwd: "/",
          stdio: ["ignore", logFd, logFd],
          env: { ...env, [DETACHED_ENV]: "1" },
        },
      );
      child.unref();
      if (!child.pid) throw new Error("Failed to spawn detached process");
      return { role: "parent", pid: child.pid };
    } finally {
      closeSync(logFd);
    }
  }
}

/**
 * Flags that recreate `options` in the detached child. Paths are made
 * absolute because the child starts in `/`.
 */
export function daemonChildArgs(options: SchedulerOptions): string[] {
  const args = [
    "--daemon",
    "--input",
    resolve(options.input),
    "--sleep",
    String(options.sleepMs),
    "--backoff",
    String(options.errorBackoffMs),
    "--poll-interval",
    String(options.pollIntervalMs),
    "--delimiter",
    options.delimiter,
    "--log-file",
    resolve(options.logFile),
    "--pid-file",
    resolve(options.pidFile),
  ];
  if (options.exec) args.push("--exec", options.exec);
  if (options.telemetryPath) args.push("--telemetry", resolve(options.telemetryPath));
  if (options.count !== undefined) args.push("--count", String(options.count));
  return args;
}

// ─── Pid file ────────────────────────────────────────────────────────────────

export function readPidFile(pidFile: string): number | undefined {
  if (!existsSync(pidFile)) return undefined;
  const parsed = Number.parseInt(readFileSync(pidFile, "utf-8").trim(), 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

export function writePidFile(pidFile: string, pid: number = process.pid): void {
  mkdirSync(dirname(pidFile), { recursive: true });
  writeFileSync(pidFile, `${pid}\n`, "utf-8");
}

/** Removes the pid file only if it still names `pid`. */
export function removePidFile(pidFile: string, pid: number = process.pid): void {
  if (readPidFile(pidFile) !== pid) return;
  try {
    unlinkSync(pidFile);
  } catch (error: unknown) {
    if (errorCode(error) !== "ENOENT") throw error;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    // EPERM: exists, owned by someone else.
    return errorCode(error) === "EPERM";
  }
}

export function findRunningDaemon(
  pidFile: string,
  alive: (pid: number) => boolean = isProcessAlive,
): number | undefined {
  const pid = readPidFile(pidFile);
  if (pid === undefined || pid === process.pid) return undefined;
  return alive(pid) ? pid : undefined;
}
