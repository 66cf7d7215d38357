/**
 * cli.ts — wallshade-select command flow
 *
 * parse args -> merge config -> load catalog -> (detach) -> single pick or loop
 *
 * Exit codes: 0 on a completed pick, a clean loop/daemon shutdown, or a
 * handled control command; 1 on argument, config or catalog errors and on a
 * failed single pick; 130 when interrupted from the keyboard.
 */

import { dirname, extname, join } from "path";
import { fileURLToPath } from "url";
import {
  bucketCounts,
  buildBucketSet,
  createTelemetrySink,
  defaultConfigPath,
  DEFAULT_PID_FILE,
  describeSchedulerError,
  errorMessage,
  formatBucketTable,
  isBucketSetEmpty,
  loadCatalog,
  readConfigFile,
  resolveSchedulerOptions,
  systemClock,
  timerDelay,
  defaultRandom,
} from "@wallshade/core";
import type {
  ActionInvoker,
  BucketSet,
  Clock,
  ConfigFileValues,
  Delay,
  InputPoller,
  LifecycleProvider,
  RandomSource,
  SchedulerOptions,
  TelemetrySink,
} from "@wallshade/core";
import { parseArgs, USAGE } from "./args.js";
import type { ControlCommand } from "./args.js";
import { createProcessActionInvoker } from "./action-invoker.js";
import { TerminalInputPoller } from "./input-poller.js";
import {
  daemonChildArgs,
  findRunningDaemon,
  isDetachedChild,
  NodeLifecycleProvider,
  removePidFile,
  writePidFile,
} from "./lifecycle.js";
import { createConsoleLogger } from "./log.js";
import type { Logger } from "./log.js";
import { runSingleShot, SelectionLoop } from "./selection-loop.js";

export const VERSION = "0.1.0";

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface CliDependencies {
  logger: Logger;
  invoker: ActionInvoker;
  clock: Clock;
  delay: Delay;
  random: RandomSource;
  signals: SignalSource;
  /** True when this process is the detached daemon child. */
  detached: boolean;
  createLifecycle: (options: SchedulerOptions) => LifecycleProvider;
  createPoller: (onInterrupt: () => void) => InputPoller;
  sendSignal: (pid: number, signal: NodeJS.Signals) => void;
  isAlive?: (pid: number) => boolean;
}

function defaultDependencies(): CliDependencies {
  return {
    logger: createConsoleLogger(),
    invoker: createProcessActionInvoker(),
    clock: systemClock,
    delay: timerDelay,
    random: defaultRandom,
    signals: process,
    detached: isDetachedChild(),
    createLifecycle: (options) =>
      new NodeLifecycleProvider({
        entryPath: resolveEntryPath(),
        args: daemonChildArgs(options),
        logFile: options.logFile,
      }),
    createPoller: (onInterrupt) => new TerminalInputPoller({ onInterrupt }),
    sendSignal: (pid, signal) => {
      process.kill(pid, signal);
    },
  };
}

/** index.ts under tsx, index.js once built. */
function resolveEntryPath(): string {
  const self = fileURLToPath(import.meta.url);
  return join(dirname(self), `index${extname(self)}`);
}

type ConfigLoad = { ok: true; values: ConfigFileValues } | { ok: false; error: string };

function loadConfig(configPath: string | undefined): ConfigLoad {
  const path = configPath ?? defaultConfigPath();
  try {
    const values = readConfigFile(path);
    if (values) return { ok: true, values };
    if (configPath) return { ok: false, error: `Config file not found: ${configPath}` };
    return { ok: true, values: {} };
  } catch (error: unknown) {
    return { ok: false, error: `Could not read config ${path}: ${errorMessage(error)}` };
  }
}

function runControlCommand(
  command: ControlCommand,
  pidFile: string,
  deps: CliDependencies,
): number {
  const pid = findRunningDaemon(pidFile, deps.isAlive);

  if (command === "status") {
    deps.logger.info(pid === undefined ? "daemon not running" : `daemon running (pid ${pid})`);
    return pid === undefined ? EXIT_FAILURE : EXIT_OK;
  }

  if (pid === undefined) {
    deps.logger.error(`daemon not running (no live pid in ${pidFile})`);
    return EXIT_FAILURE;
  }

  const signal: NodeJS.Signals = command === "stop" ? "SIGTERM" : "SIGUSR1";
  deps.sendSignal(pid, signal);
  deps.logger.info(
    command === "stop" ? `sent stop request to pid ${pid}` : `requested next wallpaper from pid ${pid}`,
  );
  return EXIT_OK;
}

function loadBuckets(options: SchedulerOptions, logger: Logger): BucketSet | undefined {
  const catalog = loadCatalog(options.input, { delimiter: options.delimiter });
  if (!catalog.ok) {
    logger.error(`Error: ${describeSchedulerError(catalog.error)}`);
    return undefined;
  }

  const buckets = buildBucketSet(catalog.value);
  if (isBucketSetEmpty(buckets)) {
    logger.error(
      `Error: ${describeSchedulerError({
        kind: "catalog-empty",
        path: options.input,
        counts: bucketCounts(buckets),
      })}`,
    );
    return undefined;
  }
  return buckets;
}

async function runContinuous(
  options: SchedulerOptions,
  buckets: BucketSet,
  telemetry: TelemetrySink,
  deps: CliDependencies,
): Promise<number> {
  const { logger, signals } = deps;
  let exitCode = EXIT_OK;
  let loop: SelectionLoop | undefined;

  const interrupt = (): void => {
    exitCode = EXIT_INTERRUPTED;
    loop?.stop("interrupted");
  };
  const terminate = (): void => loop?.stop("SIGTERM");
  const hurry = (): void => loop?.trigger();

  // Keys only count while attached; the daemon has no terminal.
  const poller = options.daemon ? undefined : deps.createPoller(interrupt);

  loop = new SelectionLoop({
    buckets,
    exec: options.exec,
    invoker: deps.invoker,
    logger,
    telemetry,
    clock: deps.clock,
    random: deps.random,
    delay: deps.delay,
    sleepMs: options.sleepMs,
    errorBackoffMs: options.errorBackoffMs,
    pollIntervalMs: options.pollIntervalMs,
    poller,
    maxTicks: options.count,
  });

  const onSigint = options.daemon ? terminate : interrupt;
  signals.on("SIGINT", onSigint);
  signals.on("SIGTERM", terminate);
  signals.on("SIGUSR1", hurry);

  if (options.daemon) writePidFile(options.pidFile);
  telemetry.emit({
    type: "scheduler_started",
    data: {
      mode: options.daemon ? "daemon" : "loop",
      imageCount: buckets.reduce((sum, bucket) => sum + bucket.length, 0),
      bucketCounts: [...bucketCounts(buckets)],
      sleepMs: options.sleepMs,
    },
  });

  try {
    poller?.start();
    const summary = await loop.run();
    logger.info(`stopped after ${summary.ticks} change(s): ${summary.stopReason}`);
    telemetry.emit({
      type: "scheduler_stopped",
      data: { reason: summary.stopReason, ticks: summary.ticks },
    });
  } finally {
    poller?.stop();
    signals.off("SIGINT", onSigint);
    signals.off("SIGTERM", terminate);
    signals.off("SIGUSR1", hurry);
    if (options.daemon) removePidFile(options.pidFile);
  }

  return exitCode;
}

/** `argv` without the node binary and script path. */
export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDependencies> = {},
): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };
  const { logger } = deps;

  const parsed = parseArgs(argv);
  switch (parsed.kind) {
    case "help":
      console.log(USAGE);
      return EXIT_OK;
    case "version":
      console.log(VERSION);
      return EXIT_OK;
    case "error":
      logger.error(parsed.message);
      console.log(USAGE);
      return EXIT_FAILURE;
    default:
      break;
  }

  const config = loadConfig(parsed.configPath);
  if (!config.ok) {
    logger.error(config.error);
    return EXIT_FAILURE;
  }

  if (parsed.kind === "control") {
    const pidFile = parsed.pidFile ?? config.values.pidFile ?? DEFAULT_PID_FILE;
    return runControlCommand(parsed.command, pidFile, deps);
  }

  const resolved = resolveSchedulerOptions(config.values, parsed.flags);
  if (!resolved.ok) {
    logger.error(resolved.error);
    console.log(USAGE);
    return EXIT_FAILURE;
  }
  const options = resolved.value;

  if (options.daemon && !deps.detached) {
    const running = findRunningDaemon(options.pidFile, deps.isAlive);
    if (running !== undefined) {
      logger.info(`already running (pid ${running})`);
      return EXIT_OK;
    }
  }

  const buckets = loadBuckets(options, logger);
  if (!buckets) return EXIT_FAILURE;

  if (options.daemon) {
    const outcome = deps.createLifecycle(options).detachToBackground();
    if (outcome.role === "parent") {
      logger.info(`daemon started (pid ${outcome.pid}), logging to ${options.logFile}`);
      return EXIT_OK;
    }
  } else {
    for (const line of formatBucketTable(buckets)) logger.info(line);
  }

  const telemetry = createTelemetrySink(options.telemetryPath);

  if (options.loop || options.daemon) {
    return runContinuous(options, buckets, telemetry, deps);
  }

  telemetry.emit({
    type: "scheduler_started",
    data: {
      mode: "single",
      imageCount: buckets.reduce((sum, bucket) => sum + bucket.length, 0),
      bucketCounts: [...bucketCounts(buckets)],
    },
  });
  const result = runSingleShot({
    buckets,
    exec: options.exec,
    invoker: deps.invoker,
    logger,
    telemetry,
    clock: deps.clock,
    random: deps.random,
  });
  if (!result.ok) {
    logger.error(`Error: ${describeSchedulerError(result.error)}`);
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}
