/**
 * selection-loop.ts — single-shot and continuous wallpaper selection
 *
 * Continuous mode:
 *   hour -> target bucket -> selectNext -> run action -> sleep
 *
 * A tick that fails (no images anywhere, or anything thrown while selecting
 * or invoking) is logged and followed by the back-off sleep; the loop only
 * ends through `stop()` or `maxTicks`.
 */

import {
  createIteratorState,
  errorMessage,
  describeSchedulerError,
  ok,
  pickRandom,
  selectNext,
  systemClock,
  targetBucketForHour,
  timerDelay,
  defaultRandom,
} from "@wallshade/core";
import type {
  ActionInvoker,
  BucketSet,
  Clock,
  Delay,
  InputPoller,
  IteratorState,
  NoImagesAvailable,
  RandomSource,
  ReshuffleEvent,
  Result,
  Selection,
  TelemetrySink,
} from "@wallshade/core";
import { formatTickLine } from "./log.js";
import type { Logger } from "./log.js";
import { sleepFor, WakeSignal } from "./sleep.js";

export interface SelectionDependencies {
  buckets: BucketSet;
  /** Program to run with the chosen path; empty means log only. */
  exec: string;
  invoker: ActionInvoker;
  logger: Logger;
  telemetry: TelemetrySink;
  clock?: Clock;
  random?: RandomSource;
}

export interface LoopOptions extends SelectionDependencies {
  sleepMs: number;
  errorBackoffMs: number;
  pollIntervalMs: number;
  /** Present while attached to a terminal; keypresses end the sleep early. */
  poller?: InputPoller;
  delay?: Delay;
  /** Stop after this many ticks. Unbounded when omitted. */
  maxTicks?: number;
}

export interface LoopSummary {
  ticks: number;
  failures: number;
  stopReason: string;
}

export function applySelection(deps: SelectionDependencies, selection: Selection, at: Date): void {
  deps.logger.info(formatTickLine(at, selection.hour, selection.image));
  deps.telemetry.emit({
    type: "selection_made",
    data: {
      hour: selection.hour,
      targetBucket: selection.targetBucket,
      chosenBucket: selection.chosenBucket,
      path: selection.image.path,
      score: selection.image.score,
    },
  });

  if (!deps.exec) return;

  const result = deps.invoker.invoke(deps.exec, selection.image.path);
  if (!result.success) {
    deps.logger.warn(`Warning: ${result.error ?? "command failed"}`);
    deps.telemetry.emit({
      type: "action_failed",
      data: {
        program: deps.exec,
        path: selection.image.path,
        exitCode: result.exitCode,
        error: result.error,
      },
    });
  }
}

/** One independent random pick for the current hour. No pass bookkeeping. */
export function runSingleShot(deps: SelectionDependencies): Result<Selection, NoImagesAvailable> {
  const now = (deps.clock ?? systemClock)();
  const hour = now.getHours();
  const targetBucket = targetBucketForHour(hour);

  const pick = pickRandom(deps.buckets, targetBucket, deps.random ?? defaultRandom);
  if (!pick.ok) return pick;

  const selection: Selection = { hour, ...pick.value };
  deps.logger.info(`Current hour: ${hour}`);
  deps.logger.info(`Target bucket: ${selection.targetBucket} (used ${selection.chosenBucket})`);
  deps.logger.info(`Selected wallpaper: ${selection.image.path}`);
  deps.logger.info(`Darkness score: ${selection.image.score}`);

  applySelection(deps, selection, now);
  return ok(selection);
}

function describeReshuffle(event: ReshuffleEvent): string {
  if (event.reason === "pass-complete") {
    return `Reached end of bucket ${event.bucket}, reshuffling...`;
  }
  const previous = event.previousBucket === null ? "none" : String(event.previousBucket);
  return `Bucket changed from ${previous} to ${event.bucket}, reshuffling...`;
}

export class SelectionLoop {
  private readonly state: IteratorState;
  private readonly wake = new WakeSignal();
  private readonly clock: Clock;
  private readonly delay: Delay;
  private stopReason: string | null = null;

  constructor(private readonly options: LoopOptions) {
    this.state = createIteratorState(options.buckets, options.random ?? defaultRandom);
    this.clock = options.clock ?? systemClock;
    this.delay = options.delay ?? timerDelay;
  }

  get stopped(): boolean {
    return this.stopReason !== null;
  }

  /** End the current sleep so the next tick runs now. */
  trigger(): void {
    this.wake.request();
  }

  stop(reason = "stop requested"): void {
    if (this.stopReason !== null) return;
    this.stopReason = reason;
    this.wake.request();
  }

  /** One selection. Mutates iterator state only on success. */
  tick(): Result<Selection, NoImagesAvailable> {
    const now = this.clock();
    const hour = now.getHours();
    const targetBucket = targetBucketForHour(hour);

    const pick = selectNext(this.state, targetBucket, {
      onReshuffle: (event) => this.options.logger.info(describeReshuffle(event)),
    });
    if (!pick.ok) return pick;

    const selection: Selection = { hour, ...pick.value };
    applySelection(this.options, selection, now);
    return ok(selection);
  }

  async run(): Promise<LoopSummary> {
    const { logger, telemetry } = this.options;
    let ticks = 0;
    let failures = 0;

    while (!this.stopped) {
      let failed = false;
      try {
        const result = this.tick();
        if (!result.ok) {
          failed = true;
          logger.error(`Error in loop: ${describeSchedulerError(result.error)}`);
          telemetry.emit({
            type: "selection_failed",
            data: {
              targetBucket: result.error.targetBucket,
              error: describeSchedulerError(result.error),
              backoffMs: this.options.errorBackoffMs,
            },
          });
        }
      } catch (error: unknown) {
        failed = true;
        logger.error("Error in loop", error);
        telemetry.emit({
          type: "selection_failed",
          data: { error: errorMessage(error), backoffMs: this.options.errorBackoffMs },
        });
      }

      ticks++;
      if (failed) failures++;
      if (this.options.maxTicks !== undefined && ticks >= this.options.maxTicks) break;
      if (this.stopped) break;

      if (failed) {
        await sleepFor(this.options.errorBackoffMs, {
          delay: this.delay,
          pollIntervalMs: this.options.pollIntervalMs,
          wake: this.wake,
        });
      } else {
        await this.sleepBetweenTicks();
      }
    }

    return { ticks, failures, stopReason: this.stopReason ?? "tick limit reached" };
  }

  private async sleepBetweenTicks(): Promise<void> {
    const { logger, poller, sleepMs } = this.options;
    if (poller) {
      logger.info(`Sleeping for ${Math.floor(sleepMs / 1000)}s (press any key to skip)...`);
    }

    const outcome = await sleepFor(sleepMs, {
      delay: this.delay,
      pollIntervalMs: this.options.pollIntervalMs,
      poller,
      wake: this.wake,
    });

    if (outcome === "key") {
      logger.info("Sleep interrupted by user!");
    } else if (outcome === "wake" && !this.stopped) {
      logger.info("Sleep interrupted by trigger");
    }
  }
}
