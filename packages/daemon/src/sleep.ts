import type { Delay, InputPoller } from "@wallshade/core";

export type SleepOutcome = "elapsed" | "key" | "wake";

/**
 * Latched wake-up request. Set from signal handlers or `trigger()`, consumed
 * by the next sleep check, so a request made while no sleep is running still
 * cuts the following sleep short.
 */
export class WakeSignal {
  private requested = false;

  request(): void {
    this.requested = true;
  }

  consume(): boolean {
    const was = this.requested;
    this.requested = false;
    return was;
  }
}

export interface SleepOptions {
  delay: Delay;
  pollIntervalMs: number;
  /** Keyboard source; omitted in daemon mode, where keys cannot end a sleep. */
  poller?: InputPoller;
  wake?: WakeSignal;
}

export async function sleepFor(durationMs: number, options: SleepOptions): Promise<SleepOutcome> {
  const step = Math.max(1, options.pollIntervalMs);
  let elapsed = 0;

  while (elapsed < durationMs) {
    if (options.wake?.consume()) return "wake";
    if (options.poller?.tryReadKey()) {
      options.poller.drain();
      return "key";
    }
    const chunk = Math.min(step, durationMs - elapsed);
    await options.delay(chunk);
    elapsed += chunk;
  }

  return "elapsed";
}
