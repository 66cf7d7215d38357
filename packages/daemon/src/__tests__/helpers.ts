/**
 * helpers.ts — in-process fakes for the daemon's ports
 */

import { EventEmitter } from "events";
import type {
  ActionInvoker,
  ActionResult,
  Clock,
  Delay,
  EmittableTelemetryEvent,
  InputPoller,
  ScoredImage,
  TelemetrySink,
} from "@wallshade/core";
import type { Logger } from "../log.js";

export interface CapturingLogger extends Logger {
  lines: string[];
}

/** Records "INFO msg", "WARN msg" and "ERROR msg[: detail]". */
export function createCapturingLogger(): CapturingLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        lines.push(`ERROR ${message}`);
      } else {
        lines.push(`ERROR ${message}: ${error instanceof Error ? error.message : String(error)}`);
      }
    },
  };
}

/** Local time on 2026-10-18 at `hour`:00. */
export function fixedClock(hour: number): Clock {
  return () => new Date(2026, 9, 18, hour);
}

export interface RecordingDelay {
  delay: Delay;
  calls: number[];
}

export function recordingDelay(onCall?: (ms: number, index: number) => void): RecordingDelay {
  const calls: number[] = [];
  return {
    calls,
    delay: async (ms) => {
      calls.push(ms);
      onCall?.(ms, calls.length - 1);
    },
  };
}

export interface StubInvoker extends ActionInvoker {
  calls: Array<{ program: string; imagePath: string }>;
}

export function stubInvoker(result: Partial<ActionResult> = {}): StubInvoker {
  const calls: Array<{ program: string; imagePath: string }> = [];
  return {
    calls,
    invoke(program, imagePath) {
      calls.push({ program, imagePath });
      return { success: true, exitCode: 0, durationMs: 1, ...result };
    },
  };
}

export interface RecordingTelemetry extends TelemetrySink {
  events: EmittableTelemetryEvent[];
}

export function recordingTelemetry(): RecordingTelemetry {
  const events: EmittableTelemetryEvent[] = [];
  return {
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

/** Poller whose pending keys are set by the test. */
export class FakePoller implements InputPoller {
  started = 0;
  stopped = 0;
  pending = 0;
  drained = 0;

  start(): void {
    this.started++;
  }

  stop(): void {
    this.stopped++;
  }

  tryReadKey(): boolean {
    if (this.pending === 0) return false;
    this.pending--;
    return true;
  }

  drain(): void {
    this.drained++;
    this.pending = 0;
  }
}

export function fakeSignals(): EventEmitter {
  return new EventEmitter();
}

export function image(path: string, score: number): ScoredImage {
  return { path, score };
}

/** Six buckets with the given members; unspecified buckets are empty. */
export function bucketsOf(members: Partial<Record<number, ScoredImage[]>>): ScoredImage[][] {
  return [0, 1, 2, 3, 4, 5].map((index) => members[index] ?? []);
}
