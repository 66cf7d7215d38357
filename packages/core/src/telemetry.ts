/**
 * telemetry.ts — append-only JSONL record of scheduler activity
 *
 * Every emission is fire-and-forget: telemetry must never throw or block
 * the selection loop.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type TelemetryEventType =
  | "scheduler_started"
  | "selection_made"
  | "selection_failed"
  | "action_failed"
  | "scheduler_stopped";

export interface SchedulerStartedTelemetryData {
  mode: "single" | "loop" | "daemon";
  imageCount: number;
  bucketCounts: number[];
  sleepMs?: number;
}

export interface SelectionMadeTelemetryData {
  hour: number;
  targetBucket: number;
  chosenBucket: number;
  path: string;
  score: number;
}

export interface SelectionFailedTelemetryData {
  hour?: number;
  targetBucket?: number;
  error: string;
  backoffMs: number;
}

export interface ActionFailedTelemetryData {
  program: string;
  path: string;
  exitCode: number | null;
  error?: string;
}

export interface SchedulerStoppedTelemetryData {
  reason: string;
  ticks: number;
}

interface TelemetryEventBase<T extends TelemetryEventType, D> {
  timestamp: string;
  type: T;
  data: D;
}

export type SchedulerStartedTelemetryEvent = TelemetryEventBase<
  "scheduler_started",
  SchedulerStartedTelemetryData
>;
export type SelectionMadeTelemetryEvent = TelemetryEventBase<
  "selection_made",
  SelectionMadeTelemetryData
>;
export type SelectionFailedTelemetryEvent = TelemetryEventBase<
  "selection_failed",
  SelectionFailedTelemetryData
>;
export type ActionFailedTelemetryEvent = TelemetryEventBase<
  "action_failed",
  ActionFailedTelemetryData
>;
export type SchedulerStoppedTelemetryEvent = TelemetryEventBase<
  "scheduler_stopped",
  SchedulerStoppedTelemetryData
>;

export type TelemetryEvent =
  | SchedulerStartedTelemetryEvent
  | SelectionMadeTelemetryEvent
  | SelectionFailedTelemetryEvent
  | ActionFailedTelemetryEvent
  | SchedulerStoppedTelemetryEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type EmittableTelemetryEvent = DistributiveOmit<TelemetryEvent, "timestamp">;

/** Sink bound to one file; `undefined` path disables emission. */
export interface TelemetrySink {
  emit(event: EmittableTelemetryEvent): void;
}

export function emitTelemetry(filePath: string, event: EmittableTelemetryEvent): void {
  try {
    const fullEvent = { timestamp: new Date().toISOString(), ...event };
    mkdirSync(dirname(filePath), { recursive: true });
    appendFileSync(filePath, JSON.stringify(fullEvent) + "\n");
  } catch {
    // Telemetry must NEVER throw or block
  }
}

export function createTelemetrySink(filePath: string | undefined): TelemetrySink {
  return {
    emit(event) {
      if (filePath) emitTelemetry(filePath, event);
    },
  };
}
