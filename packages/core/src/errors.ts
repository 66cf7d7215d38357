import type { BucketCounts } from "./domain.js";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export interface CatalogUnreadable {
  kind: "catalog-unreadable";
  path: string;
  reason: string;
}

export interface CatalogEmpty {
  kind: "catalog-empty";
  path: string;
  counts: BucketCounts;
}

export interface NoImagesAvailable {
  kind: "no-images-available";
  targetBucket: number;
}

export type SchedulerError = CatalogUnreadable | CatalogEmpty | NoImagesAvailable;

export function describeSchedulerError(error: SchedulerError): string {
  switch (error.kind) {
    case "catalog-unreadable":
      return `Could not open file ${error.path}: ${error.reason}`;
    case "catalog-empty": {
      const counts = error.counts.map((count, index) => `bucket ${index}: ${count}`).join(", ");
      return `No valid images found in ${error.path} (${counts})`;
    }
    case "no-images-available":
      return `No wallpapers available in any brightness bucket (target ${error.targetBucket})`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** errno-style code (`ENOENT`, `EACCES`, ...) when the error carries one. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}
