/**
 * bucket-iterator.ts — non-repeating selection within brightness buckets
 *
 * Each bucket is walked in a shuffled order with its own cursor. A bucket is
 * reshuffled and restarted whenever selection moves into it from another
 * bucket, and again each time its cursor runs off the end, so every image in
 * a bucket is shown once per pass.
 *
 * State lives in an explicit IteratorState owned by the caller; selectNext is
 * the only function that mutates it.
 */

import { BUCKET_COUNT, isBucketIndex } from "./domain.js";
import type { BucketIndex, BucketSet, ScoredImage } from "./domain.js";
import { err, ok } from "./errors.js";
import type { NoImagesAvailable, Result } from "./errors.js";
import { defaultRandom, randomIndex, shuffleInPlace } from "./shuffle.js";
import type { RandomSource } from "./shuffle.js";

export interface IteratorState {
  readonly shuffled: ScoredImage[][];
  readonly cursors: number[];
  lastUsedBucket: BucketIndex | null;
  readonly random: RandomSource;
}

export type ReshuffleReason = "bucket-changed" | "pass-complete";

export interface ReshuffleEvent {
  reason: ReshuffleReason;
  bucket: BucketIndex;
  previousBucket: BucketIndex | null;
}

export interface SelectNextHooks {
  onReshuffle?: (event: ReshuffleEvent) => void;
}

export interface IteratorPick {
  image: ScoredImage;
  targetBucket: BucketIndex;
  chosenBucket: BucketIndex;
}

export function createIteratorState(
  buckets: BucketSet,
  random: RandomSource = defaultRandom,
): IteratorState {
  const shuffled = buckets.map((bucket) => shuffleInPlace([...bucket], random));
  return {
    shuffled,
    cursors: shuffled.map(() => 0),
    lastUsedBucket: null,
    random,
  };
}

/**
 * First non-empty bucket searching outward from target: target, target+1,
 * target-1, target+2, target-2, ... Deterministic for a given set and target.
 */
export function findAvailableBucket(
  buckets: BucketSet,
  targetBucket: BucketIndex,
): BucketIndex | undefined {
  if (buckets[targetBucket]?.length) return targetBucket;

  for (let offset = 1; offset < BUCKET_COUNT; offset++) {
    const up = targetBucket + offset;
    if (isBucketIndex(up) && buckets[up]?.length) return up;
    const down = targetBucket - offset;
    if (isBucketIndex(down) && buckets[down]?.length) return down;
  }
  return undefined;
}

export function selectNext(
  state: IteratorState,
  targetBucket: BucketIndex,
  hooks: SelectNextHooks = {},
): Result<IteratorPick, NoImagesAvailable> {
  const chosenBucket = findAvailableBucket(state.shuffled, targetBucket);
  if (chosenBucket === undefined) {
    return err({ kind: "no-images-available", targetBucket });
  }

  const bucket = state.shuffled[chosenBucket];

  if (chosenBucket !== state.lastUsedBucket) {
    hooks.onReshuffle?.({
      reason: "bucket-changed",
      bucket: chosenBucket,
      previousBucket: state.lastUsedBucket,
    });
    state.cursors[chosenBucket] = 0;
    shuffleInPlace(bucket, state.random);
    state.lastUsedBucket = chosenBucket;
  }

  const cursor = state.cursors[chosenBucket];
  const image = bucket[cursor];

  const next = cursor + 1;
  if (next >= bucket.length) {
    hooks.onReshuffle?.({
      reason: "pass-complete",
      bucket: chosenBucket,
      previousBucket: chosenBucket,
    });
    state.cursors[chosenBucket] = 0;
    shuffleInPlace(bucket, state.random);
  } else {
    state.cursors[chosenBucket] = next;
  }

  return ok({ image, targetBucket, chosenBucket });
}

/** One-off pick for single-shot runs: same fallback, no pass bookkeeping. */
export function pickRandom(
  buckets: BucketSet,
  targetBucket: BucketIndex,
  random: RandomSource = defaultRandom,
): Result<IteratorPick, NoImagesAvailable> {
  const chosenBucket = findAvailableBucket(buckets, targetBucket);
  if (chosenBucket === undefined) {
    return err({ kind: "no-images-available", targetBucket });
  }
  const bucket = buckets[chosenBucket];
  const image = bucket[randomIndex(bucket.length, random)];
  return ok({ image, targetBucket, chosenBucket });
}
