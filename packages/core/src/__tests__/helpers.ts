/**
 * helpers.ts — shared test factories
 */

import { fileURLToPath } from "url";
import type { RandomSource, ScoredImage } from "../index.js";

export const FIXTURE_CATALOG = fileURLToPath(new URL("./fixtures/catalog.csv", import.meta.url));

export function image(path: string, score: number): ScoredImage {
  return { path, score };
}

/** mulberry32: small seeded PRNG so shuffles are repeatable. */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Six buckets with the given members; unspecified buckets are empty. */
export function bucketsOf(members: Partial<Record<number, ScoredImage[]>>): ScoredImage[][] {
  return [0, 1, 2, 3, 4, 5].map((index) => members[index] ?? []);
}
