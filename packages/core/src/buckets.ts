import { BUCKET_COUNT } from "./domain.js";
import type { BucketCounts, BucketIndex, BucketSet, ScoredImage } from "./domain.js";

// Lower bound (exclusive) of each band, darkest first. Anything at or below
// the last bound lands in the brightest bucket.
const DARKNESS_BANDS: ReadonlyArray<{ above: number; bucket: BucketIndex }> = [
  { above: 0.9, bucket: 0 },
  { above: 0.8, bucket: 1 },
  { above: 0.6, bucket: 2 },
  { above: 0.4, bucket: 3 },
  { above: 0.2, bucket: 4 },
  { above: 0.0, bucket: 5 },
];

export function bucketForScore(score: number): BucketIndex {
  for (const band of DARKNESS_BANDS) {
    if (score > band.above) return band.bucket;
  }
  return 5;
}

export function buildBucketSet(images: readonly ScoredImage[]): BucketSet {
  const buckets: ScoredImage[][] = Array.from({ length: BUCKET_COUNT }, () => []);
  for (const image of images) {
    buckets[bucketForScore(image.score)].push(image);
  }
  return buckets;
}

export function bucketCounts(buckets: BucketSet): BucketCounts {
  return buckets.map((bucket) => bucket.length);
}

export function isBucketSetEmpty(buckets: BucketSet): boolean {
  return buckets.every((bucket) => bucket.length === 0);
}

export function formatBucketTable(buckets: BucketSet): string[] {
  return [
    "Map darkness score (0=bright, 1=dark) -> bucket 0-5 (0=darkest, 5=brightest)",
    ...buckets.map((bucket, index) => `bucket ${index} has ${bucket.length} images`),
  ];
}
