export type BucketIndex = 0 | 1 | 2 | 3 | 4 | 5;

export const BUCKET_COUNT = 6;

/** Darkness score: 0 = bright, 1 = dark. */
export interface ScoredImage {
  readonly path: string;
  readonly score: number;
}

/** Six buckets, index 0 darkest through 5 brightest. */
export type BucketSet = readonly (readonly ScoredImage[])[];

export interface Selection {
  image: ScoredImage;
  hour: number;
  targetBucket: BucketIndex;
  chosenBucket: BucketIndex;
}

export type BucketCounts = readonly number[];

export function isBucketIndex(value: number): value is BucketIndex {
  return Number.isInteger(value) && value >= 0 && value < BUCKET_COUNT;
}
