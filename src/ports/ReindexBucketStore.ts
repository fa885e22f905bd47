export type BucketRegistration = {
  bucketKey: string;
  indexKey: string;
  payload: string;
  bucketTimestamp: number;
  ttlSeconds: number;
};

export type PoppedBucket = {
  bucketKey: string;
  score: number;
  payloads: string[];   // empty when the payload set already expired
};

/**
 * Implementations must run each method as one indivisible unit across both keys.
 */
export interface ReindexBucketStore {
  /**
   * Merges the payload into the bucket set, refreshes its ttl and registers the bucket in the
   * discovery index. Resolves `true` only for the call that inserted the index entry.
   */
  register(registration: BucketRegistration): Promise<boolean>;
  /**
   * Removes and returns index entries scored at or below `upTo` together with their payload sets.
   * A payload merged into a bucket after its entry was popped is never read.
   */
  popDueBuckets(indexKey: string, upTo: number): Promise<PoppedBucket[]>;
}
