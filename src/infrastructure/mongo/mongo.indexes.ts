import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlan = {
  keys: IndexSpecification;
  options: CreateIndexesOptions;
};

/**
 * Index plan, applied lazily by the adapters (createIndex is idempotent):
 * - TTL on `expiresAt` for buckets and index entries, the only eviction there is
 * - { indexKey, score } so due buckets come back in score order
 * - { queue, at } for the executor polling scheduled jobs
 */
export const mongoIndexes: Record<"timechunks" | "timechunkIndex" | "scheduledJobs", IndexPlan[]> = {
  timechunks: [
    { keys: { expiresAt: 1 }, options: { expireAfterSeconds: 0 } }
  ],
  timechunkIndex: [
    { keys: { indexKey: 1, score: 1 }, options: {} },
    { keys: { expiresAt: 1 }, options: { expireAfterSeconds: 0 } }
  ],
  scheduledJobs: [
    { keys: { queue: 1, at: 1 }, options: {} }
  ]
};
