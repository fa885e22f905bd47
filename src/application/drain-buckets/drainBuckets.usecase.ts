import type { Reindexer } from "../../ports/Reindexer";
import type { ReindexBucketStore } from "../../ports/ReindexBucketStore";
import { indexKey } from "../../core/reindex/bucketKeyer";
import { mergePayloads } from "../../core/reindex/payloadSerializer";

export type DrainDeps = {
  store: ReindexBucketStore;
  reindexer: Reindexer;
  keyPrefix: string;
};

export type DrainJobArgs = {
  resourceType: string;
  bucketTimestamp: number;
};

export type DrainSummary = {
  buckets: number;
  ids: number;
};

/**
 * Worker side of a scheduled job: pops every bucket due up to the job's timestamp, so a run
 * also picks up buckets left behind by an earlier failed run. Duplicate runs pop nothing.
 */
export const drainBuckets = async (deps: DrainDeps, args: DrainJobArgs): Promise<DrainSummary> => {
  const popped = await deps.store.popDueBuckets(indexKey(deps.keyPrefix, args.resourceType), args.bucketTimestamp);
  const batch = mergePayloads(popped.flatMap((bucket) => bucket.payloads));

  if (batch.ids.length > 0) {
    await deps.reindexer.reindex({ resourceType: args.resourceType, ids: batch.ids, fields: batch.fields });
  }

  const summary: DrainSummary = { buckets: popped.length, ids: batch.ids.length };
  console.log(JSON.stringify({
    event: "reindex.batch_drained",
    resourceType: args.resourceType,
    upTo: args.bucketTimestamp,
    ...summary
  }));
  return summary;
};
