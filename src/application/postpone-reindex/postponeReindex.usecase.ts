import type { JobQueue } from "../../ports/JobQueue";
import type { ReindexBucketStore } from "../../ports/ReindexBucketStore";
import type { Clock } from "../../core/reindex/clock";
import { bucketKey, computeBucketTimestamp, indexKey } from "../../core/reindex/bucketKeyer";
import { dispatchReindexJob } from "../../core/reindex/jobDispatcher";
import { serializePayload, type ReindexId } from "../../core/reindex/payloadSerializer";
import { resolveTypeSettings, type ReindexConfig } from "./reindex.config";

export type ReindexRequest = {
  resourceType: string;
  ids: readonly ReindexId[];
  updateFields?: readonly string[];
};

export type PostponeDeps = {
  store: ReindexBucketStore;
  queue: JobQueue;
  config: ReindexConfig;
  clock: Clock;
};

export type PostponeResult = {
  resourceType: string;
  bucketTimestamp: number;
  bucketKey: string;
  scheduled: boolean;
};

/**
 * Merges the request into the bucket of the current latency window and schedules the
 * bucket's job only when this call registered the bucket.
 *
 * Store and queue failures propagate as-is. A failure after registration but before the
 * push leaves the bucket without a job until its ttl runs out.
 */
export const postponeReindex = async (deps: PostponeDeps, request: ReindexRequest): Promise<PostponeResult> => {
  const { store, queue, config, clock } = deps;
  const settings = resolveTypeSettings(config, request.resourceType);

  const bucketTimestamp = computeBucketTimestamp(clock.nowSeconds(), settings.latency);
  const key = bucketKey(config.keyPrefix, request.resourceType, bucketTimestamp);

  const registered = await store.register({
    bucketKey: key,
    indexKey: indexKey(config.keyPrefix, request.resourceType),
    payload: serializePayload(request.ids, request.updateFields),
    bucketTimestamp,
    ttlSeconds: settings.ttl
  });

  if (registered) {
    const job = await dispatchReindexJob(queue, {
      resourceType: request.resourceType,
      bucketTimestamp,
      margin: settings.margin,
      queueName: settings.queueName
    });
    console.log(JSON.stringify({
      event: "reindex.job_scheduled",
      resourceType: request.resourceType,
      bucketKey: key,
      queue: job.queue,
      at: job.at
    }));
  }

  return {
    resourceType: request.resourceType,
    bucketTimestamp,
    bucketKey: key,
    scheduled: registered
  };
};
