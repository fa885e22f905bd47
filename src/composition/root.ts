import {
  postponeReindex,
  type PostponeResult,
  type ReindexRequest
} from "../application/postpone-reindex/postponeReindex.usecase";
import { systemClock } from "../core/reindex/clock";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoJobQueue } from "../infrastructure/mongo/MongoJobQueue";
import { MongoReindexBucketStore } from "../infrastructure/mongo/MongoReindexBucketStore";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type PostponeService = {
  postpone(request: ReindexRequest): Promise<PostponeResult>;
  close(): Promise<void>;
};

/**
 * Configuration is resolved before connecting, so a bad latency never reaches the store.
 */
export const createPostponeService = async (): Promise<PostponeService> => {
  const env = loadEnv();
  const config = loadRuntimeConfigFromEnv();
  const client = await createMongoClient(env.MONGO_URI);

  const deps = {
    store: new MongoReindexBucketStore(client, env.MONGO_DB),
    queue: new MongoJobQueue(client, env.MONGO_DB),
    config,
    clock: systemClock
  };

  return {
    postpone: (request) => postponeReindex(deps, request),
    close: () => client.close()
  };
};

export const runPostpone = async (request: ReindexRequest): Promise<PostponeResult> => {
  const service = await createPostponeService();
  try {
    return await service.postpone(request);
  } finally {
    await service.close();
  }
};
