import type { JobQueue, ScheduledJob } from "../../ports/JobQueue";

export const DELAYED_BATCH_HANDLER = "reindex.delayed_batch";

export type DispatchInput = {
  resourceType: string;
  bucketTimestamp: number;
  margin: number;
  queueName: string;
};

export const buildScheduledJob = (input: DispatchInput): ScheduledJob => ({
  queue: input.queueName,
  at: input.bucketTimestamp + input.margin,
  handler: DELAYED_BATCH_HANDLER,
  args: [input.resourceType, input.bucketTimestamp]
});

/**
 * Hands one job descriptor to the queue. Retries, if any, belong to the queue.
 */
export const dispatchReindexJob = async (queue: JobQueue, input: DispatchInput): Promise<ScheduledJob> => {
  const job = buildScheduledJob(input);
  await queue.push(job);
  return job;
};
