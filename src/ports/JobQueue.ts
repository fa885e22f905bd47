export type ScheduledJob = {
  queue: string;
  at: number;           // epoch seconds
  handler: string;
  args: [resourceType: string, bucketTimestamp: number];
};

export interface JobQueue {
  push(job: ScheduledJob): Promise<void>;
}
