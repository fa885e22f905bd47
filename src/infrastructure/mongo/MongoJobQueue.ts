import { randomUUID } from "crypto";
import type { Collection, MongoClient } from "mongodb";
import type { JobQueue, ScheduledJob } from "../../ports/JobQueue";
import { mongoIndexes } from "./mongo.indexes";

export type ScheduledJobDoc = {
  _id: string;          // UUIDv4
  queue: string;
  at: Date;
  handler: string;
  args: ScheduledJob["args"];
  createdAt: Date;
};

/**
 * Job queue backed by the `scheduled_jobs` collection. Executing the jobs is up to whatever
 * polls that collection.
 */
export class MongoJobQueue implements JobQueue {
  private collection?: Collection<ScheduledJobDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = "reindex",
    private readonly collectionName = "scheduled_jobs"
  ) {}

  private async getCollection(): Promise<Collection<ScheduledJobDoc>> {
    if (this.collection) return this.collection;

    const col = this.client.db(this.dbName).collection<ScheduledJobDoc>(this.collectionName);
    for (const idx of mongoIndexes.scheduledJobs) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async push(job: ScheduledJob): Promise<void> {
    const col = await this.getCollection();
    await col.insertOne({
      _id: randomUUID(),
      queue: job.queue,
      at: new Date(job.at * 1000),
      handler: job.handler,
      args: job.args,
      createdAt: new Date()
    });
  }
}
