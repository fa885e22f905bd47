import type { Collection, MongoClient } from "mongodb";
import type { BucketRegistration, PoppedBucket, ReindexBucketStore } from "../../ports/ReindexBucketStore";
import { systemClock, type Clock } from "../../core/reindex/clock";
import { mongoIndexes } from "./mongo.indexes";

export type TimechunkDoc = {
  _id: string;          // bucket key
  payloads: string[];
  expiresAt: Date;
};

export type TimechunkIndexDoc = {
  _id: string;          // bucket key
  indexKey: string;
  score: number;        // bucket timestamp
  expiresAt: Date;
};

type Collections = {
  buckets: Collection<TimechunkDoc>;
  index: Collection<TimechunkIndexDoc>;
};

/**
 * Buckets and the discovery index live in two collections; every operation runs in one
 * multi-document transaction, so a replica set (or sharded cluster) is required.
 *
 * The TTL monitor deletes lazily, so documents already past `expiresAt` are treated as absent.
 */
export class MongoReindexBucketStore implements ReindexBucketStore {
  private collections?: Collections;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = "reindex",
    private readonly clock: Clock = systemClock
  ) {}

  private async getCollections(): Promise<Collections> {
    if (this.collections) return this.collections;

    const db = this.client.db(this.dbName);
    const buckets = db.collection<TimechunkDoc>("timechunks");
    const index = db.collection<TimechunkIndexDoc>("timechunk_index");

    for (const idx of mongoIndexes.timechunks) {
      await buckets.createIndex(idx.keys, idx.options);
    }
    for (const idx of mongoIndexes.timechunkIndex) {
      await index.createIndex(idx.keys, idx.options);
    }

    this.collections = { buckets, index };
    return this.collections;
  }

  private now(): Date {
    return new Date(this.clock.nowSeconds() * 1000);
  }

  async register(registration: BucketRegistration): Promise<boolean> {
    const { buckets, index } = await this.getCollections();
    const now = this.now();
    const expiresAt = new Date(now.getTime() + registration.ttlSeconds * 1000);

    let registered = false;
    const session = this.client.startSession();
    try {
      await session.withTransaction(async () => {
        // withTransaction re-runs this callback on transient errors.
        registered = false;

        await buckets.deleteOne({ _id: registration.bucketKey, expiresAt: { $lte: now } }, { session });
        await buckets.updateOne(
          { _id: registration.bucketKey },
          { $addToSet: { payloads: registration.payload }, $set: { expiresAt } },
          { upsert: true, session }
        );

        await index.deleteOne({ _id: registration.bucketKey, expiresAt: { $lte: now } }, { session });
        const inserted = await index.updateOne(
          { _id: registration.bucketKey },
          {
            $setOnInsert: {
              indexKey: registration.indexKey,
              score: registration.bucketTimestamp,
              expiresAt
            }
          },
          { upsert: true, session }
        );

        if (inserted.upsertedCount === 1) {
          await index.updateMany(
            { indexKey: registration.indexKey, expiresAt: { $gt: now } },
            { $set: { expiresAt } },
            { session }
          );
          registered = true;
        }
      });
    } finally {
      await session.endSession();
    }

    return registered;
  }

  async popDueBuckets(indexKey: string, upTo: number): Promise<PoppedBucket[]> {
    const { buckets, index } = await this.getCollections();
    const now = this.now();

    let popped: PoppedBucket[] = [];
    const session = this.client.startSession();
    try {
      await session.withTransaction(async () => {
        popped = [];

        const entries = await index
          .find({ indexKey, score: { $lte: upTo }, expiresAt: { $gt: now } }, { session })
          .sort({ score: 1 })
          .toArray();
        if (entries.length === 0) return;

        const keys = entries.map((entry) => entry._id);
        const docs = await buckets.find({ _id: { $in: keys } }, { session }).toArray();
        await index.deleteMany({ _id: { $in: keys } }, { session });
        await buckets.deleteMany({ _id: { $in: keys } }, { session });

        const payloadsByKey = new Map(
          docs.filter((doc) => doc.expiresAt > now).map((doc) => [doc._id, doc.payloads])
        );
        popped = entries.map((entry) => ({
          bucketKey: entry._id,
          score: entry.score,
          payloads: payloadsByKey.get(entry._id) ?? []
        }));
      });
    } finally {
      await session.endSession();
    }

    return popped;
  }
}
