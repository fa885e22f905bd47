import type { MongoClient } from "mongodb";
import { fixedClock } from "../../src/core/reindex/clock";
import { MongoReindexBucketStore } from "../../src/infrastructure/mongo/MongoReindexBucketStore";

const createFakeMongo = () => {
  const session = {
    withTransaction: jest.fn(async (fn: () => Promise<void>) => {
      await fn();
    }),
    endSession: jest.fn().mockResolvedValue(undefined)
  };
  const buckets = {
    createIndex: jest.fn().mockResolvedValue("idx"),
    deleteOne: jest.fn().mockResolvedValue({ deletedCount: 0 }),
    updateOne: jest.fn().mockResolvedValue({ upsertedCount: 1 }),
    find: jest.fn(),
    deleteMany: jest.fn().mockResolvedValue({ deletedCount: 0 })
  };
  const index = {
    createIndex: jest.fn().mockResolvedValue("idx"),
    deleteOne: jest.fn().mockResolvedValue({ deletedCount: 0 }),
    updateOne: jest.fn().mockResolvedValue({ upsertedCount: 1 }),
    updateMany: jest.fn().mockResolvedValue({ modifiedCount: 1 }),
    find: jest.fn(),
    deleteMany: jest.fn().mockResolvedValue({ deletedCount: 0 })
  };
  const collection = jest.fn((name: string) => (name === "timechunks" ? buckets : index));
  const db = jest.fn(() => ({ collection }));
  const client = { db, startSession: jest.fn(() => session) };

  const store = new MongoReindexBucketStore(client as unknown as MongoClient, "reindex", fixedClock(1000));
  return { store, client, db, collection, session, buckets, index };
};

const registration = {
  bucketKey: "p:TypeA:1010",
  indexKey: "p:TypeA:timechunks",
  payload: "1;all",
  bucketTimestamp: 1010,
  ttlSeconds: 60
};

describe("MongoReindexBucketStore", () => {
  it("merges the payload and registers a new bucket in one transaction", async () => {
    const { store, db, collection, session, buckets, index } = createFakeMongo();

    await expect(store.register(registration)).resolves.toBe(true);

    const now = new Date(1_000_000);
    const expiresAt = new Date(1_060_000);
    expect(db).toHaveBeenCalledWith("reindex");
    expect(collection).toHaveBeenCalledWith("timechunks");
    expect(collection).toHaveBeenCalledWith("timechunk_index");
    expect(session.withTransaction).toHaveBeenCalledTimes(1);
    expect(buckets.deleteOne).toHaveBeenCalledWith({ _id: "p:TypeA:1010", expiresAt: { $lte: now } }, { session });
    expect(buckets.updateOne).toHaveBeenCalledWith(
      { _id: "p:TypeA:1010" },
      { $addToSet: { payloads: "1;all" }, $set: { expiresAt } },
      { upsert: true, session }
    );
    expect(index.updateOne).toHaveBeenCalledWith(
      { _id: "p:TypeA:1010" },
      { $setOnInsert: { indexKey: "p:TypeA:timechunks", score: 1010, expiresAt } },
      { upsert: true, session }
    );
    expect(index.updateMany).toHaveBeenCalledWith(
      { indexKey: "p:TypeA:timechunks", expiresAt: { $gt: now } },
      { $set: { expiresAt } },
      { session }
    );
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("reports an already registered bucket without touching the index ttl", async () => {
    const { store, buckets, index } = createFakeMongo();
    index.updateOne.mockResolvedValue({ upsertedCount: 0 });

    await expect(store.register(registration)).resolves.toBe(false);
    expect(buckets.updateOne).toHaveBeenCalledTimes(1);
    expect(index.updateMany).not.toHaveBeenCalled();
  });

  it("takes the result of the committed attempt when the transaction is retried", async () => {
    const { store, session, index } = createFakeMongo();
    session.withTransaction.mockImplementation(async (fn: () => Promise<void>) => {
      await fn();
      await fn();
    });
    index.updateOne.mockResolvedValueOnce({ upsertedCount: 1 }).mockResolvedValueOnce({ upsertedCount: 0 });

    await expect(store.register(registration)).resolves.toBe(false);
  });

  it("creates indexes once and reuses the collections", async () => {
    const { store, buckets, index } = createFakeMongo();

    await store.register(registration);
    await store.register(registration);

    expect(buckets.createIndex).toHaveBeenCalledTimes(1);
    expect(buckets.createIndex).toHaveBeenCalledWith({ expiresAt: 1 }, { expireAfterSeconds: 0 });
    expect(index.createIndex).toHaveBeenCalledTimes(2);
    expect(index.createIndex).toHaveBeenCalledWith({ indexKey: 1, score: 1 }, {});
  });

  it("ends the session and propagates transaction failures", async () => {
    const { store, session } = createFakeMongo();
    session.withTransaction.mockRejectedValue(new Error("Transaction numbers are only allowed on a replica set member"));

    await expect(store.register(registration)).rejects.toThrow("replica set member");
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("pops due buckets in score order and drops expired payload sets", async () => {
    const { store, session, buckets, index } = createFakeMongo();
    const sort = jest.fn(() => ({
      toArray: async () => [
        { _id: "p:TypeA:990", indexKey: "p:TypeA:timechunks", score: 990, expiresAt: new Date(2_000_000) },
        { _id: "p:TypeA:1000", indexKey: "p:TypeA:timechunks", score: 1000, expiresAt: new Date(2_000_000) }
      ]
    }));
    index.find.mockReturnValue({ sort });
    buckets.find.mockReturnValue({
      toArray: async () => [
        { _id: "p:TypeA:990", payloads: ["1;all", "2;name"], expiresAt: new Date(2_000_000) },
        { _id: "p:TypeA:1000", payloads: ["3;all"], expiresAt: new Date(999_000) }
      ]
    });

    const popped = await store.popDueBuckets("p:TypeA:timechunks", 1000);

    expect(popped).toEqual([
      { bucketKey: "p:TypeA:990", score: 990, payloads: ["1;all", "2;name"] },
      { bucketKey: "p:TypeA:1000", score: 1000, payloads: [] }
    ]);
    expect(index.find).toHaveBeenCalledWith(
      { indexKey: "p:TypeA:timechunks", score: { $lte: 1000 }, expiresAt: { $gt: new Date(1_000_000) } },
      { session }
    );
    expect(sort).toHaveBeenCalledWith({ score: 1 });
    const keys = { _id: { $in: ["p:TypeA:990", "p:TypeA:1000"] } };
    expect(buckets.find).toHaveBeenCalledWith(keys, { session });
    expect(index.deleteMany).toHaveBeenCalledWith(keys, { session });
    expect(buckets.deleteMany).toHaveBeenCalledWith(keys, { session });
  });

  it("pops nothing when no bucket is due", async () => {
    const { store, buckets, index } = createFakeMongo();
    index.find.mockReturnValue({ sort: () => ({ toArray: async () => [] }) });

    await expect(store.popDueBuckets("p:TypeA:timechunks", 1000)).resolves.toEqual([]);
    expect(buckets.find).not.toHaveBeenCalled();
    expect(index.deleteMany).not.toHaveBeenCalled();
  });
});
