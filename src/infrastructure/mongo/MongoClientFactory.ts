import { MongoClient, type MongoClientOptions } from "mongodb";

export const createMongoClient = async (mongoUri: string, options: MongoClientOptions = {}): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { appName: "reindex-coalescer", ...options });
  await client.connect();
  return client;
};
