export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
};

const validateMongoUri = (value: string): string => {
  if (!value.startsWith("mongodb://") && !value.startsWith("mongodb+srv://")) {
    throw new Error(`MONGO_URI must use the mongodb or mongodb+srv scheme. Received: ${value}`);
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri(env.MONGO_URI ?? "mongodb://localhost:27017/?replicaSet=rs0");
  const MONGO_DB = env.MONGO_DB?.trim() ? env.MONGO_DB.trim() : "reindex";

  return { MONGO_URI, MONGO_DB };
};
