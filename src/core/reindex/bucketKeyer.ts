import { ReindexConfigError } from "./reindex.errors";

export const assertLatency = (latency: number): number => {
  if (!Number.isInteger(latency) || latency <= 0) {
    throw new ReindexConfigError(`latency must be a positive integer. Received: ${String(latency)}`);
  }
  return latency;
};

/**
 * Returns the `latency`-aligned instant at or before `now + latency`.
 * Every caller inside the same alignment window gets the same value without talking to anyone.
 */
export const computeBucketTimestamp = (nowSeconds: number, latency: number): number => {
  assertLatency(latency);
  const scheduleAt = nowSeconds + latency;
  return Math.floor(scheduleAt / latency) * latency;
};

export const bucketKey = (prefix: string, resourceType: string, bucketTimestamp: number): string =>
  `${prefix}:${resourceType}:${bucketTimestamp}`;

export const indexKey = (prefix: string, resourceType: string): string => `${prefix}:${resourceType}:timechunks`;
