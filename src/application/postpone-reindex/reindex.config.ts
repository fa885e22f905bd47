import { assertLatency } from "../../core/reindex/bucketKeyer";
import { ReindexConfigError } from "../../core/reindex/reindex.errors";

export type DelayedReindexSettings = {
  latency: number;  // seconds per bucketing window
  margin: number;   // seconds the job waits after the bucket boundary
  ttl: number;      // seconds a bucket survives without writes
};

export type ReindexConfig = Readonly<{
  keyPrefix: string;
  queueName: string;
  defaults: Readonly<DelayedReindexSettings>;
  overrides: Readonly<Record<string, Readonly<Partial<DelayedReindexSettings>>>>;
}>;

export type ReindexConfigInput = {
  keyPrefix?: string;
  queueName?: string;
  defaults?: Partial<DelayedReindexSettings>;
  overrides?: Record<string, Partial<DelayedReindexSettings>>;
};

export type ResolvedTypeSettings = DelayedReindexSettings & { queueName: string };

export const defaultReindexSettings: DelayedReindexSettings = {
  latency: 10,
  margin: 2,
  ttl: 60 * 60 * 24
};

export const DEFAULT_QUEUE = "chewy";
export const DEFAULT_KEY_PREFIX = "reindex:delayed";

const assertNonNegativeInteger = (name: string, value: number) => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ReindexConfigError(`${name} must be a non-negative integer. Received: ${String(value)}`);
  }
};

const assertPositiveInteger = (name: string, value: number) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ReindexConfigError(`${name} must be a positive integer. Received: ${String(value)}`);
  }
};

const assertNonEmpty = (name: string, value: string): string => {
  const normalized = value.trim();
  if (normalized === "") {
    throw new ReindexConfigError(`${name} must not be empty`);
  }
  return normalized;
};

const validateOverride = (
  resourceType: string,
  override: Partial<DelayedReindexSettings>
): Readonly<Partial<DelayedReindexSettings>> => {
  if (override.latency !== undefined) assertLatency(override.latency);
  if (override.margin !== undefined) assertNonNegativeInteger(`${resourceType}.margin`, override.margin);
  if (override.ttl !== undefined) assertPositiveInteger(`${resourceType}.ttl`, override.ttl);
  return Object.freeze({ ...override });
};

export const resolveReindexConfig = (input: ReindexConfigInput = {}): ReindexConfig => {
  const defaults: DelayedReindexSettings = {
    latency: input.defaults?.latency ?? defaultReindexSettings.latency,
    margin: input.defaults?.margin ?? defaultReindexSettings.margin,
    ttl: input.defaults?.ttl ?? defaultReindexSettings.ttl
  };
  assertLatency(defaults.latency);
  assertNonNegativeInteger("margin", defaults.margin);
  assertPositiveInteger("ttl", defaults.ttl);

  // No prototype, so a "__proto__" resource type stays an ordinary key.
  const overrides: Record<string, Readonly<Partial<DelayedReindexSettings>>> = Object.create(null);
  for (const [resourceType, override] of Object.entries(input.overrides ?? {})) {
    overrides[resourceType] = validateOverride(resourceType, override);
  }

  return Object.freeze({
    keyPrefix: assertNonEmpty("keyPrefix", input.keyPrefix ?? DEFAULT_KEY_PREFIX),
    queueName: assertNonEmpty("queueName", input.queueName ?? DEFAULT_QUEUE),
    defaults: Object.freeze(defaults),
    overrides: Object.freeze(overrides)
  });
};

/**
 * Type-specific override first, global default otherwise.
 */
export const resolveTypeSettings = (config: ReindexConfig, resourceType: string): ResolvedTypeSettings => {
  const override: Readonly<Partial<DelayedReindexSettings>> = Object.prototype.hasOwnProperty.call(config.overrides, resourceType)
    ? config.overrides[resourceType]
    : {};
  return {
    latency: assertLatency(override.latency ?? config.defaults.latency),
    margin: override.margin ?? config.defaults.margin,
    ttl: override.ttl ?? config.defaults.ttl,
    queueName: config.queueName
  };
};
