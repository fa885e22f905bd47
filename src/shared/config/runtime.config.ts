import {
  resolveReindexConfig,
  type DelayedReindexSettings,
  type ReindexConfig
} from "../../application/postpone-reindex/reindex.config";

export const runtimeCaps = {
  latency: { min: 1, max: 3600 },
  margin: { min: 0, max: 3600 },
  ttl: { min: 1, max: 60 * 60 * 24 * 30 }
} as const;

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const settingKeys: Array<keyof DelayedReindexSettings> = ["latency", "margin", "ttl"];

/**
 * REINDEX_TYPE_OVERRIDES='{"CitiesIndex":{"latency":2,"margin":1}}'
 */
const parseTypeOverrides = (raw: string | undefined): Record<string, Partial<DelayedReindexSettings>> | undefined => {
  if (raw == null || raw.trim() === "") return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`REINDEX_TYPE_OVERRIDES must be a JSON object. Received: ${raw}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`REINDEX_TYPE_OVERRIDES must be a JSON object. Received: ${raw}`);
  }

  const overrides: Record<string, Partial<DelayedReindexSettings>> = Object.create(null);
  for (const [resourceType, value] of Object.entries(parsed)) {
    if (!isRecord(value)) {
      throw new Error(`REINDEX_TYPE_OVERRIDES.${resourceType} must be an object`);
    }

    const override: Partial<DelayedReindexSettings> = {};
    for (const key of settingKeys) {
      const setting = value[key];
      if (setting === undefined) continue;
      const range = runtimeCaps[key];
      if (typeof setting !== "number" || !Number.isInteger(setting) || setting < range.min || setting > range.max) {
        throw new Error(
          `REINDEX_TYPE_OVERRIDES.${resourceType}.${key}=${String(setting)} is out of allowed range [${range.min}..${range.max}]`
        );
      }
      override[key] = setting;
    }
    overrides[resourceType] = override;
  }

  return overrides;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): ReindexConfig =>
  resolveReindexConfig({
    keyPrefix: env.REINDEX_KEY_PREFIX?.trim() ? env.REINDEX_KEY_PREFIX : undefined,
    queueName: env.REINDEX_QUEUE?.trim() ? env.REINDEX_QUEUE : undefined,
    defaults: {
      latency: parseOptionalIntInRange(env, "REINDEX_LATENCY", runtimeCaps.latency),
      margin: parseOptionalIntInRange(env, "REINDEX_MARGIN", runtimeCaps.margin),
      ttl: parseOptionalIntInRange(env, "REINDEX_TTL", runtimeCaps.ttl)
    },
    overrides: parseTypeOverrides(env.REINDEX_TYPE_OVERRIDES)
  });
