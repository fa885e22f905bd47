#!/usr/bin/env node
import type { ReindexRequest } from "../application/postpone-reindex/postponeReindex.usecase";
import { runPostpone } from "../composition/root";

type CliErrorEnvelope = {
  event: "postpone.failed";
  name: string;
  message: string;
  code?: string;
  stack?: string;
};

export const USAGE = "usage: postpone <resourceType> <id,id,...> [field,field,...]";

const splitCsv = (value: string): string[] =>
  value.split(",").map((part) => part.trim()).filter((part) => part !== "");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const parsePostponeArgs = (argv: readonly string[]): ReindexRequest => {
  const [resourceType, rawIds, rawFields] = argv;
  if (!resourceType?.trim() || rawIds == null) {
    throw new Error(USAGE);
  }

  const ids = splitCsv(rawIds);
  if (ids.length === 0) {
    throw new Error(USAGE);
  }

  const request: ReindexRequest = { resourceType: resourceType.trim(), ids };
  if (rawFields != null) {
    request.updateFields = splitCsv(rawFields);
  }
  return request;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "postpone.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executePostponeCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const result = await runPostpone(parsePostponeArgs(argv));
    console.log(JSON.stringify({ event: "postpone.completed", ...result }));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executePostponeCli();
}
