import http from "http";
import type {
  PostponeResult,
  ReindexRequest
} from "./application/postpone-reindex/postponeReindex.usecase";
import { buildCliErrorEnvelope } from "./cli/postpone";
import { createPostponeService } from "./composition/root";

export type PostponeHandler = (request: ReindexRequest) => Promise<PostponeResult>;

export type ServerOptions = {
  maxBodyBytes?: number;
};

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Numbers past 2^53 were already rounded by JSON.parse; such ids must come as strings.
const isId = (value: unknown): value is string | number =>
  (typeof value === "string" && value !== "") || (typeof value === "number" && Number.isSafeInteger(value));

/**
 * Accepts `{ type, ids, fields? }`; returns undefined for anything else.
 */
export const parseReindexBody = (body: unknown): ReindexRequest | undefined => {
  if (!isRecord(body)) return undefined;

  const { type, ids, fields } = body;
  if (typeof type !== "string" || type.trim() === "") return undefined;
  if (!Array.isArray(ids) || ids.length === 0 || !ids.every(isId)) return undefined;

  const request: ReindexRequest = { resourceType: type.trim(), ids };
  if (fields !== undefined) {
    if (!Array.isArray(fields) || !fields.every((field): field is string => typeof field === "string")) {
      return undefined;
    }
    request.updateFields = fields;
  }
  return request;
};

const sendJson = (res: http.ServerResponse, status: number, payload: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(payload));
};

/**
 * Past `maxBytes` the rest of the body is drained and dropped, then the promise rejects.
 */
const readBody = (req: http.IncomingMessage, maxBytes: number): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= maxBytes) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > maxBytes) {
        reject(new BodyTooLargeError(maxBytes));
        return;
      }
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });

const handleReindex = async (
  postpone: PostponeHandler,
  maxBodyBytes: number,
  req: http.IncomingMessage,
  res: http.ServerResponse
) => {
  let body: unknown;
  try {
    body = JSON.parse(await readBody(req, maxBodyBytes));
  } catch (err) {
    if (err instanceof BodyTooLargeError) {
      sendJson(res, 413, { ok: false, message: err.message });
      return;
    }
    sendJson(res, 400, { ok: false, message: "body must be JSON" });
    return;
  }

  const request = parseReindexBody(body);
  if (!request) {
    sendJson(res, 400, { ok: false, message: "expected { type, ids, fields? }" });
    return;
  }

  try {
    const result = await postpone(request);
    sendJson(res, 202, { ok: true, ...result });
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, false);
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    sendJson(res, 500, { ok: false, name: envelope.name, message: envelope.message });
  }
};

export const createServer = (postpone: PostponeHandler, options: ServerOptions = {}) => {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  return http.createServer((req, res) => {
    if (req.method === "POST" && req.url === "/reindex") {
      void handleReindex(postpone, maxBodyBytes, req, res);
      return;
    }
    if (req.method === "GET" && req.url === "/health") {
      sendJson(res, 200, { ok: true });
      return;
    }
    sendJson(res, 404, { ok: false, message: "not found" });
  });
};

if (require.main === module) {
  const port = Number(process.env.PORT ?? 3000);

  createPostponeService()
    .then((service) => {
      const server = createServer(service.postpone);
      server.listen(port, () => {
        console.log(`Server listening on http://localhost:${port}`);
      });
      process.once("SIGTERM", () => {
        server.close(() => {
          service.close().catch((err: unknown) => {
            console.error(JSON.stringify(buildCliErrorEnvelope(err, false)));
          });
        });
      });
    })
    .catch((err: unknown) => {
      console.error(JSON.stringify(buildCliErrorEnvelope(err, false)));
      process.exit(1);
    });
}
