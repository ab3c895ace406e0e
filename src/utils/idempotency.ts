import { createHash } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import type { StoreSession } from "../db/store.js";
import { ConflictError, HttpError } from "./errors.js";

function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortValue);
  if (!value || typeof value !== "object") return value;

  const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
  const out: Record<string, unknown> = {};
  for (const [key, raw] of entries) {
    out[key] = sortValue(raw);
  }
  return out;
}

export function stableJsonStringify(input: unknown): string {
  return JSON.stringify(sortValue(input));
}

export function hashPayload(payload: unknown): string {
  return createHash("sha256").update(stableJsonStringify(payload)).digest("hex");
}

const COMMAND_HEADERS = ["idempotency-key", "x-command-id"] as const;

export function readCommandId(headers: IncomingHttpHeaders): string | undefined {
  for (const name of COMMAND_HEADERS) {
    const raw = headers[name];
    const value = Array.isArray(raw) ? raw[0] : raw;
    const commandId = value?.trim();
    if (commandId) return commandId;
  }
  return undefined;
}

interface IdempotencyOptions {
  store: StoreSession;
  commandId?: string;
  userId: string;
  route: string;
  payload: unknown;
  execute: () => Promise<unknown>;
}

/**
 * Replays the stored response when the same command id is sent again.
 * The replayed body is the JSON the first call produced.
 */
export async function runIdempotentCommand({
  store,
  commandId,
  userId,
  route,
  payload,
  execute,
}: IdempotencyOptions): Promise<unknown> {
  if (!commandId) return execute();

  const requestHash = hashPayload(payload);
  const existing = await store.idempotency.find(commandId, userId, route);

  if (existing) {
    if (existing.requestHash !== requestHash) {
      throw new ConflictError("Command ID already used with a different payload");
    }
    return existing.responseBody;
  }

  const responseBody = await execute();
  const saved = await store.idempotency.save({ key: commandId, userId, route, requestHash, responseBody });
  if (saved) return responseBody;

  const raced = await store.idempotency.find(commandId, userId, route);
  if (!raced) throw new HttpError(500, "Unable to persist idempotency record");
  if (raced.requestHash !== requestHash) {
    throw new ConflictError("Command ID already used with a different payload");
  }
  return raced.responseBody;
}
