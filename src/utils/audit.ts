import type { StoreSession } from "../db/store.js";
import type { EntityType } from "./constants.js";
import type { AuthUser } from "../types.js";

interface EventInput {
  entityType: EntityType;
  entityId: string;
  action: string;
  notes?: string;
  diff?: unknown;
}

/** Actor recorded for gateway callbacks and background workers. */
export const SYSTEM_ACTOR: AuthUser = {
  userId: "system",
  role: "admin",
};

export async function appendEvent(session: StoreSession, actor: AuthUser, input: EventInput) {
  await session.events.append({
    entityType: input.entityType,
    entityId: input.entityId,
    action: input.action,
    actorUserId: actor.userId,
    roleAtTime: actor.role,
    notes: input.notes,
    diff: input.diff,
  });
}
