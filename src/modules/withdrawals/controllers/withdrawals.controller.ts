import type { FastifyRequest } from "fastify";
import type { EngineContext } from "../../../context.js";
import { readCommandId, runIdempotentCommand } from "../../../utils/idempotency.js";
import { authorize } from "../../../utils/rbac.js";
import { idParamsSchema } from "../../../utils/schemas.js";
import { serialize } from "../../../utils/serialize.js";
import {
  createWithdrawalSchema,
  listWithdrawalsQuerySchema,
  withdrawalActionParamsSchema,
  withdrawalActionSchema,
  withdrawalNotesSchema,
} from "../schemas/withdrawals.schemas.js";
import {
  addWithdrawalNote,
  createWithdrawal,
  getWithdrawal,
  listWithdrawals,
  processWithdrawalAction,
} from "../services/withdrawals.service.js";

export function createWithdrawalController(ctx: EngineContext) {
  return {
    create: async (request: FastifyRequest) => {
      authorize(request.authUser, "create", "withdrawal");
      const payload = createWithdrawalSchema.parse(request.body);

      return runIdempotentCommand({
        store: ctx.store,
        commandId: readCommandId(request.headers),
        userId: request.authUser.userId,
        route: "POST:/v1/withdrawals",
        payload,
        execute: async () => serialize(await createWithdrawal(ctx, request.authUser, payload)),
      });
    },

    list: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "withdrawal");
      const query = listWithdrawalsQuerySchema.parse(request.query);
      const rows = await listWithdrawals(ctx, request.authUser, query);
      return serialize(rows);
    },

    getById: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "withdrawal");
      const params = idParamsSchema.parse(request.params);
      const withdrawal = await getWithdrawal(ctx, request.authUser, params.id);
      return serialize(withdrawal);
    },

    process: async (request: FastifyRequest) => {
      authorize(request.authUser, "approve", "withdrawal");
      const params = withdrawalActionParamsSchema.parse(request.params);
      const payload = withdrawalActionSchema.parse(request.body ?? {});
      const withdrawal = await processWithdrawalAction(
        ctx,
        request.authUser,
        params.id,
        params.action,
        payload.reason,
      );
      return serialize(withdrawal);
    },

    addNote: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "withdrawal");
      const params = idParamsSchema.parse(request.params);
      const payload = withdrawalNotesSchema.parse(request.body);
      const withdrawal = await addWithdrawalNote(ctx, request.authUser, params.id, payload.notes);
      return serialize(withdrawal);
    },
  };
}
