import type { FastifyRequest } from "fastify";
import type { EngineContext } from "../../../context.js";
import { readCommandId, runIdempotentCommand } from "../../../utils/idempotency.js";
import { authorize } from "../../../utils/rbac.js";
import { idParamsSchema } from "../../../utils/schemas.js";
import { serialize } from "../../../utils/serialize.js";
import {
  createInvestmentSchema,
  forceApproveSchema,
  listInvestmentsQuerySchema,
  purgeCancelledSchema,
} from "../schemas/investments.schemas.js";
import {
  cancelInvestment,
  completeInvestment,
  createInvestment,
  forceActivate,
  getInvestment,
  getInvestmentStats,
  getInvestmentSummary,
  listInvestments,
  listWithdrawable,
  purgeCancelled,
} from "../services/investments.service.js";

export function createInvestmentController(ctx: EngineContext) {
  return {
    create: async (request: FastifyRequest) => {
      authorize(request.authUser, "create", "investment");
      const payload = createInvestmentSchema.parse(request.body);

      return runIdempotentCommand({
        store: ctx.store,
        commandId: readCommandId(request.headers),
        userId: request.authUser.userId,
        route: "POST:/v1/investments",
        payload,
        execute: async () => serialize(await createInvestment(ctx, request.authUser, payload)),
      });
    },

    list: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "investment");
      const query = listInvestmentsQuerySchema.parse(request.query);
      const rows = await listInvestments(ctx, request.authUser, query);
      return serialize(rows);
    },

    getById: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "investment");
      const params = idParamsSchema.parse(request.params);
      const investment = await getInvestment(ctx, request.authUser, params.id);
      return serialize(investment);
    },

    withdrawable: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "investment");
      const rows = await listWithdrawable(ctx, request.authUser);
      return serialize(rows);
    },

    summary: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "investment");
      return getInvestmentSummary(ctx, request.authUser);
    },

    cancel: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "investment");
      const params = idParamsSchema.parse(request.params);
      const investment = await cancelInvestment(ctx, request.authUser, params.id);
      return serialize(investment);
    },

    complete: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "investment");
      const params = idParamsSchema.parse(request.params);
      const investment = await completeInvestment(ctx, request.authUser, params.id);
      return serialize(investment);
    },

    mature: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "investment");
      const params = idParamsSchema.parse(request.params);
      const investment = await completeInvestment(ctx, request.authUser, params.id, { storageOnly: true });
      return serialize(investment);
    },

    purgeCancelled: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "investment");
      const payload = purgeCancelledSchema.parse(request.body ?? {});
      return purgeCancelled(ctx, request.authUser, payload.userId);
    },

    forceApprove: async (request: FastifyRequest) => {
      authorize(request.authUser, "approve", "investment");
      const params = idParamsSchema.parse(request.params);
      const payload = forceApproveSchema.parse(request.body ?? {});
      const investment = await forceActivate(ctx, request.authUser, params.id, payload.note);
      return serialize(investment);
    },

    reject: async (request: FastifyRequest) => {
      authorize(request.authUser, "approve", "investment");
      const params = idParamsSchema.parse(request.params);
      const investment = await cancelInvestment(ctx, request.authUser, params.id);
      return serialize(investment);
    },

    stats: async (request: FastifyRequest) => {
      authorize(request.authUser, "execute", "investment");
      return getInvestmentStats(ctx);
    },
  };
}
