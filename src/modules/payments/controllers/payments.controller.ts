import type { FastifyRequest } from "fastify";
import type { EngineContext } from "../../../context.js";
import { authorize } from "../../../utils/rbac.js";
import { idParamsSchema } from "../../../utils/schemas.js";
import { serialize } from "../../../utils/serialize.js";
import { listPaymentsQuerySchema, verifyPaymentSchema } from "../schemas/payments.schemas.js";
import {
  getPaymentStatus,
  initializePayment,
  listPayments,
  verifyPayment,
} from "../services/payments.service.js";

export function createPaymentController(ctx: EngineContext) {
  return {
    initialize: async (request: FastifyRequest) => {
      authorize(request.authUser, "create", "payment");
      const params = idParamsSchema.parse(request.params);
      const session = await initializePayment(ctx, request.authUser, params.id);
      return serialize(session);
    },

    verify: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "payment");
      const payload = verifyPaymentSchema.parse(request.body);
      const result = await verifyPayment(ctx, request.authUser, payload.reference);
      return serialize(result);
    },

    list: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "payment");
      const query = listPaymentsQuerySchema.parse(request.query);
      const rows = await listPayments(ctx, request.authUser, query.userId);
      return serialize(rows);
    },

    status: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "payment");
      const params = idParamsSchema.parse(request.params);
      const status = await getPaymentStatus(ctx, request.authUser, params.id);
      return serialize(status);
    },
  };
}
