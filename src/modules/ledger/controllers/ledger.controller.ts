import type { FastifyRequest } from "fastify";
import type { EngineContext } from "../../../context.js";
import { authorize } from "../../../utils/rbac.js";
import { serialize } from "../../../utils/serialize.js";
import { listTransactionsQuerySchema } from "../schemas/ledger.schemas.js";
import { listTransactions } from "../services/ledger.service.js";

export function createLedgerController(ctx: EngineContext) {
  return {
    list: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "ledger");
      const query = listTransactionsQuerySchema.parse(request.query);
      const page = await listTransactions(ctx, request.authUser, query);
      return serialize(page);
    },
  };
}
