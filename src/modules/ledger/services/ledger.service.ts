import type { EngineContext } from "../../../context.js";
import type { AuthUser } from "../../../types.js";
import { paginate, paginatedResult } from "../../../utils/pagination.js";
import type { ListTransactionsQuery } from "../schemas/ledger.schemas.js";

export async function listTransactions(ctx: EngineContext, actor: AuthUser, query: ListTransactionsQuery) {
  const userId = actor.role === "admin" ? query.userId : actor.userId;
  const { rows, total } = await ctx.store.ledger.list(
    { userId, transactionType: query.type, investmentId: query.investmentId },
    paginate(query.page, query.limit),
  );
  return paginatedResult(rows, total, query.page, query.limit);
}
