import { z } from "zod";
import { transactionTypes } from "../../../utils/constants.js";
import { paginationSchema } from "../../../utils/pagination.js";
import { objectIdSchema } from "../../../utils/schemas.js";

export const listTransactionsQuerySchema = paginationSchema.extend({
  type: z.enum(transactionTypes).optional(),
  investmentId: objectIdSchema.optional(),
  userId: objectIdSchema.optional(),
});
export type ListTransactionsQuery = z.infer<typeof listTransactionsQuerySchema>;
