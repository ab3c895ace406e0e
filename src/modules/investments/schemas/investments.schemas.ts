import { z } from "zod";
import { investmentStatuses } from "../../../utils/constants.js";
import { objectIdSchema, positiveAmountSchema } from "../../../utils/schemas.js";

export const createInvestmentSchema = z.object({
  packageId: objectIdSchema,
  // direct packages: the amount invested
  amount: positiveAmountSchema.optional(),
  // storage plans: number of bags
  quantity: z.number().int().positive().max(10_000).optional(),
});
export type CreateInvestmentPayload = z.infer<typeof createInvestmentSchema>;

export const listInvestmentsQuerySchema = z.object({
  status: z.enum(investmentStatuses).optional(),
  packageId: objectIdSchema.optional(),
  userId: objectIdSchema.optional(),
});
export type ListInvestmentsQuery = z.infer<typeof listInvestmentsQuerySchema>;

export const purgeCancelledSchema = z.object({
  userId: objectIdSchema.optional(),
});

export const forceApproveSchema = z.object({
  note: z.string().trim().max(2000).optional(),
});
