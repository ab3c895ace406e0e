import { z } from "zod";
import { withdrawalActions, withdrawalStatuses, withdrawalTypes } from "../../../utils/constants.js";
import { objectIdSchema } from "../../../utils/schemas.js";

export const createWithdrawalSchema = z.object({
  type: z.enum(withdrawalTypes),
  investmentIds: z.array(objectIdSchema).min(1).max(200).optional(),
});
export type CreateWithdrawalPayload = z.infer<typeof createWithdrawalSchema>;

export const listWithdrawalsQuerySchema = z.object({
  status: z.enum(withdrawalStatuses).optional(),
  userId: objectIdSchema.optional(),
});

export const withdrawalActionParamsSchema = z.object({
  id: objectIdSchema,
  action: z.enum(withdrawalActions),
});

export const withdrawalActionSchema = z.object({
  reason: z.string().trim().min(2).max(2000).optional(),
});

export const withdrawalNotesSchema = z.object({
  notes: z.string().trim().min(1, "Notes cannot be empty").max(5000),
});
