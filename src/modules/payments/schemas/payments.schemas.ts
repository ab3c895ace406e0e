import { z } from "zod";
import { objectIdSchema } from "../../../utils/schemas.js";

export const verifyPaymentSchema = z.object({
  reference: z.string().trim().min(1).max(200),
});

export const listPaymentsQuerySchema = z.object({
  userId: objectIdSchema.optional(),
});
