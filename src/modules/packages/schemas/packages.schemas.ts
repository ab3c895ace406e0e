import { z } from "zod";
import { packageKinds, packageStatuses } from "../../../utils/constants.js";
import { amountSchema, positiveAmountSchema, rateSchema } from "../../../utils/schemas.js";

export const listPackagesQuerySchema = z.object({
  kind: z.enum(packageKinds).optional(),
  category: z.string().trim().min(1).max(100).optional(),
  status: z.enum(packageStatuses).optional(),
  // sold-out packages are hidden unless availableOnly=false
  availableOnly: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});
export type ListPackagesQuery = z.infer<typeof listPackagesQuerySchema>;

export const createPackageSchema = z.object({
  name: z.string().trim().min(2).max(200),
  description: z.string().trim().max(5000).optional(),
  kind: z.enum(packageKinds).default("direct"),
  category: z.string().trim().min(1).max(100).optional(),
  // storage plans: price of one bag
  unitPrice: positiveAmountSchema.optional(),
  minAmount: amountSchema.default("0"),
  maxAmount: positiveAmountSchema.optional(),
  totalSlots: z.number().int().min(0),
  returnRate: rateSchema,
  durationDays: z.number().int().positive().max(3650),
});
export type CreatePackagePayload = z.infer<typeof createPackageSchema>;

export const packageStatusSchema = z.object({
  status: z.enum(packageStatuses),
});
