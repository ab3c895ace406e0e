import { z } from "zod";
import { isAmount, normalizeAmount, toMinorUnits } from "./decimal.js";

export const objectIdSchema = z.string().regex(/^[a-f0-9]{24}$/i, "Invalid id");

export const idParamsSchema = z.object({
  id: objectIdSchema,
});

/** Decimal given as string or number, normalized to a two-digit string. */
export const amountSchema = z
  .union([z.string().trim(), z.number()])
  .refine(isAmount, "Invalid decimal amount")
  .transform((value) => normalizeAmount(value));

export const positiveAmountSchema = amountSchema.refine(
  (value) => toMinorUnits(value) > 0n,
  "Amount must be greater than zero",
);

export const rateSchema = z
  .union([z.string().trim(), z.number()])
  .refine(isAmount, "Invalid rate")
  .transform((value) => String(value).trim())
  .refine((value) => !value.startsWith("-"), "Rate cannot be negative");
