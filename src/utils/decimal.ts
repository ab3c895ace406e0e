import mongoose from "mongoose";
import { ValidationError } from "./errors.js";

/**
 * Money is carried as a canonical decimal string with two fraction digits
 * ("185.00") and computed in integer minor units. Storage uses Decimal128.
 */
export type Amount = string;

const MINOR_DIGITS = 2;
const MINOR_FACTOR = 10n ** BigInt(MINOR_DIGITS);
const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

export function toDecimal(value: string | number | mongoose.Types.Decimal128) {
  if (value instanceof mongoose.Types.Decimal128) return value;
  return mongoose.Types.Decimal128.fromString(String(value));
}

function parseScaled(raw: string, digits: number): bigint {
  const match = DECIMAL_PATTERN.exec(raw.trim());
  if (!match) throw new ValidationError(`Invalid decimal amount: ${raw}`);
  const [, sign, whole, fraction = ""] = match;
  const kept = fraction.slice(0, digits).padEnd(digits, "0");
  let scaled = BigInt(whole) * 10n ** BigInt(digits) + BigInt(kept || "0");
  // round half up on the first dropped digit
  const dropped = fraction.slice(digits);
  if (dropped.length > 0 && Number(dropped[0]) >= 5) scaled += 1n;
  return sign ? -scaled : scaled;
}

function asString(value: string | number | mongoose.Types.Decimal128): string {
  if (value instanceof mongoose.Types.Decimal128) return value.toString();
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ValidationError(`Invalid decimal amount: ${value}`);
    return value.toFixed(MINOR_DIGITS + 2);
  }
  return value;
}

export function isAmount(value: string | number): boolean {
  if (typeof value === "number") return Number.isFinite(value);
  return DECIMAL_PATTERN.test(value.trim());
}

export function toMinorUnits(value: string | number | mongoose.Types.Decimal128): bigint {
  return parseScaled(asString(value), MINOR_DIGITS);
}

export function fromMinorUnits(minor: bigint): Amount {
  const negative = minor < 0n;
  const abs = negative ? -minor : minor;
  const whole = abs / MINOR_FACTOR;
  const fraction = (abs % MINOR_FACTOR).toString().padStart(MINOR_DIGITS, "0");
  return `${negative ? "-" : ""}${whole.toString()}.${fraction}`;
}

export function normalizeAmount(value: string | number | mongoose.Types.Decimal128): Amount {
  return fromMinorUnits(toMinorUnits(value));
}

export function sumAmounts(values: Array<string | mongoose.Types.Decimal128>): Amount {
  return fromMinorUnits(values.reduce<bigint>((total, value) => total + toMinorUnits(value), 0n));
}

export function subtractAmounts(left: string, right: string): Amount {
  return fromMinorUnits(toMinorUnits(left) - toMinorUnits(right));
}

export function multiplyAmount(amount: string, quantity: number): Amount {
  if (!Number.isInteger(quantity)) throw new ValidationError("Quantity must be a whole number");
  return fromMinorUnits(toMinorUnits(amount) * BigInt(quantity));
}

export function compareAmounts(left: string, right: string): -1 | 0 | 1 {
  const a = toMinorUnits(left);
  const b = toMinorUnits(right);
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

const RATE_DIGITS = 4;

/** amount × (1 + ratePercent / 100), rounded half up to minor units. */
export function applyReturnRate(amount: string, ratePercent: string): Amount {
  const principal = toMinorUnits(amount);
  const rate = parseScaled(ratePercent, RATE_DIGITS);
  const divisor = 100n * 10n ** BigInt(RATE_DIGITS);
  const product = principal * rate;
  const interest = (product + divisor / 2n) / divisor;
  return fromMinorUnits(principal + interest);
}

/** Gateways take integer minor units (kobo for NGN). */
export function toGatewayAmount(amount: string): number {
  return Number(toMinorUnits(amount));
}
