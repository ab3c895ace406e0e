import mongoose from "mongoose";

function deepConvert(input: unknown): unknown {
  if (input instanceof mongoose.Types.Decimal128) return input.toString();
  if (input instanceof mongoose.Types.ObjectId) return input.toString();
  if (input instanceof Date) return input.toISOString();
  if (Array.isArray(input)) return input.map((item) => deepConvert(item));

  if (input && typeof input === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (value === undefined) continue;
      out[key] = deepConvert(value);
    }
    return out;
  }

  return input;
}

/** JSON-ready copy of a record: dates as ISO strings, ids and decimals as strings. */
export function serialize(doc: unknown): unknown {
  return deepConvert(doc);
}
