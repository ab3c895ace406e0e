import type { Types } from "mongoose";

export const timestamped = { timestamps: true } as const;

/** Shape of a `.lean()` result for a schema declared over `T`. */
export type LeanDoc<T> = T & { _id: Types.ObjectId; createdAt: Date; updatedAt: Date };
