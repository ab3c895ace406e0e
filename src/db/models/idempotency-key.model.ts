import mongoose, { Schema, type Model } from "mongoose";

export interface IdempotencyKeyDoc {
  key: string;
  userId: string;
  route: string;
  requestHash: string;
  responseBody: unknown;
  createdAt: Date;
}

const idempotencySchema = new Schema<IdempotencyKeyDoc>(
  {
    key: { type: String, required: true },
    userId: { type: String, required: true },
    route: { type: String, required: true },
    requestHash: { type: String, required: true },
    responseBody: { type: Schema.Types.Mixed, required: true },
    createdAt: { type: Date, required: true },
  },
  { collection: "idempotencyKeys" },
);
idempotencySchema.index({ key: 1, userId: 1, route: 1 }, { unique: true });
idempotencySchema.index({ createdAt: 1 }, { expireAfterSeconds: 7 * 24 * 60 * 60 });

export const IdempotencyKeyModel: Model<IdempotencyKeyDoc> =
  mongoose.models.IdempotencyKey ?? mongoose.model<IdempotencyKeyDoc>("IdempotencyKey", idempotencySchema);
