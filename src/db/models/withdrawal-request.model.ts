import mongoose, { Schema, type Model, type Types } from "mongoose";
import {
  withdrawalStatuses,
  withdrawalTypes,
  type WithdrawalStatus,
  type WithdrawalType,
} from "../../utils/constants.js";
import { timestamped } from "./_shared.js";

export interface WithdrawalRequestDoc {
  userId: Types.ObjectId;
  amount: Types.Decimal128;
  type: WithdrawalType;
  status: WithdrawalStatus;
  processedDate?: Date;
  adminNotes: string;
  paymentReference?: string;
  investmentIds: Types.ObjectId[];
}

const withdrawalRequestSchema = new Schema<WithdrawalRequestDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    amount: { type: Schema.Types.Decimal128, required: true },
    type: { type: String, enum: withdrawalTypes, required: true },
    status: { type: String, enum: withdrawalStatuses, default: "pending", index: true },
    processedDate: { type: Date },
    adminNotes: { type: String, default: "" },
    paymentReference: { type: String },
    investmentIds: [{ type: Schema.Types.ObjectId, ref: "Investment" }],
  },
  { ...timestamped, collection: "withdrawalRequests" },
);

withdrawalRequestSchema.index({ userId: 1, createdAt: -1 });

export const WithdrawalRequestModel: Model<WithdrawalRequestDoc> =
  mongoose.models.WithdrawalRequest ??
  mongoose.model<WithdrawalRequestDoc>("WithdrawalRequest", withdrawalRequestSchema);
