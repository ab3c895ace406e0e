import mongoose, { Schema, type Model, type Types } from "mongoose";
import {
  paymentChannels,
  paymentStatuses,
  reconciliationFlags,
  type PaymentChannel,
  type PaymentStatus,
  type ReconciliationFlag,
} from "../../utils/constants.js";
import { timestamped } from "./_shared.js";

export interface PaymentDoc {
  userId: Types.ObjectId;
  investmentId?: Types.ObjectId;
  amount: Types.Decimal128;
  currency: string;
  status: PaymentStatus;
  channel: PaymentChannel;
  reference: string;
  gatewayId?: string;
  authorizationUrl?: string;
  accessCode?: string;
  paidAt?: Date;
  reconciliationFlag?: ReconciliationFlag;
  metadata: Record<string, unknown>;
}

const paymentSchema = new Schema<PaymentDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    investmentId: { type: Schema.Types.ObjectId, ref: "Investment", index: true },
    amount: { type: Schema.Types.Decimal128, required: true },
    currency: { type: String, default: "NGN" },
    status: { type: String, enum: paymentStatuses, default: "pending", index: true },
    channel: { type: String, enum: paymentChannels, default: "paystack" },
    reference: { type: String, required: true, unique: true },
    gatewayId: { type: String },
    authorizationUrl: { type: String },
    accessCode: { type: String },
    paidAt: { type: Date },
    reconciliationFlag: { type: String, enum: reconciliationFlags },
    metadata: { type: Schema.Types.Mixed, default: {} },
  },
  { ...timestamped, collection: "payments", minimize: false },
);

paymentSchema.index({ investmentId: 1, status: 1 });

export const PaymentModel: Model<PaymentDoc> =
  mongoose.models.Payment ?? mongoose.model<PaymentDoc>("Payment", paymentSchema);
