import mongoose, { Schema, type Model, type Types } from "mongoose";
import {
  investmentStatuses,
  packageKinds,
  reconciliationFlags,
  reservationStates,
  type InvestmentStatus,
  type PackageKind,
  type ReconciliationFlag,
  type ReservationState,
} from "../../utils/constants.js";
import { timestamped } from "./_shared.js";

export interface InvestmentDoc {
  userId: Types.ObjectId;
  packageId: Types.ObjectId;
  packageName: string;
  kind: PackageKind;
  quantity: number;
  amount: Types.Decimal128;
  status: InvestmentStatus;
  reservation: ReservationState;
  startDate?: Date;
  endDate?: Date;
  completedDate?: Date;
  cancelledAt?: Date;
  expectedReturn?: Types.Decimal128;
  actualReturn?: Types.Decimal128;
  withdrawalRequestId?: Types.ObjectId | null;
  reconciliationFlag?: ReconciliationFlag;
}

const investmentSchema = new Schema<InvestmentDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    packageId: { type: Schema.Types.ObjectId, ref: "InvestmentPackage", required: true, index: true },
    packageName: { type: String, required: true },
    kind: { type: String, enum: packageKinds, required: true },
    quantity: { type: Number, required: true, min: 1, default: 1 },
    amount: { type: Schema.Types.Decimal128, required: true },
    status: { type: String, enum: investmentStatuses, default: "pending", index: true },
    reservation: { type: String, enum: reservationStates, default: "none" },
    startDate: { type: Date },
    endDate: { type: Date, index: true },
    completedDate: { type: Date },
    cancelledAt: { type: Date },
    expectedReturn: { type: Schema.Types.Decimal128 },
    actualReturn: { type: Schema.Types.Decimal128 },
    withdrawalRequestId: { type: Schema.Types.ObjectId, ref: "WithdrawalRequest", default: null },
    reconciliationFlag: { type: String, enum: reconciliationFlags },
  },
  { ...timestamped, collection: "investments" },
);

investmentSchema.index({ userId: 1, status: 1 });
investmentSchema.index({ userId: 1, status: 1, withdrawalRequestId: 1 });
investmentSchema.index({ status: 1, endDate: 1 });

export const InvestmentModel: Model<InvestmentDoc> =
  mongoose.models.Investment ?? mongoose.model<InvestmentDoc>("Investment", investmentSchema);
