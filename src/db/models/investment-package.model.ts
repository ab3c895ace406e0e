import mongoose, { Schema, type Model, type Types } from "mongoose";
import {
  packageKinds,
  packageStatuses,
  type PackageKind,
  type PackageStatus,
} from "../../utils/constants.js";
import { timestamped } from "./_shared.js";

export interface InvestmentPackageDoc {
  name: string;
  description?: string;
  kind: PackageKind;
  category?: string;
  unitPrice?: Types.Decimal128;
  minAmount: Types.Decimal128;
  maxAmount?: Types.Decimal128;
  totalSlots: number;
  availableSlots: number;
  status: PackageStatus;
  returnRate: Types.Decimal128;
  durationDays: number;
}

const investmentPackageSchema = new Schema<InvestmentPackageDoc>(
  {
    name: { type: String, required: true, trim: true, maxlength: 200 },
    description: { type: String, maxlength: 5000 },
    kind: { type: String, enum: packageKinds, required: true, default: "direct", index: true },
    category: { type: String, trim: true, index: true },
    unitPrice: { type: Schema.Types.Decimal128 },
    minAmount: { type: Schema.Types.Decimal128, required: true },
    maxAmount: { type: Schema.Types.Decimal128 },
    totalSlots: { type: Number, required: true, min: 0 },
    availableSlots: {
      type: Number,
      required: true,
      min: 0,
      validate: {
        validator(this: InvestmentPackageDoc, value: number) {
          return value <= this.totalSlots;
        },
        message: "availableSlots cannot exceed totalSlots",
      },
    },
    status: { type: String, enum: packageStatuses, default: "active", index: true },
    returnRate: { type: Schema.Types.Decimal128, required: true },
    durationDays: { type: Number, required: true, min: 1 },
  },
  { ...timestamped, collection: "investmentPackages" },
);

investmentPackageSchema.index({ status: 1, kind: 1 });

export const InvestmentPackageModel: Model<InvestmentPackageDoc> =
  mongoose.models.InvestmentPackage ??
  mongoose.model<InvestmentPackageDoc>("InvestmentPackage", investmentPackageSchema);
