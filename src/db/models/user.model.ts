import mongoose, { Schema, type Model } from "mongoose";
import { roles, userStatuses, type Role, type UserStatus } from "../../utils/constants.js";
import { timestamped } from "./_shared.js";

export interface UserDoc {
  email: string;
  fullName?: string;
  role: Role;
  status: UserStatus;
  kycComplete: boolean;
  tokenInvalidatedAt?: Date;
}

const userSchema = new Schema<UserDoc>(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true, maxlength: 320 },
    fullName: { type: String, trim: true, maxlength: 200 },
    role: { type: String, enum: roles, required: true, index: true },
    status: { type: String, enum: userStatuses, default: "active" },
    kycComplete: { type: Boolean, default: false },
    tokenInvalidatedAt: { type: Date },
  },
  { ...timestamped, collection: "users" },
);

export const UserModel: Model<UserDoc> =
  mongoose.models.User ?? mongoose.model<UserDoc>("User", userSchema);
