import { Types, type ClientSession, type FilterQuery } from "mongoose";
import {
  EventLogModel,
  IdempotencyKeyModel,
  InvestmentModel,
  InvestmentPackageModel,
  LedgerEntryModel,
  PaymentModel,
  UserModel,
  WithdrawalRequestModel,
} from "./models.js";
import type { LeanDoc } from "./models/_shared.js";
import type { InvestmentDoc } from "./models/investment.model.js";
import type { InvestmentPackageDoc } from "./models/investment-package.model.js";
import type { LedgerEntryDoc } from "./models/ledger-entry.model.js";
import type { PaymentDoc } from "./models/payment.model.js";
import type { UserDoc } from "./models/user.model.js";
import type { WithdrawalRequestDoc } from "./models/withdrawal-request.model.js";
import type {
  InvestmentPatch,
  InvestmentRecord,
  LedgerEntryRecord,
  PackageRecord,
  PaymentPatch,
  PaymentRecord,
  Store,
  StoreSession,
  UserRecord,
  WithdrawalPatch,
  WithdrawalRecord,
} from "./store.js";
import { normalizeAmount, toDecimal } from "../utils/decimal.js";
import { ConflictError, NotFoundError } from "../utils/errors.js";
import { isDuplicateKeyError, runInTransaction } from "../utils/tx.js";

const objectId = (id: string) => new Types.ObjectId(id);
const isId = (id: string) => Types.ObjectId.isValid(id);
const optionalMoney = (value?: Types.Decimal128) => (value ? normalizeAmount(value) : undefined);
const optionalId = (value?: Types.ObjectId | null) => (value ? String(value) : undefined);

function toUser(doc: LeanDoc<UserDoc>): UserRecord {
  return {
    id: String(doc._id),
    email: doc.email,
    fullName: doc.fullName,
    role: doc.role,
    status: doc.status,
    kycComplete: doc.kycComplete,
    tokenInvalidatedAt: doc.tokenInvalidatedAt,
  };
}

function toPackage(doc: LeanDoc<InvestmentPackageDoc>): PackageRecord {
  return {
    id: String(doc._id),
    name: doc.name,
    description: doc.description,
    kind: doc.kind,
    category: doc.category,
    unitPrice: optionalMoney(doc.unitPrice),
    minAmount: normalizeAmount(doc.minAmount),
    maxAmount: optionalMoney(doc.maxAmount),
    totalSlots: doc.totalSlots,
    availableSlots: doc.availableSlots,
    status: doc.status,
    returnRate: doc.returnRate.toString(),
    durationDays: doc.durationDays,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toInvestment(doc: LeanDoc<InvestmentDoc>): InvestmentRecord {
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    packageId: String(doc.packageId),
    packageName: doc.packageName,
    kind: doc.kind,
    quantity: doc.quantity,
    amount: normalizeAmount(doc.amount),
    status: doc.status,
    reservation: doc.reservation,
    startDate: doc.startDate,
    endDate: doc.endDate,
    completedDate: doc.completedDate,
    cancelledAt: doc.cancelledAt,
    expectedReturn: optionalMoney(doc.expectedReturn),
    actualReturn: optionalMoney(doc.actualReturn),
    withdrawalRequestId: optionalId(doc.withdrawalRequestId),
    reconciliationFlag: doc.reconciliationFlag,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toPayment(doc: LeanDoc<PaymentDoc>): PaymentRecord {
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    investmentId: optionalId(doc.investmentId),
    amount: normalizeAmount(doc.amount),
    currency: doc.currency,
    status: doc.status,
    channel: doc.channel,
    reference: doc.reference,
    gatewayId: doc.gatewayId,
    authorizationUrl: doc.authorizationUrl,
    accessCode: doc.accessCode,
    paidAt: doc.paidAt,
    reconciliationFlag: doc.reconciliationFlag,
    metadata: doc.metadata ?? {},
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toLedgerEntry(doc: LeanDoc<LedgerEntryDoc>): LedgerEntryRecord {
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    investmentId: optionalId(doc.investmentId),
    withdrawalRequestId: optionalId(doc.withdrawalRequestId),
    transactionType: doc.transactionType,
    amount: normalizeAmount(doc.amount),
    status: doc.status,
    description: doc.description,
    paymentReference: doc.paymentReference,
    idempotencyKey: doc.idempotencyKey,
    createdAt: doc.createdAt,
  };
}

function toWithdrawal(doc: LeanDoc<WithdrawalRequestDoc>): WithdrawalRecord {
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    amount: normalizeAmount(doc.amount),
    type: doc.type,
    status: doc.status,
    processedDate: doc.processedDate,
    adminNotes: doc.adminNotes,
    paymentReference: doc.paymentReference,
    investmentIds: doc.investmentIds.map(String),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function definedOnly(patch: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
}

function investmentSet(patch: InvestmentPatch): Record<string, unknown> {
  return definedOnly({
    ...patch,
    expectedReturn: patch.expectedReturn === undefined ? undefined : toDecimal(patch.expectedReturn),
    actualReturn: patch.actualReturn === undefined ? undefined : toDecimal(patch.actualReturn),
  });
}

/** Repositories bound to `session`; without one every call runs standalone. */
export function createMongoSession(session?: ClientSession): StoreSession {
  const bound = session ?? null;

  return {
    users: {
      async findById(id) {
        if (!isId(id)) return null;
        const doc = await UserModel.findById(id).session(bound).lean<LeanDoc<UserDoc>>();
        return doc ? toUser(doc) : null;
      },
    },

    packages: {
      async findById(id) {
        if (!isId(id)) return null;
        const doc = await InvestmentPackageModel.findById(id).session(bound).lean<LeanDoc<InvestmentPackageDoc>>();
        return doc ? toPackage(doc) : null;
      },

      async list(filter) {
        const query: FilterQuery<InvestmentPackageDoc> = {};
        if (filter.status) query.status = filter.status;
        if (filter.kind) query.kind = filter.kind;
        if (filter.category) query.category = filter.category;
        if (filter.availableOnly) query.availableSlots = { $gt: 0 };
        const rows = await InvestmentPackageModel.find(query)
          .sort({ createdAt: -1 })
          .session(bound)
          .lean<LeanDoc<InvestmentPackageDoc>[]>();
        return rows.map(toPackage);
      },

      async create(input) {
        const [created] = await InvestmentPackageModel.create(
          [
            {
              ...input,
              unitPrice: input.unitPrice === undefined ? undefined : toDecimal(input.unitPrice),
              minAmount: toDecimal(input.minAmount),
              maxAmount: input.maxAmount === undefined ? undefined : toDecimal(input.maxAmount),
              returnRate: toDecimal(input.returnRate),
            },
          ],
          { session },
        );
        return toPackage(created.toObject<LeanDoc<InvestmentPackageDoc>>());
      },

      async setStatus(id, status) {
        if (!isId(id)) return null;
        const doc = await InvestmentPackageModel.findByIdAndUpdate(
          id,
          { $set: { status } },
          { new: true, session },
        ).lean<LeanDoc<InvestmentPackageDoc>>();
        return doc ? toPackage(doc) : null;
      },

      async takeSlots(id, quantity) {
        const doc = await InvestmentPackageModel.findOneAndUpdate(
          { _id: objectId(id), availableSlots: { $gte: quantity } },
          { $inc: { availableSlots: -quantity } },
          { new: true, session },
        ).lean<LeanDoc<InvestmentPackageDoc>>();
        return doc ? toPackage(doc) : null;
      },

      async returnSlots(id, quantity) {
        const doc = await InvestmentPackageModel.findOneAndUpdate(
          {
            _id: objectId(id),
            $expr: { $lte: [{ $add: ["$availableSlots", quantity] }, "$totalSlots"] },
          },
          { $inc: { availableSlots: quantity } },
          { new: true, session },
        ).lean<LeanDoc<InvestmentPackageDoc>>();
        return doc ? toPackage(doc) : null;
      },
    },

    investments: {
      async findById(id) {
        if (!isId(id)) return null;
        const doc = await InvestmentModel.findById(id).session(bound).lean<LeanDoc<InvestmentDoc>>();
        return doc ? toInvestment(doc) : null;
      },

      async list(filter) {
        const query: FilterQuery<InvestmentDoc> = {};
        if (filter.userId) query.userId = objectId(filter.userId);
        if (filter.status) query.status = filter.status;
        if (filter.packageId) query.packageId = objectId(filter.packageId);
        const rows = await InvestmentModel.find(query)
          .sort({ createdAt: -1 })
          .session(bound)
          .lean<LeanDoc<InvestmentDoc>[]>();
        return rows.map(toInvestment);
      },

      async findWithdrawable(userId, ids) {
        const query: FilterQuery<InvestmentDoc> = {
          userId: objectId(userId),
          status: "completed",
          withdrawalRequestId: null,
        };
        if (ids) query._id = { $in: ids.filter(isId).map(objectId) };
        const rows = await InvestmentModel.find(query)
          .sort({ completedDate: 1 })
          .session(bound)
          .lean<LeanDoc<InvestmentDoc>[]>();
        return rows.map(toInvestment);
      },

      async findMatured(now, limit) {
        const rows = await InvestmentModel.find({ status: "active", endDate: { $lte: now } })
          .sort({ endDate: 1 })
          .limit(limit)
          .session(bound)
          .lean<LeanDoc<InvestmentDoc>[]>();
        return rows.map(toInvestment);
      },

      async create(input) {
        const [created] = await InvestmentModel.create(
          [
            {
              ...input,
              userId: objectId(input.userId),
              packageId: objectId(input.packageId),
              amount: toDecimal(input.amount),
              expectedReturn: input.expectedReturn === undefined ? undefined : toDecimal(input.expectedReturn),
              actualReturn: input.actualReturn === undefined ? undefined : toDecimal(input.actualReturn),
              withdrawalRequestId: input.withdrawalRequestId ? objectId(input.withdrawalRequestId) : null,
            },
          ],
          { session },
        );
        return toInvestment(created.toObject<LeanDoc<InvestmentDoc>>());
      },

      async update(id, patch) {
        const doc = await InvestmentModel.findByIdAndUpdate(
          id,
          { $set: investmentSet(patch) },
          { new: true, session },
        ).lean<LeanDoc<InvestmentDoc>>();
        if (!doc) throw new NotFoundError("Investment not found");
        return toInvestment(doc);
      },

      async linkToWithdrawal(ids, withdrawalId) {
        const result = await InvestmentModel.updateMany(
          { _id: { $in: ids.map(objectId) }, withdrawalRequestId: null },
          { $set: { withdrawalRequestId: objectId(withdrawalId) } },
          { session },
        );
        return result.modifiedCount;
      },

      async deleteCancelled(userId) {
        const query: FilterQuery<InvestmentDoc> = { status: "cancelled" };
        if (userId) query.userId = objectId(userId);
        const result = await InvestmentModel.deleteMany(query, { session });
        return result.deletedCount;
      },
    },

    payments: {
      async findById(id) {
        if (!isId(id)) return null;
        const doc = await PaymentModel.findById(id).session(bound).lean<LeanDoc<PaymentDoc>>();
        return doc ? toPayment(doc) : null;
      },

      async findByReference(reference) {
        const doc = await PaymentModel.findOne({ reference }).session(bound).lean<LeanDoc<PaymentDoc>>();
        return doc ? toPayment(doc) : null;
      },

      async listForInvestment(investmentId) {
        const rows = await PaymentModel.find({ investmentId: objectId(investmentId) })
          .sort({ createdAt: -1 })
          .session(bound)
          .lean<LeanDoc<PaymentDoc>[]>();
        return rows.map(toPayment);
      },

      async listForUser(userId) {
        const rows = await PaymentModel.find({ userId: objectId(userId) })
          .sort({ createdAt: -1 })
          .session(bound)
          .lean<LeanDoc<PaymentDoc>[]>();
        return rows.map(toPayment);
      },

      async create(input) {
        const [created] = await PaymentModel.create(
          [
            {
              ...input,
              userId: objectId(input.userId),
              investmentId: input.investmentId ? objectId(input.investmentId) : undefined,
              amount: toDecimal(input.amount),
            },
          ],
          { session },
        );
        return toPayment(created.toObject<LeanDoc<PaymentDoc>>());
      },

      async update(id, patch: PaymentPatch) {
        const doc = await PaymentModel.findByIdAndUpdate(
          id,
          { $set: definedOnly(patch) },
          { new: true, session },
        ).lean<LeanDoc<PaymentDoc>>();
        if (!doc) throw new NotFoundError("Payment not found");
        return toPayment(doc);
      },
    },

    ledger: {
      async append(input) {
        try {
          const [created] = await LedgerEntryModel.create(
            [
              {
                ...input,
                userId: objectId(input.userId),
                investmentId: input.investmentId ? objectId(input.investmentId) : undefined,
                withdrawalRequestId: input.withdrawalRequestId ? objectId(input.withdrawalRequestId) : undefined,
                amount: toDecimal(input.amount),
              },
            ],
            { session },
          );
          return toLedgerEntry(created.toObject<LeanDoc<LedgerEntryDoc>>());
        } catch (error) {
          if (isDuplicateKeyError(error)) {
            throw new ConflictError("Ledger entry already recorded", { idempotencyKey: input.idempotencyKey });
          }
          throw error;
        }
      },

      async findByIdempotencyKey(key) {
        const doc = await LedgerEntryModel.findOne({ idempotencyKey: key })
          .session(bound)
          .lean<LeanDoc<LedgerEntryDoc>>();
        return doc ? toLedgerEntry(doc) : null;
      },

      async list(filter, page) {
        const query: FilterQuery<LedgerEntryDoc> = {};
        if (filter.userId) query.userId = objectId(filter.userId);
        if (filter.transactionType) query.transactionType = filter.transactionType;
        if (filter.investmentId) query.investmentId = objectId(filter.investmentId);
        const [rows, total] = await Promise.all([
          LedgerEntryModel.find(query)
            .sort({ createdAt: -1 })
            .skip(page.skip)
            .limit(page.limit)
            .session(bound)
            .lean<LeanDoc<LedgerEntryDoc>[]>(),
          LedgerEntryModel.countDocuments(query).session(bound),
        ]);
        return { rows: rows.map(toLedgerEntry), total };
      },
    },

    withdrawals: {
      async findById(id) {
        if (!isId(id)) return null;
        const doc = await WithdrawalRequestModel.findById(id)
          .session(bound)
          .lean<LeanDoc<WithdrawalRequestDoc>>();
        return doc ? toWithdrawal(doc) : null;
      },

      async list(filter) {
        const query: FilterQuery<WithdrawalRequestDoc> = {};
        if (filter.userId) query.userId = objectId(filter.userId);
        if (filter.status) query.status = filter.status;
        const rows = await WithdrawalRequestModel.find(query)
          .sort({ createdAt: -1 })
          .session(bound)
          .lean<LeanDoc<WithdrawalRequestDoc>[]>();
        return rows.map(toWithdrawal);
      },

      async create(input) {
        const [created] = await WithdrawalRequestModel.create(
          [
            {
              ...input,
              userId: objectId(input.userId),
              amount: toDecimal(input.amount),
              investmentIds: input.investmentIds.map(objectId),
            },
          ],
          { session },
        );
        return toWithdrawal(created.toObject<LeanDoc<WithdrawalRequestDoc>>());
      },

      async update(id, patch: WithdrawalPatch) {
        const doc = await WithdrawalRequestModel.findByIdAndUpdate(
          id,
          { $set: definedOnly(patch) },
          { new: true, session },
        ).lean<LeanDoc<WithdrawalRequestDoc>>();
        if (!doc) throw new NotFoundError("Withdrawal request not found");
        return toWithdrawal(doc);
      },
    },

    events: {
      async append(input) {
        await EventLogModel.create([{ ...input, timestamp: new Date() }], { session });
      },
    },

    idempotency: {
      async find(key, userId, route) {
        const doc = await IdempotencyKeyModel.findOne({ key, userId, route }).session(bound).lean();
        if (!doc) return null;
        return {
          key: doc.key,
          userId: doc.userId,
          route: doc.route,
          requestHash: doc.requestHash,
          responseBody: doc.responseBody,
        };
      },

      async save(record) {
        try {
          await IdempotencyKeyModel.create([{ ...record, createdAt: new Date() }], { session });
          return true;
        } catch (error) {
          if (isDuplicateKeyError(error)) return false;
          throw error;
        }
      },
    },
  };
}

export function createMongoStore(): Store {
  return {
    ...createMongoSession(),
    transaction<T>(fn: (tx: StoreSession) => Promise<T>) {
      return runInTransaction((session) => fn(createMongoSession(session)));
    },
  };
}
