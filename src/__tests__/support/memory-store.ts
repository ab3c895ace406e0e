import type {
  EventRecordInput,
  IdempotencyRecord,
  InvestmentRecord,
  LedgerEntryRecord,
  NewInvestment,
  NewPackage,
  PackageRecord,
  PaymentRecord,
  Store,
  StoreSession,
  UserRecord,
  WithdrawalRecord,
} from "../../db/store.js";
import { ConflictError, NotFoundError } from "../../utils/errors.js";

interface Tables {
  users: Map<string, UserRecord>;
  packages: Map<string, PackageRecord>;
  investments: Map<string, InvestmentRecord>;
  payments: Map<string, PaymentRecord>;
  ledger: Map<string, LedgerEntryRecord>;
  withdrawals: Map<string, WithdrawalRecord>;
  events: (EventRecordInput & { timestamp: Date })[];
  idempotency: Map<string, IdempotencyRecord>;
}

function emptyTables(): Tables {
  return {
    users: new Map(),
    packages: new Map(),
    investments: new Map(),
    payments: new Map(),
    ledger: new Map(),
    withdrawals: new Map(),
    events: [],
    idempotency: new Map(),
  };
}

function definedOnly(patch: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
}

const byNewest = <T extends { createdAt: Date }>(a: T, b: T) => b.createdAt.getTime() - a.createdAt.getTime();

export interface MemoryStore extends Store {
  /** Live view of the tables, for assertions. */
  readonly tables: Tables;
  seedUser(input?: Partial<UserRecord>): UserRecord;
  seedPackage(input?: Partial<NewPackage>): PackageRecord;
  seedInvestment(input: Partial<NewInvestment> & Pick<NewInvestment, "userId" | "packageId">): InvestmentRecord;
}

/**
 * In-process stand-in for the MongoDB store. Transactions run one at a time
 * and restore a snapshot of every table when the callback throws.
 */
export function createMemoryStore(now: () => Date = () => new Date()): MemoryStore {
  let state = emptyTables();
  let sequence = 0;
  let queue: Promise<unknown> = Promise.resolve();

  const nextId = () => {
    sequence += 1;
    return sequence.toString(16).padStart(24, "0");
  };
  const copy = <T>(value: T): T => structuredClone(value);

  const session: StoreSession = {
    users: {
      async findById(id) {
        const user = state.users.get(id);
        return user ? copy(user) : null;
      },
    },

    packages: {
      async findById(id) {
        const pkg = state.packages.get(id);
        return pkg ? copy(pkg) : null;
      },
      async list(filter) {
        return [...state.packages.values()]
          .filter((pkg) => !filter.status || pkg.status === filter.status)
          .filter((pkg) => !filter.kind || pkg.kind === filter.kind)
          .filter((pkg) => !filter.category || pkg.category === filter.category)
          .filter((pkg) => !filter.availableOnly || pkg.availableSlots > 0)
          .sort(byNewest)
          .map(copy);
      },
      async create(input) {
        const at = now();
        const pkg: PackageRecord = { ...copy(input), id: nextId(), createdAt: at, updatedAt: at };
        state.packages.set(pkg.id, pkg);
        return copy(pkg);
      },
      async setStatus(id, status) {
        const pkg = state.packages.get(id);
        if (!pkg) return null;
        pkg.status = status;
        pkg.updatedAt = now();
        return copy(pkg);
      },
      async takeSlots(id, quantity) {
        const pkg = state.packages.get(id);
        if (!pkg || pkg.availableSlots < quantity) return null;
        pkg.availableSlots -= quantity;
        pkg.updatedAt = now();
        return copy(pkg);
      },
      async returnSlots(id, quantity) {
        const pkg = state.packages.get(id);
        if (!pkg || pkg.availableSlots + quantity > pkg.totalSlots) return null;
        pkg.availableSlots += quantity;
        pkg.updatedAt = now();
        return copy(pkg);
      },
    },

    investments: {
      async findById(id) {
        const investment = state.investments.get(id);
        return investment ? copy(investment) : null;
      },
      async list(filter) {
        return [...state.investments.values()]
          .filter((row) => !filter.userId || row.userId === filter.userId)
          .filter((row) => !filter.status || row.status === filter.status)
          .filter((row) => !filter.packageId || row.packageId === filter.packageId)
          .sort(byNewest)
          .map(copy);
      },
      async findWithdrawable(userId, ids) {
        return [...state.investments.values()]
          .filter((row) => row.userId === userId && row.status === "completed" && !row.withdrawalRequestId)
          .filter((row) => !ids || ids.includes(row.id))
          .map(copy);
      },
      async findMatured(at, limit) {
        return [...state.investments.values()]
          .filter((row) => row.status === "active" && row.endDate !== undefined && row.endDate <= at)
          .slice(0, limit)
          .map(copy);
      },
      async create(input) {
        const at = now();
        const investment: InvestmentRecord = { ...copy(input), id: nextId(), createdAt: at, updatedAt: at };
        state.investments.set(investment.id, investment);
        return copy(investment);
      },
      async update(id, patch) {
        const investment = state.investments.get(id);
        if (!investment) throw new NotFoundError("Investment not found");
        Object.assign(investment, definedOnly(patch), { updatedAt: now() });
        return copy(investment);
      },
      async linkToWithdrawal(ids, withdrawalId) {
        let claimed = 0;
        for (const id of ids) {
          const investment = state.investments.get(id);
          if (investment && !investment.withdrawalRequestId) {
            investment.withdrawalRequestId = withdrawalId;
            claimed += 1;
          }
        }
        return claimed;
      },
      async deleteCancelled(userId) {
        let deleted = 0;
        for (const [id, row] of state.investments) {
          if (row.status === "cancelled" && (!userId || row.userId === userId)) {
            state.investments.delete(id);
            deleted += 1;
          }
        }
        return deleted;
      },
    },

    payments: {
      async findById(id) {
        const payment = state.payments.get(id);
        return payment ? copy(payment) : null;
      },
      async findByReference(reference) {
        const payment = [...state.payments.values()].find((row) => row.reference === reference);
        return payment ? copy(payment) : null;
      },
      async listForInvestment(investmentId) {
        return [...state.payments.values()]
          .filter((row) => row.investmentId === investmentId)
          .reverse()
          .map(copy);
      },
      async listForUser(userId) {
        return [...state.payments.values()]
          .filter((row) => row.userId === userId)
          .reverse()
          .map(copy);
      },
      async create(input) {
        if ([...state.payments.values()].some((row) => row.reference === input.reference)) {
          throw new ConflictError("Duplicate payment reference");
        }
        const at = now();
        const payment: PaymentRecord = { ...copy(input), id: nextId(), createdAt: at, updatedAt: at };
        state.payments.set(payment.id, payment);
        return copy(payment);
      },
      async update(id, patch) {
        const payment = state.payments.get(id);
        if (!payment) throw new NotFoundError("Payment not found");
        Object.assign(payment, definedOnly(patch), { updatedAt: now() });
        return copy(payment);
      },
    },

    ledger: {
      async append(input) {
        if ([...state.ledger.values()].some((row) => row.idempotencyKey === input.idempotencyKey)) {
          throw new ConflictError("Ledger entry already recorded", { idempotencyKey: input.idempotencyKey });
        }
        const entry: LedgerEntryRecord = { ...copy(input), id: nextId(), createdAt: now() };
        state.ledger.set(entry.id, entry);
        return copy(entry);
      },
      async findByIdempotencyKey(key) {
        const entry = [...state.ledger.values()].find((row) => row.idempotencyKey === key);
        return entry ? copy(entry) : null;
      },
      async list(filter, page) {
        const rows = [...state.ledger.values()]
          .filter((row) => !filter.userId || row.userId === filter.userId)
          .filter((row) => !filter.transactionType || row.transactionType === filter.transactionType)
          .filter((row) => !filter.investmentId || row.investmentId === filter.investmentId)
          .reverse();
        return { rows: rows.slice(page.skip, page.skip + page.limit).map(copy), total: rows.length };
      },
    },

    withdrawals: {
      async findById(id) {
        const withdrawal = state.withdrawals.get(id);
        return withdrawal ? copy(withdrawal) : null;
      },
      async list(filter) {
        return [...state.withdrawals.values()]
          .filter((row) => !filter.userId || row.userId === filter.userId)
          .filter((row) => !filter.status || row.status === filter.status)
          .reverse()
          .map(copy);
      },
      async create(input) {
        const at = now();
        const withdrawal: WithdrawalRecord = { ...copy(input), id: nextId(), createdAt: at, updatedAt: at };
        state.withdrawals.set(withdrawal.id, withdrawal);
        return copy(withdrawal);
      },
      async update(id, patch) {
        const withdrawal = state.withdrawals.get(id);
        if (!withdrawal) throw new NotFoundError("Withdrawal request not found");
        Object.assign(withdrawal, definedOnly(patch), { updatedAt: now() });
        return copy(withdrawal);
      },
    },

    events: {
      async append(input) {
        state.events.push({ ...copy(input), timestamp: now() });
      },
    },

    idempotency: {
      async find(key, userId, route) {
        const record = state.idempotency.get(`${key}|${userId}|${route}`);
        return record ? copy(record) : null;
      },
      async save(record) {
        const key = `${record.key}|${record.userId}|${record.route}`;
        if (state.idempotency.has(key)) return false;
        state.idempotency.set(key, copy(record));
        return true;
      },
    },
  };

  return {
    ...session,

    get tables() {
      return state;
    },

    transaction<T>(fn: (tx: StoreSession) => Promise<T>): Promise<T> {
      const run = queue.then(async () => {
        const snapshot = structuredClone(state);
        try {
          return await fn(session);
        } catch (error) {
          state = snapshot;
          throw error;
        }
      });
      // the next unit waits for this one whatever its outcome; callers still see the rejection
      queue = run.then(
        () => undefined,
        () => undefined,
      );
      return run;
    },

    seedUser(input = {}) {
      const user: UserRecord = {
        id: nextId(),
        email: `investor${sequence}@example.test`,
        role: "investor",
        status: "active",
        kycComplete: true,
        ...input,
      };
      state.users.set(user.id, user);
      return copy(user);
    },

    seedPackage(input = {}) {
      const at = now();
      const totalSlots = input.totalSlots ?? 10;
      const pkg: PackageRecord = {
        name: "Maize Farm Cycle",
        kind: "direct",
        minAmount: "50.00",
        totalSlots,
        availableSlots: totalSlots,
        status: "active",
        returnRate: "30",
        durationDays: 90,
        ...input,
        id: nextId(),
        createdAt: at,
        updatedAt: at,
      };
      state.packages.set(pkg.id, pkg);
      return copy(pkg);
    },

    seedInvestment(input) {
      const at = now();
      const investment: InvestmentRecord = {
        packageName: "Maize Farm Cycle",
        kind: "direct",
        quantity: 1,
        amount: "100.00",
        status: "pending",
        reservation: "none",
        ...input,
        id: nextId(),
        createdAt: at,
        updatedAt: at,
      };
      state.investments.set(investment.id, investment);
      return copy(investment);
    },
  };
}
