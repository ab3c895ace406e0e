import type { Amount } from "../utils/decimal.js";
import type {
  EntityType,
  InvestmentStatus,
  PackageKind,
  PackageStatus,
  PaymentChannel,
  PaymentStatus,
  ReconciliationFlag,
  ReservationState,
  Role,
  TransactionStatus,
  TransactionType,
  UserStatus,
  WithdrawalStatus,
  WithdrawalType,
} from "../utils/constants.js";

export interface UserRecord {
  id: string;
  email: string;
  fullName?: string;
  role: Role;
  status: UserStatus;
  kycComplete: boolean;
  tokenInvalidatedAt?: Date;
}

export interface PackageRecord {
  id: string;
  name: string;
  description?: string;
  kind: PackageKind;
  category?: string;
  unitPrice?: Amount;
  minAmount: Amount;
  maxAmount?: Amount;
  totalSlots: number;
  availableSlots: number;
  status: PackageStatus;
  returnRate: string;
  durationDays: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewPackage = Omit<PackageRecord, "id" | "createdAt" | "updatedAt">;

export interface InvestmentRecord {
  id: string;
  userId: string;
  packageId: string;
  packageName: string;
  kind: PackageKind;
  quantity: number;
  amount: Amount;
  status: InvestmentStatus;
  reservation: ReservationState;
  startDate?: Date;
  endDate?: Date;
  completedDate?: Date;
  cancelledAt?: Date;
  expectedReturn?: Amount;
  actualReturn?: Amount;
  withdrawalRequestId?: string;
  reconciliationFlag?: ReconciliationFlag;
  createdAt: Date;
  updatedAt: Date;
}

export type NewInvestment = Omit<InvestmentRecord, "id" | "createdAt" | "updatedAt">;
export type InvestmentPatch = Partial<
  Pick<
    InvestmentRecord,
    | "status"
    | "reservation"
    | "startDate"
    | "endDate"
    | "completedDate"
    | "cancelledAt"
    | "expectedReturn"
    | "actualReturn"
    | "reconciliationFlag"
  >
>;

export interface PaymentRecord {
  id: string;
  userId: string;
  investmentId?: string;
  amount: Amount;
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
  createdAt: Date;
  updatedAt: Date;
}

export type NewPayment = Omit<PaymentRecord, "id" | "createdAt" | "updatedAt">;
export type PaymentPatch = Partial<
  Pick<PaymentRecord, "status" | "gatewayId" | "paidAt" | "reconciliationFlag" | "metadata">
>;

export interface LedgerEntryRecord {
  id: string;
  userId: string;
  investmentId?: string;
  withdrawalRequestId?: string;
  transactionType: TransactionType;
  amount: Amount;
  status: TransactionStatus;
  description: string;
  paymentReference?: string;
  idempotencyKey: string;
  createdAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntryRecord, "id" | "createdAt">;

export interface WithdrawalRecord {
  id: string;
  userId: string;
  amount: Amount;
  type: WithdrawalType;
  status: WithdrawalStatus;
  processedDate?: Date;
  adminNotes: string;
  paymentReference?: string;
  investmentIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type NewWithdrawal = Omit<WithdrawalRecord, "id" | "createdAt" | "updatedAt">;
export type WithdrawalPatch = Partial<
  Pick<WithdrawalRecord, "status" | "processedDate" | "adminNotes" | "paymentReference">
>;

export interface EventRecordInput {
  entityType: EntityType;
  entityId: string;
  action: string;
  actorUserId: string;
  roleAtTime: Role;
  notes?: string;
  diff?: unknown;
}

export interface IdempotencyRecord {
  key: string;
  userId: string;
  route: string;
  requestHash: string;
  responseBody: unknown;
}

export interface Page {
  skip: number;
  limit: number;
}

export interface PageOf<T> {
  rows: T[];
  total: number;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
}

export interface PackageRepository {
  findById(id: string): Promise<PackageRecord | null>;
  list(filter: { status?: PackageStatus; kind?: PackageKind; category?: string; availableOnly?: boolean }): Promise<PackageRecord[]>;
  create(input: NewPackage): Promise<PackageRecord>;
  setStatus(id: string, status: PackageStatus): Promise<PackageRecord | null>;
  /** Decrements availableSlots only when at least `quantity` remain; null otherwise. */
  takeSlots(id: string, quantity: number): Promise<PackageRecord | null>;
  /** Increments availableSlots only while the result stays within totalSlots; null otherwise. */
  returnSlots(id: string, quantity: number): Promise<PackageRecord | null>;
}

export interface InvestmentRepository {
  findById(id: string): Promise<InvestmentRecord | null>;
  list(filter: { userId?: string; status?: InvestmentStatus; packageId?: string }): Promise<InvestmentRecord[]>;
  /** Completed, not yet linked to a withdrawal, owned by the user. */
  findWithdrawable(userId: string, ids?: string[]): Promise<InvestmentRecord[]>;
  findMatured(now: Date, limit: number): Promise<InvestmentRecord[]>;
  create(input: NewInvestment): Promise<InvestmentRecord>;
  update(id: string, patch: InvestmentPatch): Promise<InvestmentRecord>;
  /** Sets withdrawalRequestId on every listed investment that has none; returns how many were claimed. */
  linkToWithdrawal(ids: string[], withdrawalId: string): Promise<number>;
  deleteCancelled(userId?: string): Promise<number>;
}

export interface PaymentRepository {
  findById(id: string): Promise<PaymentRecord | null>;
  findByReference(reference: string): Promise<PaymentRecord | null>;
  listForInvestment(investmentId: string): Promise<PaymentRecord[]>;
  listForUser(userId: string): Promise<PaymentRecord[]>;
  create(input: NewPayment): Promise<PaymentRecord>;
  update(id: string, patch: PaymentPatch): Promise<PaymentRecord>;
}

export interface LedgerRepository {
  append(input: NewLedgerEntry): Promise<LedgerEntryRecord>;
  findByIdempotencyKey(key: string): Promise<LedgerEntryRecord | null>;
  list(filter: { userId?: string; transactionType?: TransactionType; investmentId?: string }, page: Page): Promise<PageOf<LedgerEntryRecord>>;
}

export interface WithdrawalRepository {
  findById(id: string): Promise<WithdrawalRecord | null>;
  list(filter: { userId?: string; status?: WithdrawalStatus }): Promise<WithdrawalRecord[]>;
  create(input: NewWithdrawal): Promise<WithdrawalRecord>;
  update(id: string, patch: WithdrawalPatch): Promise<WithdrawalRecord>;
}

export interface EventRepository {
  append(input: EventRecordInput): Promise<void>;
}

export interface IdempotencyRepository {
  find(key: string, userId: string, route: string): Promise<IdempotencyRecord | null>;
  /** Returns false when the key was stored concurrently by another request. */
  save(record: IdempotencyRecord): Promise<boolean>;
}

/** Repositories bound to one storage session (inside or outside a transaction). */
export interface StoreSession {
  users: UserRepository;
  packages: PackageRepository;
  investments: InvestmentRepository;
  payments: PaymentRepository;
  ledger: LedgerRepository;
  withdrawals: WithdrawalRepository;
  events: EventRepository;
  idempotency: IdempotencyRepository;
}

export interface Store extends StoreSession {
  /**
   * Runs `fn` as one atomic unit: every write commits together or none does.
   * Write conflicts surface as ContentionError.
   */
  transaction<T>(fn: (tx: StoreSession) => Promise<T>): Promise<T>;
}
