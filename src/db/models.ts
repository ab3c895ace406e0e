export { UserModel } from "./models/user.model.js";
export { InvestmentPackageModel } from "./models/investment-package.model.js";
export { InvestmentModel } from "./models/investment.model.js";
export { PaymentModel } from "./models/payment.model.js";
export { LedgerEntryModel } from "./models/ledger-entry.model.js";
export { WithdrawalRequestModel } from "./models/withdrawal-request.model.js";
export { EventLogModel } from "./models/event-log.model.js";
export { IdempotencyKeyModel } from "./models/idempotency-key.model.js";
