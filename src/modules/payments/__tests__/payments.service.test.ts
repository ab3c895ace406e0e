import { describe, it, expect } from "vitest";
import {
  getPaymentStatus,
  initializePayment,
  paymentReference,
  verifyPayment,
} from "../services/payments.service.js";
import { createInvestment } from "../../investments/services/investments.service.js";
import { GatewayUnavailableError, InvalidTransitionError, NotFoundError, OutOfStockError } from "../../../utils/errors.js";
import { START, asInvestor, createTestContext } from "../../../__tests__/support/context.js";

describe("initializePayment()", () => {
  it("opens a checkout session and stores a pending payment", async () => {
    const t = createTestContext();
    const user = t.store.seedUser({ email: "ada@example.test" });
    const pkg = t.store.seedPackage();
    const investment = await createInvestment(t.ctx, asInvestor(user.id), { packageId: pkg.id, amount: "150.00" });

    const session = await initializePayment(t.ctx, asInvestor(user.id), investment.id);

    const reference = paymentReference(investment.id, START);
    expect(session.reference).toBe(reference);
    expect(session.authorizationUrl).toBe(`https://checkout.test/${reference}`);
    expect(session.payment).toMatchObject({ status: "pending", amount: "150.00", channel: "paystack" });
    expect(t.fake.gateway.initialize).toHaveBeenCalledWith(
      expect.objectContaining({ email: "ada@example.test", amount: "150.00", currency: "NGN", reference }),
    );
  });

  it("writes nothing when online payments are disabled", async () => {
    const t = createTestContext({ paystackEnabled: false });
    const user = t.store.seedUser();
    const pkg = t.store.seedPackage();
    const investment = t.store.seedInvestment({ userId: user.id, packageId: pkg.id });

    await expect(initializePayment(t.ctx, asInvestor(user.id), investment.id)).rejects.toBeInstanceOf(
      GatewayUnavailableError,
    );
    expect(t.fake.gateway.initialize).not.toHaveBeenCalled();
    expect(t.store.tables.payments.size).toBe(0);
  });

  it("only takes payment for pending investments", async () => {
    const t = createTestContext();
    const user = t.store.seedUser();
    const pkg = t.store.seedPackage();
    const investment = t.store.seedInvestment({ userId: user.id, packageId: pkg.id, status: "cancelled" });

    await expect(initializePayment(t.ctx, asInvestor(user.id), investment.id)).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
  });
});

describe("verifyPayment()", () => {
  async function setup(totalSlots = 2) {
    const t = createTestContext();
    const user = t.store.seedUser();
    const pkg = t.store.seedPackage({ totalSlots });
    const investment = await createInvestment(t.ctx, asInvestor(user.id), { packageId: pkg.id, amount: "100.00" });
    const { reference } = await initializePayment(t.ctx, asInvestor(user.id), investment.id);
    return { t, user, pkg, investment, reference };
  }

  it("reports pending while the gateway has no outcome", async () => {
    const { t, user, reference } = await setup();

    const result = await verifyPayment(t.ctx, asInvestor(user.id), reference);

    expect(result.status).toBe("pending");
    expect(t.store.tables.ledger.size).toBe(0);
  });

  it("activates on a successful verification and stops asking the gateway afterwards", async () => {
    const { t, user, investment, reference } = await setup();
    t.fake.script(reference, { status: "success", amountMinor: 10000, gatewayId: "55" });

    const result = await verifyPayment(t.ctx, asInvestor(user.id), reference);
    expect(result.status).toBe("success");
    expect(t.store.tables.investments.get(investment.id)?.status).toBe("active");

    const again = await verifyPayment(t.ctx, asInvestor(user.id), reference);
    expect(again.status).toBe("success");
    expect(t.fake.gateway.verify).toHaveBeenCalledTimes(1);
  });

  it("returns the gateway message when the charge failed", async () => {
    const { t, user, reference } = await setup();
    t.fake.script(reference, { status: "failed", gatewayResponse: "Insufficient funds" });

    const result = await verifyPayment(t.ctx, asInvestor(user.id), reference);

    expect(result.status).toBe("failed");
    expect(result.message).toBe("Insufficient funds");
  });

  it("answers out of stock when the slot is gone", async () => {
    const { t, user, pkg, reference } = await setup(1);
    await t.store.packages.takeSlots(pkg.id, 1);
    t.fake.script(reference, { status: "success", amountMinor: 10000 });

    await expect(verifyPayment(t.ctx, asInvestor(user.id), reference)).rejects.toBeInstanceOf(OutOfStockError);
    const payment = await t.store.payments.findByReference(reference);
    expect(payment?.reconciliationFlag).toBe("out_of_stock");
  });

  it("hides other users' payments", async () => {
    const { t, reference } = await setup();
    const stranger = t.store.seedUser();

    await expect(verifyPayment(t.ctx, asInvestor(stranger.id), reference)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("getPaymentStatus()", () => {
  it("summarises the latest payment of an investment", async () => {
    const t = createTestContext();
    const user = t.store.seedUser();
    const pkg = t.store.seedPackage();
    const investment = await createInvestment(t.ctx, asInvestor(user.id), { packageId: pkg.id, amount: "100.00" });

    expect(await getPaymentStatus(t.ctx, asInvestor(user.id), investment.id)).toMatchObject({
      investmentStatus: "pending",
      paymentExists: false,
      canWithdraw: false,
    });

    await initializePayment(t.ctx, asInvestor(user.id), investment.id);
    expect(await getPaymentStatus(t.ctx, asInvestor(user.id), investment.id)).toMatchObject({
      paymentExists: true,
      paymentStatus: "pending",
      paymentAmount: "100.00",
    });
  });
});
