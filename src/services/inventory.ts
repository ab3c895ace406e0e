import type { ReservationPolicy } from "../config/env.js";
import type { InvestmentRecord, PackageRecord, StoreSession } from "../db/store.js";
import type { ReservationState } from "../utils/constants.js";
import { OutOfStockError } from "../utils/errors.js";

export interface ReservationToken {
  packageId: string;
  quantity: number;
  state: ReservationState;
}

type Held = Pick<InvestmentRecord, "packageId" | "quantity" | "reservation">;

/**
 * Every slot change goes through one conditional update on the package,
 * executed with the caller's session. Nothing reads the counter and then writes it.
 */
export interface InventoryAllocator {
  reserve(tx: StoreSession, pkg: PackageRecord, quantity: number): Promise<ReservationToken>;
  commit(tx: StoreSession, investment: Held): Promise<ReservationState>;
  release(tx: StoreSession, investment: Held): Promise<ReservationState>;
}

export function createInventoryAllocator(policy: ReservationPolicy): InventoryAllocator {
  return {
    async reserve(tx, pkg, quantity) {
      if (policy === "on_create") {
        const updated = await tx.packages.takeSlots(pkg.id, quantity);
        if (!updated) throw new OutOfStockError(pkg.id);
        return { packageId: pkg.id, quantity, state: "held" };
      }
      // on_payment: availability check only, slots are taken at commit
      if (pkg.availableSlots < quantity) throw new OutOfStockError(pkg.id);
      return { packageId: pkg.id, quantity, state: "none" };
    },

    async commit(tx, investment) {
      if (investment.reservation === "held" || investment.reservation === "committed") return "committed";
      const updated = await tx.packages.takeSlots(investment.packageId, investment.quantity);
      if (!updated) throw new OutOfStockError(investment.packageId);
      return "committed";
    },

    async release(tx, investment) {
      if (investment.reservation !== "held") return investment.reservation;
      // returnSlots refuses to push availableSlots past totalSlots
      await tx.packages.returnSlots(investment.packageId, investment.quantity);
      return "released";
    },
  };
}
