import { describe, it, expect } from "vitest";
import {
  createPackage,
  getPackage,
  listCategories,
  listPackages,
  setPackageStatus,
} from "../services/packages.service.js";
import { createPackageSchema, listPackagesQuerySchema } from "../schemas/packages.schemas.js";
import { NotFoundError, ValidationError } from "../../../utils/errors.js";
import { ADMIN, asInvestor, createTestContext } from "../../../__tests__/support/context.js";

describe("createPackage()", () => {
  it("opens every slot and records the event", async () => {
    const t = createTestContext();
    const payload = createPackageSchema.parse({
      name: "Rice Storage",
      kind: "storage",
      unitPrice: 40,
      totalSlots: 25,
      returnRate: "18.5",
      durationDays: 180,
    });

    const pkg = await createPackage(t.ctx, ADMIN, payload);

    expect(pkg).toMatchObject({
      unitPrice: "40.00",
      minAmount: "0.00",
      totalSlots: 25,
      availableSlots: 25,
      status: "active",
      returnRate: "18.5",
    });
    expect(t.store.tables.events).toMatchObject([
      { entityType: "package", entityId: pkg.id, action: "PackageCreated", notes: "storage:25 slots" },
    ]);
  });

  it("requires a unit price for storage plans", async () => {
    const t = createTestContext();
    const payload = createPackageSchema.parse({
      name: "Bean Storage",
      kind: "storage",
      totalSlots: 5,
      returnRate: 10,
      durationDays: 30,
    });

    await expect(createPackage(t.ctx, ADMIN, payload)).rejects.toThrow("Storage plans require a unitPrice");
  });

  it("rejects a minimum above the maximum", async () => {
    const t = createTestContext();
    const payload = createPackageSchema.parse({
      name: "Cassava",
      minAmount: "600",
      maxAmount: "500",
      totalSlots: 5,
      returnRate: 10,
      durationDays: 30,
    });

    await expect(createPackage(t.ctx, ADMIN, payload)).rejects.toBeInstanceOf(ValidationError);
    expect(t.store.tables.packages.size).toBe(0);
  });
});

describe("browsing", () => {
  it("shows investors only active packages", async () => {
    const t = createTestContext();
    const open = t.store.seedPackage({ name: "Open", category: "grains" });
    const closed = t.store.seedPackage({ name: "Closed", status: "inactive", category: "tubers" });
    const investor = asInvestor("0000000000000000000000aa");

    const visible = await listPackages(t.ctx, investor, { status: "inactive", availableOnly: true });
    expect(visible.map((pkg) => pkg.id)).toEqual([open.id]);

    const all = await listPackages(t.ctx, ADMIN, { availableOnly: true });
    expect(all).toHaveLength(2);

    await expect(getPackage(t.ctx, investor, closed.id)).rejects.toBeInstanceOf(NotFoundError);
    expect((await getPackage(t.ctx, ADMIN, closed.id)).name).toBe("Closed");
  });

  it("hides sold-out packages unless asked for them", async () => {
    const t = createTestContext();
    const open = t.store.seedPackage({ name: "Open" });
    const soldOut = t.store.seedPackage({ name: "Sold Out", totalSlots: 3, availableSlots: 0 });
    const investor = asInvestor("0000000000000000000000aa");

    const byDefault = await listPackages(t.ctx, investor, listPackagesQuerySchema.parse({}));
    expect(byDefault.map((pkg) => pkg.id)).toEqual([open.id]);

    const everything = await listPackages(t.ctx, investor, listPackagesQuerySchema.parse({ availableOnly: "false" }));
    expect(everything.map((pkg) => pkg.id).sort()).toEqual([open.id, soldOut.id].sort());
  });

  it("lists distinct categories of active packages in order", async () => {
    const t = createTestContext();
    t.store.seedPackage({ category: "tubers" });
    t.store.seedPackage({ category: "grains" });
    t.store.seedPackage({ category: "grains" });
    t.store.seedPackage({ category: "livestock", status: "inactive" });
    t.store.seedPackage();

    expect(await listCategories(t.ctx)).toEqual(["grains", "tubers"]);
  });

  it("closes a package to new investments", async () => {
    const t = createTestContext();
    const pkg = t.store.seedPackage();

    const closed = await setPackageStatus(t.ctx, ADMIN, pkg.id, "inactive");

    expect(closed.status).toBe("inactive");
    await expect(setPackageStatus(t.ctx, ADMIN, "0000000000000000000000ff", "active")).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
