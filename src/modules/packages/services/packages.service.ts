import type { EngineContext } from "../../../context.js";
import type { PackageRecord } from "../../../db/store.js";
import type { AuthUser } from "../../../types.js";
import { appendEvent } from "../../../utils/audit.js";
import type { PackageStatus } from "../../../utils/constants.js";
import { compareAmounts } from "../../../utils/decimal.js";
import { NotFoundError, ValidationError } from "../../../utils/errors.js";
import type { CreatePackagePayload, ListPackagesQuery } from "../schemas/packages.schemas.js";

export async function listPackages(ctx: EngineContext, actor: AuthUser, query: ListPackagesQuery) {
  // investors only browse what is open for investment
  const status = actor.role === "admin" ? query.status : "active";
  return ctx.store.packages.list({
    status,
    kind: query.kind,
    category: query.category,
    availableOnly: query.availableOnly,
  });
}

export async function listCategories(ctx: EngineContext): Promise<string[]> {
  const rows = await ctx.store.packages.list({ status: "active" });
  const categories = new Set<string>();
  for (const row of rows) {
    if (row.category) categories.add(row.category);
  }
  return [...categories].sort();
}

export async function getPackage(ctx: EngineContext, actor: AuthUser, id: string): Promise<PackageRecord> {
  const pkg = await ctx.store.packages.findById(id);
  if (!pkg || (actor.role !== "admin" && pkg.status !== "active")) {
    throw new NotFoundError("Package not found");
  }
  return pkg;
}

export async function createPackage(ctx: EngineContext, actor: AuthUser, payload: CreatePackagePayload) {
  if (payload.kind === "storage" && !payload.unitPrice) {
    throw new ValidationError("Storage plans require a unitPrice");
  }
  if (payload.maxAmount && compareAmounts(payload.minAmount, payload.maxAmount) > 0) {
    throw new ValidationError("minAmount cannot exceed maxAmount");
  }

  return ctx.store.transaction(async (tx) => {
    const pkg = await tx.packages.create({
      ...payload,
      availableSlots: payload.totalSlots,
      status: "active",
    });

    await appendEvent(tx, actor, {
      entityType: "package",
      entityId: pkg.id,
      action: "PackageCreated",
      notes: `${pkg.kind}:${pkg.totalSlots} slots`,
    });
    return pkg;
  });
}

export async function setPackageStatus(ctx: EngineContext, actor: AuthUser, id: string, status: PackageStatus) {
  return ctx.store.transaction(async (tx) => {
    const pkg = await tx.packages.setStatus(id, status);
    if (!pkg) throw new NotFoundError("Package not found");

    await appendEvent(tx, actor, {
      entityType: "package",
      entityId: pkg.id,
      action: "PackageStatusChanged",
      notes: status,
    });
    return pkg;
  });
}
