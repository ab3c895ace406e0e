import { HttpError } from "./errors.js";
import type { AuthUser } from "../types.js";
import type { Role } from "./constants.js";

export type ResourceKind = "package" | "investment" | "payment" | "ledger" | "withdrawal";

export type Action = "create" | "read" | "update" | "approve" | "execute";

const rolePolicies: Record<Role, Record<ResourceKind, Action[]>> = {
  admin: {
    package: ["create", "read", "update"],
    investment: ["create", "read", "update", "approve", "execute"],
    payment: ["create", "read", "approve"],
    ledger: ["read"],
    withdrawal: ["read", "update", "approve"],
  },
  investor: {
    package: ["read"],
    investment: ["create", "read", "update"],
    payment: ["create", "read"],
    ledger: ["read"],
    withdrawal: ["create", "read"],
  },
};

export function authorize(user: AuthUser, action: Action, resource: ResourceKind) {
  const allowed = rolePolicies[user.role][resource];
  if (!allowed.includes(action)) {
    throw new HttpError(403, `Role ${user.role} is not allowed to ${action} ${resource}`);
  }
}

export function requireRole(...roles: Role[]) {
  return async (request: { authUser: AuthUser }) => {
    if (!roles.includes(request.authUser.role)) {
      throw new HttpError(
        403,
        `This endpoint requires one of: ${roles.join(", ")}. Your role: ${request.authUser.role}`,
      );
    }
  };
}

/** Investors only see their own records; admins see everyone's. */
export function assertOwner(user: AuthUser, ownerId: string) {
  if (user.role !== "admin" && user.userId !== ownerId) {
    throw new HttpError(403, "You do not have access to this record");
  }
}
