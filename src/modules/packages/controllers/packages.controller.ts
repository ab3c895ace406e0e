import type { FastifyRequest } from "fastify";
import type { EngineContext } from "../../../context.js";
import { authorize } from "../../../utils/rbac.js";
import { idParamsSchema } from "../../../utils/schemas.js";
import { serialize } from "../../../utils/serialize.js";
import {
  createPackageSchema,
  listPackagesQuerySchema,
  packageStatusSchema,
} from "../schemas/packages.schemas.js";
import {
  createPackage,
  getPackage,
  listCategories,
  listPackages,
  setPackageStatus,
} from "../services/packages.service.js";

export function createPackageController(ctx: EngineContext) {
  return {
    list: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "package");
      const query = listPackagesQuerySchema.parse(request.query);
      const rows = await listPackages(ctx, request.authUser, query);
      return serialize(rows);
    },

    categories: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "package");
      return listCategories(ctx);
    },

    getById: async (request: FastifyRequest) => {
      authorize(request.authUser, "read", "package");
      const params = idParamsSchema.parse(request.params);
      const pkg = await getPackage(ctx, request.authUser, params.id);
      return serialize(pkg);
    },

    create: async (request: FastifyRequest) => {
      authorize(request.authUser, "create", "package");
      const payload = createPackageSchema.parse(request.body);
      const pkg = await createPackage(ctx, request.authUser, payload);
      return serialize(pkg);
    },

    setStatus: async (request: FastifyRequest) => {
      authorize(request.authUser, "update", "package");
      const params = idParamsSchema.parse(request.params);
      const payload = packageStatusSchema.parse(request.body);
      const pkg = await setPackageStatus(ctx, request.authUser, params.id, payload.status);
      return serialize(pkg);
    },
  };
}
