import type { Role } from "./utils/constants.js";

export interface AuthUser {
  userId: string;
  role: Role;
}
