import { ForbiddenError } from "../errors";
import type { CurrentUser } from "../types";

export function assertAdmin(user: CurrentUser, action: string): void {
  if (!user.isAdmin) {
    throw new ForbiddenError(`Only admins may ${action}`);
  }
}

export function assertOwnerOrAdmin(user: CurrentUser, ownerId: string, what: string): void {
  if (!user.isAdmin && user.id !== ownerId) {
    throw new ForbiddenError(`You do not have access to ${what}`);
  }
}
