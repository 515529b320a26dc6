import { isReservedUsername } from "../auth/operation.js";
import { UserNotFoundError } from "../errors.js";
import { logger } from "../logger.js";
import type { User, UserStore } from "./types.js";

export class MemoryUserStore implements UserStore {
  private users = new Map<string, User>();
  private byExternalId = new Map<string, string>();

  constructor() {
    logger.info(
      "Memory store initialized (users will not persist across restarts)",
    );
  }

  async findUserByExternalId(externalId: string): Promise<User> {
    const username = this.byExternalId.get(externalId);
    const user = username ? this.users.get(username) : undefined;
    if (!user) {
      throw new UserNotFoundError(
        `user with external id "${externalId}" not found`,
      );
    }
    return { ...user, groups: [...user.groups] };
  }

  async getUser(username: string): Promise<User | null> {
    const user = this.users.get(username);
    return user ? { ...user, groups: [...user.groups] } : null;
  }

  async saveUser(user: User): Promise<void> {
    if (isReservedUsername(user.username)) {
      throw new Error(`username "${user.username}" is reserved`);
    }
    const owner = this.byExternalId.get(user.externalId);
    if (owner && owner !== user.username) {
      throw new Error(
        `external id "${user.externalId}" already belongs to user "${owner}"`,
      );
    }
    const existing = this.users.get(user.username);
    if (existing && existing.externalId !== user.externalId) {
      this.byExternalId.delete(existing.externalId);
    }
    this.users.set(user.username, { ...user, groups: [...user.groups] });
    this.byExternalId.set(user.externalId, user.username);
  }

  close(): void {
    // Nothing to close for memory store
  }
}
