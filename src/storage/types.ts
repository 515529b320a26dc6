// Types for locally known users

export interface User {
  username: string;
  /** Identity asserted by an external provider, e.g. "https://sso.example.com/+id/abc". */
  externalId: string;
  fullName?: string;
  email?: string;
  groups: string[];
}

/**
 * Interface for user storage backends.
 *
 * Lookups by external identity throw UserNotFoundError when there is no
 * such user; `getUser` returns null instead.
 * Implementations should throw on actual errors (connection failures, etc.).
 */
export interface UserStore {
  findUserByExternalId(externalId: string): Promise<User>;
  getUser(username: string): Promise<User | null>;
  saveUser(user: User): Promise<void>;

  // Close/cleanup resources (may be async for stores that need to persist data)
  close(): void | Promise<void>;
}
