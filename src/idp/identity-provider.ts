import type { User, UserStore } from "../storage/types.js";

/** Resolves a verified external identity to a local user. */
export type UserResolver = Pick<UserStore, "findUserByExternalId">;

/** Per-attempt state handed to a provider when its callback arrives. */
export interface LoginContext {
  /** The inbound callback request. */
  request: Request;
  /** The callback URL as seen from outside the service. */
  requestUrl: string;
  /** Correlation token linking the callback to the attempt that started it. */
  waitId?: string;
  users: UserResolver;
  /** Aborted when the enclosing request is. */
  signal?: AbortSignal;
}

export type LoginOutcome =
  | { ok: true; user: User }
  | { ok: false; error: Error };

export interface IdentityProvider {
  /** Unique provider name, e.g. "oauth_signature". Used in routes. */
  readonly name: string;
  /** Display name for provider listings. */
  readonly description: string;
  /** Whether logging in needs a browser redirect. */
  readonly interactive: boolean;
  /**
   * Build the URL a client uses to begin logging in. `callbackBase` is the
   * provider's own base URL within this service.
   */
  getLoginUrl(callbackBase: string, waitId?: string): string;
  /** Verify the callback and resolve its user. Never rejects. */
  handleLogin(ctx: LoginContext): Promise<LoginOutcome>;
}
