/**
 * idgate library: operation resolution, token middleware and the
 * identity-provider API. Importing it starts nothing; the service is the
 * `idgate` binary.
 *
 * @packageDocumentation
 */

// Authorization
export type { Authorizer } from "./auth/authorizer.js";
export { parseTokens } from "./auth/authorizer.js";
export type { AuthEnv, DescribeRequest } from "./auth/middleware.js";
export { requireOperation } from "./auth/middleware.js";
export {
  Action,
  GLOBAL_ENTITY,
  globalOperation,
  isNoOperation,
  isReservedUsername,
  LOGIN_OPERATION,
  NO_OPERATION,
  type Operation,
  RESERVED_USERNAMES,
  userOperation,
} from "./auth/operation.js";
export type * from "./auth/requests.js";
export { resolveOperation } from "./auth/resolver.js";

// Errors
export * from "./errors.js";

// Identity providers
export type {
  IdentityProvider,
  LoginContext,
  LoginOutcome,
  UserResolver,
} from "./idp/identity-provider.js";
export {
  completeLogin,
  LoginAttempt,
  type LoginSink,
  type LoginState,
} from "./idp/login.js";
export {
  OAuthSignatureIdentityProvider,
  type OAuthSignatureIdPOptions,
  VALIDATE_PATH,
} from "./idp/providers/oauth-signature.js";
export {
  createIdentityProviders,
  IdentityProviderRegistry,
} from "./idp/registry.js";

// HTTP
export { type AppOptions, createApp } from "./server.js";

// Storage
export { MemoryUserStore } from "./storage/memory.js";
export { SqliteUserStore } from "./storage/sqlite.js";
export type { User, UserStore } from "./storage/types.js";
