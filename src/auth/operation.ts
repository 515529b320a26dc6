/**
 * Actions a capability token can authorize.
 */
export const Action = {
  Read: "read",
  WriteAdmin: "writeAdmin",
  WriteGroups: "writeGroups",
  ReadGroups: "readGroups",
  CreateAgent: "createAgent",
  ReadSSHKeys: "readSSHKeys",
  WriteSSHKeys: "writeSSHKeys",
  ReadAdmin: "readAdmin",
  Verify: "verify",
  DischargeFor: "dischargeFor",
  Login: "login",
} as const;

export type Action = (typeof Action)[keyof typeof Action];

/** Entity naming the whole service rather than one user. */
export const GLOBAL_ENTITY = "global";

/**
 * The (entity, action) pair a caller's tokens must authorize.
 */
export interface Operation {
  readonly entity: string;
  /** Empty only for {@link NO_OPERATION}. */
  readonly action: Action | "";
}

/** Operation that only asks the caller to be logged in. */
export const LOGIN_OPERATION: Operation = Object.freeze({
  entity: "login",
  action: Action.Login,
});

/** Operation no token can satisfy. */
export const NO_OPERATION: Operation = Object.freeze({
  entity: "",
  action: "",
});

export function globalOperation(action: Action): Operation {
  return Object.freeze({ entity: GLOBAL_ENTITY, action });
}

export function userOperation(username: string, action: Action): Operation {
  return Object.freeze({ entity: username, action });
}

/**
 * Names that cannot belong to a user: they are taken by the service-wide
 * entities, and the empty name is the entity of {@link NO_OPERATION}.
 */
export const RESERVED_USERNAMES: ReadonlySet<string> = new Set([
  GLOBAL_ENTITY,
  LOGIN_OPERATION.entity,
  "",
]);

export function isReservedUsername(username: string): boolean {
  return RESERVED_USERNAMES.has(username);
}

export function isNoOperation(op: Operation): boolean {
  return op.action === "" || op.entity === "";
}
