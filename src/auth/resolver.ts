import { logger } from "../logger.js";
import {
  Action,
  globalOperation,
  isReservedUsername,
  LOGIN_OPERATION,
  NO_OPERATION,
  type Operation,
  userOperation,
} from "./operation.js";
import type { RequestDescriptor } from "./requests.js";

/**
 * Return the operation performed by the API handler that takes the given
 * request. Descriptors of an unknown type, and user-scoped descriptors that
 * name a reserved username, resolve to {@link NO_OPERATION}, which no token
 * authorizes.
 */
export function resolveOperation(request: RequestDescriptor): Operation {
  const reserved = reservedUsernameIn(request);
  if (reserved !== undefined) {
    logger.info({ request, username: reserved }, "reserved username in API request");
    return NO_OPERATION;
  }

  switch (request.type) {
    case "queryUsers":
      return globalOperation(Action.Read);
    case "user":
      return userOperation(request.username, Action.Read);
    case "setUser":
      // Creating an agent needs rights over the owner, not the new user.
      if (request.owner) {
        return userOperation(request.owner, Action.CreateAgent);
      }
      return userOperation(request.username, Action.WriteAdmin);
    case "userGroups":
      return userOperation(request.username, Action.ReadGroups);
    case "setUserGroups":
      return userOperation(request.username, Action.WriteGroups);
    case "modifyUserGroups":
      return userOperation(request.username, Action.WriteGroups);
    case "userIdpGroups":
      return userOperation(request.username, Action.ReadGroups);
    case "whoAmI":
      return LOGIN_OPERATION;
    case "sshKeys":
      return userOperation(request.username, Action.ReadSSHKeys);
    case "putSSHKeys":
      return userOperation(request.username, Action.WriteSSHKeys);
    case "deleteSSHKeys":
      return userOperation(request.username, Action.WriteSSHKeys);
    case "userToken":
      return userOperation(request.username, Action.ReadAdmin);
    case "verifyToken":
      return globalOperation(Action.Verify);
    case "userExtraInfo":
      return userOperation(request.username, Action.ReadAdmin);
    case "setUserExtraInfo":
      return userOperation(request.username, Action.WriteAdmin);
    case "userExtraInfoItem":
      return userOperation(request.username, Action.ReadAdmin);
    case "setUserExtraInfoItem":
      return userOperation(request.username, Action.WriteAdmin);
    case "dischargeTokenForUser":
      return globalOperation(Action.DischargeFor);
    default:
      logger.info({ request }, "unknown API request type");
      return NO_OPERATION;
  }
}

// First reserved name among the users a descriptor acts on.
function reservedUsernameIn(request: RequestDescriptor): string | undefined {
  const names: string[] = [];
  if ("username" in request) {
    names.push(request.username);
  }
  if (request.type === "setUser" && request.owner) {
    names.push(request.owner);
  }
  return names.find(isReservedUsername);
}
