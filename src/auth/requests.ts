// Shapes of the API requests the service accepts, as built by the transport
// layer for each inbound call. Only the fields the resolver or handlers need
// are modelled.

export interface QueryUsersRequest {
  type: "queryUsers";
  externalId?: string;
  email?: string;
  lastLoginSince?: string;
  lastDischargeSince?: string;
  owner?: string;
}

export interface UserRequest {
  type: "user";
  username: string;
}

export interface SetUserRequest {
  type: "setUser";
  username: string;
  /** Set when an agent user is being created on behalf of another user. */
  owner?: string;
  externalId?: string;
  fullName?: string;
  email?: string;
  groups?: string[];
  publicKeys?: string[];
}

export interface UserGroupsRequest {
  type: "userGroups";
  username: string;
}

export interface SetUserGroupsRequest {
  type: "setUserGroups";
  username: string;
  groups: string[];
}

export interface ModifyUserGroupsRequest {
  type: "modifyUserGroups";
  username: string;
  add?: string[];
  remove?: string[];
}

export interface UserIdpGroupsRequest {
  type: "userIdpGroups";
  username: string;
}

export interface WhoAmIRequest {
  type: "whoAmI";
}

export interface SSHKeysRequest {
  type: "sshKeys";
  username: string;
}

export interface PutSSHKeysRequest {
  type: "putSSHKeys";
  username: string;
  sshKeys: string[];
  /** Append to the existing keys instead of replacing them. */
  add?: boolean;
}

export interface DeleteSSHKeysRequest {
  type: "deleteSSHKeys";
  username: string;
  sshKeys: string[];
}

export interface UserTokenRequest {
  type: "userToken";
  username: string;
}

export interface VerifyTokenRequest {
  type: "verifyToken";
  macaroons: string[];
}

export interface UserExtraInfoRequest {
  type: "userExtraInfo";
  username: string;
}

export interface SetUserExtraInfoRequest {
  type: "setUserExtraInfo";
  username: string;
  extraInfo: Record<string, unknown>;
}

export interface UserExtraInfoItemRequest {
  type: "userExtraInfoItem";
  username: string;
  item: string;
}

export interface SetUserExtraInfoItemRequest {
  type: "setUserExtraInfoItem";
  username: string;
  item: string;
  data: unknown;
}

export interface DischargeTokenForUserRequest {
  type: "dischargeTokenForUser";
  username: string;
}

export type RequestDescriptor =
  | QueryUsersRequest
  | UserRequest
  | SetUserRequest
  | UserGroupsRequest
  | SetUserGroupsRequest
  | ModifyUserGroupsRequest
  | UserIdpGroupsRequest
  | WhoAmIRequest
  | SSHKeysRequest
  | PutSSHKeysRequest
  | DeleteSSHKeysRequest
  | UserTokenRequest
  | VerifyTokenRequest
  | UserExtraInfoRequest
  | SetUserExtraInfoRequest
  | UserExtraInfoItemRequest
  | SetUserExtraInfoItemRequest
  | DischargeTokenForUserRequest;
