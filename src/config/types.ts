// Re-export all types from schema (types are inferred from Zod schemas)
export type {
  Config,
  ConfiguredUser,
  IdentityProviderConfig,
  LogConfig,
  OAuthSignatureIdPConfig,
  ServerConfig,
  StorageConfig,
} from "./schema.js";
