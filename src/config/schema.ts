import { z } from "zod";
import { isReservedUsername } from "../auth/operation.js";

/**
 * Identity provider that checks OAuth request signatures with a remote
 * validator.
 * @package
 */
export const OAuthSignatureIdPSchema = z
  .object({
    type: z.literal("oauth_signature"),
    name: z
      .string()
      .regex(
        /^[a-z0-9_-]+$/,
        "Provider name must contain only a-z, 0-9, hyphens, and underscores",
      )
      .optional(),
    description: z.string().min(1).optional(),
    url: z.string().url("Invalid validator URL"),
  })
  .strict();

/**
 * Identity provider configuration — discriminated union.
 * @package
 */
export const IdentityProviderSchema = z.discriminatedUnion("type", [
  OAuthSignatureIdPSchema,
]);

/**
 * Local user known to the service before any login.
 * @package
 */
export const ConfiguredUserSchema = z
  .object({
    username: z
      .string()
      .min(1, "Username is required")
      .refine((name) => !isReservedUsername(name), "Username is reserved"),
    externalId: z.string().min(1, "External ID is required"),
    fullName: z.string().optional(),
    email: z.string().optional(),
    groups: z.array(z.string()).optional(),
  })
  .strict();

/**
 * Server configuration
 * @package
 */
export const ServerConfigSchema = z
  .object({
    port: z
      .number()
      .int()
      .min(1, "Port must be at least 1")
      .max(65535, "Port must be at most 65535")
      .default(8080),
    location: z.string().url("Invalid location URL").optional(),
  })
  .strict();

/**
 * Log configuration
 * @package
 */
export const LogConfigSchema = z
  .object({
    level: z.enum(["debug", "info", "warn", "error"]).optional(),
    format: z.enum(["pretty", "json"]).optional(),
    redactSecrets: z.boolean().optional(),
  })
  .strict();

/**
 * Storage configuration - discriminated union based on type
 * @package
 */
export const StorageConfigSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("memory") }).strict(),
  z
    .object({
      type: z.literal("sqlite"),
      path: z.string().optional(),
    })
    .strict(),
]);

/**
 * Raw config file schema (before processing)
 * @package
 */
export const RawConfigSchema = z
  .object({
    server: ServerConfigSchema.optional(),
    identityProviders: z.array(IdentityProviderSchema).optional(),
    users: z.array(ConfiguredUserSchema).optional(),
    storage: StorageConfigSchema.optional(),
    log: LogConfigSchema.optional(),
  })
  .strict();

/**
 * Processed config (after loader adds defaults)
 * @package
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  identityProviders: z.array(IdentityProviderSchema),
  users: z.array(ConfiguredUserSchema),
  storage: StorageConfigSchema,
  log: LogConfigSchema.optional(),
});

// Export inferred types
export type OAuthSignatureIdPConfig = z.infer<typeof OAuthSignatureIdPSchema>;
export type IdentityProviderConfig = z.infer<typeof IdentityProviderSchema>;
export type ConfiguredUser = z.infer<typeof ConfiguredUserSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type RawConfig = z.infer<typeof RawConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export interface LoadConfigResult {
  config: Config;
  warnings: string[];
}
