import { existsSync, readFileSync } from "node:fs";
import type { ZodError } from "zod";
import {
  type Config,
  type LoadConfigResult,
  RawConfigSchema,
} from "./schema.js";

export type { LoadConfigResult } from "./schema.js";

type ZodIssue = ZodError["issues"][number];

const DEFAULT_CONFIG: Config = {
  server: { port: 8080 },
  identityProviders: [],
  users: [],
  storage: { type: "memory" },
  log: undefined,
};

function substituteEnvVars(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{(\w+)\}/g, (_, name) => process.env[name] ?? "");
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVars);
  }
  if (obj && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value);
    }
    return result;
  }
  return obj;
}

function formatZodIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)";

  if (issue.code === "unrecognized_keys") {
    const keys = issue.keys.map((k) => `"${k}"`).join(", ");
    const location = path === "(root)" ? "config" : path;
    return `${location}: unknown field${issue.keys.length > 1 ? "s" : ""} ${keys}`;
  }

  if (
    issue.code === "invalid_type" &&
    issue.message.includes("received undefined")
  ) {
    return `${path}: required field missing`;
  }

  if (issue.code === "invalid_value") {
    const options = issue.values.map((v) => `"${String(v)}"`).join(", ");
    return `${path}: must be one of: ${options}`;
  }

  return `${path}: ${issue.message}`;
}

function formatZodError(error: ZodError): string {
  // A misspelt field also shows up as a missing one; report only the typo.
  const unrecognizedPaths = new Set<string>();
  for (const issue of error.issues) {
    if (issue.code === "unrecognized_keys") {
      unrecognizedPaths.add(issue.path.map(String).join("."));
    }
  }

  const filtered = error.issues.filter((issue) => {
    if (
      issue.code === "invalid_type" &&
      issue.message.includes("received undefined")
    ) {
      const parentPath = issue.path.slice(0, -1).map(String).join(".");
      return !unrecognizedPaths.has(parentPath);
    }
    return true;
  });

  const formatted = filtered.map(formatZodIssue);
  return `Invalid configuration:\n${formatted.map((f) => `  - ${f}`).join("\n")}`;
}

export function resolveConfigPath(configPath?: string): string {
  return configPath ?? "idgate.json";
}

function checkConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (config.identityProviders.length === 0) {
    warnings.push("No identity providers configured: nobody can log in");
  }

  if (config.users.length > 0 && config.identityProviders.length === 0) {
    warnings.push("Users configured without any identity provider");
  }

  return warnings;
}

/**
 * Reject two providers answering to the same name. Names are looked up
 * by callback routes, so they must be unique.
 */
function checkProviderNames(config: Config): void {
  const seen = new Set<string>();
  for (const idp of config.identityProviders) {
    const name = idp.name ?? idp.type;
    if (seen.has(name)) {
      throw new Error(
        `Invalid configuration:\n  - identityProviders: duplicate provider name "${name}"`,
      );
    }
    seen.add(name);
  }
}

export function loadConfig(configPath: string): LoadConfigResult {
  if (!existsSync(configPath)) {
    const config: Config = { ...DEFAULT_CONFIG };
    return { config, warnings: checkConfig(config) };
  }

  const content = readFileSync(configPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new Error(
      `Invalid JSON in config file: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  // Substitute environment variables before validation
  const substituted = substituteEnvVars(parsed);

  const result = RawConfigSchema.safeParse(substituted);
  if (!result.success) {
    throw new Error(formatZodError(result.error));
  }

  const raw = result.data;
  const config: Config = {
    server: raw.server ?? DEFAULT_CONFIG.server,
    identityProviders: raw.identityProviders ?? [],
    users: raw.users ?? [],
    storage: raw.storage ?? DEFAULT_CONFIG.storage,
    log: raw.log,
  };

  checkProviderNames(config);

  return { config, warnings: checkConfig(config) };
}
