import assert from "node:assert";
import { describe, it } from "node:test";
import {
  ConfiguredUserSchema,
  IdentityProviderSchema,
  LogConfigSchema,
  RawConfigSchema,
  ServerConfigSchema,
  StorageConfigSchema,
} from "../../../src/config/schema.js";

describe("Config Schemas", () => {
  describe("IdentityProviderSchema", () => {
    it("should accept an oauth_signature provider with a URL", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "oauth_signature",
        url: "https://sso.example.com",
      });
      assert.strictEqual(result.success, true);
    });

    it("should accept a custom name and description", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "oauth_signature",
        name: "sso-staging",
        description: "Staging SSO",
        url: "https://sso.example.com",
      });
      assert.strictEqual(result.success, true);
    });

    it("should reject a name that cannot appear in a route", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "oauth_signature",
        name: "Staging SSO",
        url: "https://sso.example.com",
      });
      assert.strictEqual(result.success, false);
    });

    it("should reject a missing URL", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "oauth_signature",
      });
      assert.strictEqual(result.success, false);
    });

    it("should reject an invalid URL", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "oauth_signature",
        url: "not a url",
      });
      assert.strictEqual(result.success, false);
    });

    it("should reject an unknown provider type", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "github",
        url: "https://sso.example.com",
      });
      assert.strictEqual(result.success, false);
    });

    it("should reject unknown fields", () => {
      const result = IdentityProviderSchema.safeParse({
        type: "oauth_signature",
        url: "https://sso.example.com",
        clientSecret: "test-secret",
      });
      assert.strictEqual(result.success, false);
    });
  });

  describe("ConfiguredUserSchema", () => {
    it("should accept a user with username and external id", () => {
      const result = ConfiguredUserSchema.safeParse({
        username: "alice",
        externalId: "https://sso.example.com/+id/u123",
      });
      assert.strictEqual(result.success, true);
    });

    it("should reject a user without an external id", () => {
      const result = ConfiguredUserSchema.safeParse({ username: "alice" });
      assert.strictEqual(result.success, false);
    });

    it("should reject reserved usernames", () => {
      for (const username of ["global", "login"]) {
        const result = ConfiguredUserSchema.safeParse({
          username,
          externalId: "https://sso.example.com/+id/u123",
        });
        assert.strictEqual(result.success, false);
      }
    });

    it("should reject an empty username", () => {
      const result = ConfiguredUserSchema.safeParse({
        username: "",
        externalId: "https://sso.example.com/+id/u123",
      });
      assert.strictEqual(result.success, false);
    });
  });

  describe("ServerConfigSchema", () => {
    it("should default the port to 8080", () => {
      const result = ServerConfigSchema.parse({});
      assert.strictEqual(result.port, 8080);
    });

    it("should accept a location URL", () => {
      const result = ServerConfigSchema.parse({
        port: 9000,
        location: "https://id.example.com",
      });
      assert.deepStrictEqual(result, {
        port: 9000,
        location: "https://id.example.com",
      });
    });

    it("should reject port 0", () => {
      assert.strictEqual(ServerConfigSchema.safeParse({ port: 0 }).success, false);
    });

    it("should reject port above 65535", () => {
      assert.strictEqual(
        ServerConfigSchema.safeParse({ port: 65536 }).success,
        false,
      );
    });

    it("should reject a non-integer port", () => {
      assert.strictEqual(
        ServerConfigSchema.safeParse({ port: 80.5 }).success,
        false,
      );
    });
  });

  describe("StorageConfigSchema", () => {
    it("should accept memory storage", () => {
      assert.strictEqual(
        StorageConfigSchema.safeParse({ type: "memory" }).success,
        true,
      );
    });

    it("should accept sqlite storage with a path", () => {
      assert.strictEqual(
        StorageConfigSchema.safeParse({ type: "sqlite", path: "/tmp/x.db" })
          .success,
        true,
      );
    });

    it("should reject an unknown storage type", () => {
      assert.strictEqual(
        StorageConfigSchema.safeParse({ type: "redis" }).success,
        false,
      );
    });
  });

  describe("LogConfigSchema", () => {
    it("should accept all log options", () => {
      const result = LogConfigSchema.safeParse({
        level: "debug",
        format: "json",
        redactSecrets: false,
      });
      assert.strictEqual(result.success, true);
    });

    it("should reject an unknown level", () => {
      assert.strictEqual(
        LogConfigSchema.safeParse({ level: "verbose" }).success,
        false,
      );
    });
  });

  describe("RawConfigSchema", () => {
    it("should accept an empty config", () => {
      assert.strictEqual(RawConfigSchema.safeParse({}).success, true);
    });

    it("should reject unknown top-level fields", () => {
      assert.strictEqual(
        RawConfigSchema.safeParse({ upstreams: {} }).success,
        false,
      );
    });
  });
});
