import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import type { Authorizer } from "../../src/auth/authorizer.js";
import type { Operation } from "../../src/auth/operation.js";
import { IdentityProviderRegistry } from "../../src/idp/registry.js";
import { createApp } from "../../src/server.js";
import { MemoryUserStore } from "../../src/storage/memory.js";
import { createTestUser, EXTERNAL_ID } from "../helpers/index.js";

// Allows an operation when one of the tokens is "<entity>:<action>".
class TokenListAuthorizer implements Authorizer {
  seen: Operation[] = [];

  async allow(operation: Operation, tokens: string[]): Promise<boolean> {
    this.seen.push(operation);
    return tokens.includes(`${operation.entity}:${operation.action}`);
  }
}

describe("User routes", () => {
  let authorizer: TokenListAuthorizer;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    authorizer = new TokenListAuthorizer();
    const users = new MemoryUserStore();
    await users.saveUser(createTestUser());
    app = createApp({
      registry: new IdentityProviderRegistry([]),
      users,
      authorizer,
    });
  });

  it("should return the user when the tokens allow reading it", async () => {
    const res = await app.request("/v1/u/alice", {
      headers: { Macaroons: "alice:read" },
    });

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), {
      username: "alice",
      externalId: EXTERNAL_ID,
      fullName: "Alice Example",
      email: "alice@example.com",
      groups: ["staff"],
    });
    assert.deepStrictEqual(authorizer.seen, [{ entity: "alice", action: "read" }]);
  });

  it("should answer 403 when the tokens do not allow it", async () => {
    const res = await app.request("/v1/u/alice", {
      headers: { Macaroons: "bob:read" },
    });

    assert.strictEqual(res.status, 403);
    assert.deepStrictEqual(await res.json(), { error: "permission denied" });
  });

  it("should answer 403 without tokens", async () => {
    const res = await app.request("/v1/u/alice");
    assert.strictEqual(res.status, 403);
  });

  it("should answer 404 for an unknown user the caller may read", async () => {
    const res = await app.request("/v1/u/bob", {
      headers: { Macaroons: "bob:read" },
    });

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await res.json(), { error: 'user "bob" not found' });
  });

  it("should refuse a reserved username without asking the authorizer", async () => {
    const res = await app.request("/v1/u/global", {
      headers: { Macaroons: "global:read" },
    });

    assert.strictEqual(res.status, 403);
    assert.deepStrictEqual(authorizer.seen, []);
  });

  it("should not serve user routes without an authorizer", async () => {
    const open = createApp({
      registry: new IdentityProviderRegistry([]),
      users: new MemoryUserStore(),
    });
    const res = await open.request("/v1/u/alice");
    assert.strictEqual(res.status, 404);
  });
});
