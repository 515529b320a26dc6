import assert from "node:assert";
import { describe, it } from "node:test";
import {
  Action,
  createApp,
  IdentityProviderRegistry,
  MemoryUserStore,
  NO_OPERATION,
  OAuthSignatureIdentityProvider,
  requireOperation,
  resolveOperation,
} from "../../src/lib.js";

describe("Library entry", () => {
  it("should resolve operations without starting the service", () => {
    assert.deepStrictEqual(resolveOperation({ type: "user", username: "bob" }), {
      entity: "bob",
      action: Action.Read,
    });
    assert.strictEqual(
      resolveOperation({ type: "user", username: "login" }),
      NO_OPERATION,
    );
  });

  it("should expose the middleware and provider API", () => {
    assert.strictEqual(typeof requireOperation, "function");
    const provider = new OAuthSignatureIdentityProvider({
      url: "https://sso.example.com/",
    });
    assert.strictEqual(provider.name, "oauth_signature");
    assert.strictEqual(
      provider.getLoginUrl("https://id.example.com/v1/idp/oauth_signature"),
      "https://id.example.com/v1/idp/oauth_signature/callback",
    );
  });

  it("should build an app from its parts", async () => {
    const app = createApp({
      registry: new IdentityProviderRegistry([]),
      users: new MemoryUserStore(),
    });
    const res = await app.request("/v1/idp");
    assert.deepStrictEqual(await res.json(), []);
  });
});
