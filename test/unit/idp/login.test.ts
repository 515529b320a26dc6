import assert from "node:assert";
import { describe, it } from "node:test";
import { LoginStateError } from "../../../src/errors.js";
import type {
  IdentityProvider,
  LoginContext,
  LoginOutcome,
} from "../../../src/idp/identity-provider.js";
import {
  completeLogin,
  LoginAttempt,
  type LoginSink,
} from "../../../src/idp/login.js";
import type { User } from "../../../src/storage/types.js";
import { MemoryUserStore } from "../../../src/storage/memory.js";
import { createTestUser } from "../../helpers/index.js";

class StubProvider implements IdentityProvider {
  readonly name = "stub";
  readonly description = "Stub";
  readonly interactive = true;

  constructor(private outcome: LoginOutcome) {}

  getLoginUrl(callbackBase: string): string {
    return `${callbackBase}/callback`;
  }

  async handleLogin(): Promise<LoginOutcome> {
    return this.outcome;
  }
}

class RecordingSink implements LoginSink {
  successes: User[] = [];
  failures: Error[] = [];

  loginSuccess(user: User): void {
    this.successes.push(user);
  }

  loginFailure(error: Error): void {
    this.failures.push(error);
  }
}

function context(): LoginContext {
  return {
    request: new Request("http://localhost/v1/idp/stub/callback"),
    requestUrl: "http://localhost/v1/idp/stub/callback",
    users: new MemoryUserStore(),
  };
}

describe("LoginAttempt", () => {
  it("should start in the started state", () => {
    const attempt = new LoginAttempt("stub");
    assert.strictEqual(attempt.state, "started");
    assert.strictEqual(attempt.done, false);
  });

  it("should follow the login states to success", () => {
    const attempt = new LoginAttempt("stub");
    attempt.transition("awaitingCallback");
    attempt.transition("verifying");
    attempt.transition("succeeded");
    assert.strictEqual(attempt.state, "succeeded");
    assert.strictEqual(attempt.done, true);
  });

  it("should not leave a terminal state", () => {
    const attempt = new LoginAttempt("stub");
    attempt.transition("awaitingCallback");
    attempt.transition("verifying");
    attempt.transition("failed");
    assert.throws(() => attempt.transition("succeeded"), LoginStateError);
    assert.throws(() => attempt.transition("started"), LoginStateError);
    assert.strictEqual(attempt.state, "failed");
  });

  it("should not skip verification", () => {
    const attempt = new LoginAttempt("stub");
    attempt.transition("awaitingCallback");
    assert.throws(() => attempt.transition("succeeded"), {
      name: "LoginStateError",
      message:
        'login attempt for "stub" cannot go from awaitingCallback to succeeded',
    });
  });
});

describe("completeLogin", () => {
  it("should report success once and never failure", async () => {
    const user = createTestUser();
    const sink = new RecordingSink();

    const outcome = await completeLogin(
      new StubProvider({ ok: true, user }),
      context(),
      sink,
    );

    assert.deepStrictEqual(outcome, { ok: true, user });
    assert.deepStrictEqual(sink.successes, [user]);
    assert.deepStrictEqual(sink.failures, []);
  });

  it("should report failure once and never success", async () => {
    const error = new Error("invalid OAuth credentials");
    const sink = new RecordingSink();

    const outcome = await completeLogin(
      new StubProvider({ ok: false, error }),
      context(),
      sink,
    );

    assert.deepStrictEqual(outcome, { ok: false, error });
    assert.deepStrictEqual(sink.successes, []);
    assert.strictEqual(sink.failures.length, 1);
    assert.strictEqual(sink.failures[0], error);
  });

  it("should hand the login context to the sink", async () => {
    const ctx = context();
    let seen: LoginContext | undefined;

    await completeLogin(new StubProvider({ ok: true, user: createTestUser() }), ctx, {
      loginSuccess(_user, c) {
        seen = c;
      },
      loginFailure() {
        assert.fail("loginFailure should not be called");
      },
    });

    assert.strictEqual(seen, ctx);
  });
});
