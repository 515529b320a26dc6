import { LoginStateError } from "../errors.js";
import { logger } from "../logger.js";
import type { User } from "../storage/types.js";
import type {
  IdentityProvider,
  LoginContext,
  LoginOutcome,
} from "./identity-provider.js";

/** Receives the result of each login attempt. */
export interface LoginSink {
  loginSuccess(user: User, ctx: LoginContext): void | Promise<void>;
  loginFailure(error: Error, ctx: LoginContext): void | Promise<void>;
}

export type LoginState =
  | "started"
  | "awaitingCallback"
  | "verifying"
  | "succeeded"
  | "failed";

const TRANSITIONS: Record<LoginState, readonly LoginState[]> = {
  started: ["awaitingCallback"],
  awaitingCallback: ["verifying"],
  verifying: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

/**
 * State of one login attempt. Terminal states are final.
 *
 * Handing out the login URL keeps no server-side state, so the service
 * only tracks the callback half: {@link completeLogin} creates the attempt
 * when the callback arrives and moves it straight past `started` and
 * `awaitingCallback`.
 */
export class LoginAttempt {
  private current: LoginState = "started";

  constructor(readonly provider: string) {}

  get state(): LoginState {
    return this.current;
  }

  get done(): boolean {
    return this.current === "succeeded" || this.current === "failed";
  }

  transition(next: LoginState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new LoginStateError(
        `login attempt for "${this.provider}" cannot go from ${this.current} to ${next}`,
      );
    }
    this.current = next;
  }
}

/**
 * Run a provider's verification for an arrived callback and report the
 * outcome to the sink. Exactly one sink method is called.
 */
export async function completeLogin(
  provider: IdentityProvider,
  ctx: LoginContext,
  sink: LoginSink,
): Promise<LoginOutcome> {
  const attempt = new LoginAttempt(provider.name);
  attempt.transition("awaitingCallback");
  attempt.transition("verifying");

  const outcome = await provider.handleLogin(ctx);

  if (outcome.ok) {
    attempt.transition("succeeded");
    logger.info(
      { provider: provider.name, username: outcome.user.username },
      "Login succeeded",
    );
    await sink.loginSuccess(outcome.user, ctx);
  } else {
    attempt.transition("failed");
    logger.info(
      { provider: provider.name, error: outcome.error.message },
      "Login failed",
    );
    await sink.loginFailure(outcome.error, ctx);
  }
  return outcome;
}
