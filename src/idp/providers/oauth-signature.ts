import { z } from "zod";
import {
  errorMessage,
  MalformedCredentialError,
  UserResolutionError,
  ValidatorTransportError,
  VerificationRejectedError,
} from "../../errors.js";
import { logger } from "../../logger.js";
import type {
  IdentityProvider,
  LoginContext,
  LoginOutcome,
} from "../identity-provider.js";

export const VALIDATE_PATH = "/api/v2/requests/validate";

const FORM_METHODS = new Set(["POST", "PUT", "PATCH"]);

const consumerKeyPattern = /oauth_consumer_key="([^"]*)"/g;

/** Body sent to the validator. The key names are fixed by its API. */
interface ValidateRequest {
  http_url: string;
  http_method: string;
  authorization: string;
  query_string: string;
}

const ValidateResponseSchema = z.object({
  is_valid: z.boolean().default(false),
  error: z.string().default(""),
});

export interface OAuthSignatureIdPOptions {
  /** Validator base URL. Also the namespace of the identities it vouches for. */
  url: string;
  name?: string;
  description?: string;
  fetch?: typeof fetch;
}

/**
 * Logs users in by having a remote service validate the OAuth signature
 * of the callback request. Not interactive: a client signs one request to
 * the callback URL and is logged in.
 */
export class OAuthSignatureIdentityProvider implements IdentityProvider {
  readonly name: string;
  readonly description: string;
  readonly interactive = false;

  private readonly url: string;
  private readonly fetch: typeof fetch;

  constructor(options: OAuthSignatureIdPOptions) {
    this.url = options.url.replace(/\/+$/, "");
    this.name = options.name ?? "oauth_signature";
    this.description = options.description ?? "OAuth request signature";
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  getLoginUrl(callbackBase: string, waitId?: string): string {
    const callback = `${callbackBase.replace(/\/+$/, "")}/callback`;
    if (!waitId) {
      return callback;
    }
    return `${callback}?${new URLSearchParams({ waitid: waitId }).toString()}`;
  }

  async handleLogin(ctx: LoginContext): Promise<LoginOutcome> {
    let externalId: string;
    try {
      externalId = await this.verifySignature(ctx);
    } catch (error) {
      return { ok: false, error: asError(error) };
    }

    try {
      const user = await ctx.users.findUserByExternalId(externalId);
      return { ok: true, user };
    } catch (error) {
      return { ok: false, error: new UserResolutionError(externalId, error) };
    }
  }

  /**
   * Ask the validator whether the request is correctly signed and return
   * the external identity of the signer.
   */
  async verifySignature(ctx: LoginContext): Promise<string> {
    const authorization = ctx.request.headers.get("authorization") ?? "";

    let httpUrl: string;
    try {
      const parsed = new URL(ctx.requestUrl);
      parsed.search = "";
      parsed.hash = "";
      httpUrl = parsed.toString();
    } catch (error) {
      throw new ValidatorTransportError("cannot parse request URL", {
        cause: error,
      });
    }

    const body: ValidateRequest = {
      http_url: httpUrl,
      http_method: ctx.request.method,
      authorization,
      query_string: await formParams(ctx.request),
    };

    let res: Response;
    try {
      res = await this.fetch(`${this.url}${VALIDATE_PATH}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: ctx.signal,
      });
    } catch (error) {
      logger.warn(
        { provider: this.name, error: errorMessage(error) },
        "OAuth validator unreachable",
      );
      throw new ValidatorTransportError(
        `cannot reach OAuth validator: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let validated: z.infer<typeof ValidateResponseSchema>;
    try {
      validated = await readValidateResponse(res);
    } finally {
      if (!res.bodyUsed) {
        await res.body?.cancel();
      }
    }

    if (validated.error !== "") {
      throw new VerificationRejectedError(
        `cannot validate OAuth credentials: ${validated.error}`,
      );
    }
    if (!validated.is_valid) {
      throw new VerificationRejectedError("invalid OAuth credentials");
    }

    const matches = [...authorization.matchAll(consumerKeyPattern)];
    if (matches.length !== 1) {
      throw new MalformedCredentialError(
        matches.length === 0
          ? "no consumer key in authorization header"
          : "multiple consumer keys in authorization header",
      );
    }
    return `${this.url}/+id/${matches[0][1]}`;
  }
}

async function readValidateResponse(
  res: Response,
): Promise<z.infer<typeof ValidateResponseSchema>> {
  const contentType = res.headers.get("content-type") ?? "";
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  if (mediaType === "") {
    throw new ValidatorTransportError(`bad content type "${contentType}"`);
  }
  if (mediaType !== "application/json") {
    throw new ValidatorTransportError(
      `unexpected response type "${mediaType}"`,
    );
  }

  let data: unknown;
  try {
    data = await res.json();
  } catch (error) {
    throw new ValidatorTransportError(
      `cannot parse OAuth validator response: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const result = ValidateResponseSchema.safeParse(data);
  if (!result.success) {
    throw new ValidatorTransportError(
      "unexpected OAuth validator response format",
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Form parameters of the request: url-encoded body values first, then
 * query values, ordered by key.
 */
async function formParams(request: Request): Promise<string> {
  const params = new URLSearchParams();
  const contentType = request.headers.get("content-type") ?? "";
  if (
    FORM_METHODS.has(request.method) &&
    contentType.toLowerCase().startsWith("application/x-www-form-urlencoded")
  ) {
    const body = new URLSearchParams(await request.clone().text());
    for (const [key, value] of body) {
      params.append(key, value);
    }
  }
  for (const [key, value] of new URL(request.url).searchParams) {
    params.append(key, value);
  }
  params.sort();
  return params.toString();
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
