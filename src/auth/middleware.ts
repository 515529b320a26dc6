import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { logger } from "../logger.js";
import { type Authorizer, parseTokens } from "./authorizer.js";
import { isNoOperation, type Operation } from "./operation.js";
import type { RequestDescriptor } from "./requests.js";
import { resolveOperation } from "./resolver.js";

export type AuthEnv = {
  Variables: {
    operation: Operation;
  };
};

/**
 * Build the request descriptor of an inbound call. May read the body.
 */
export type DescribeRequest = (
  c: Context,
) => RequestDescriptor | Promise<RequestDescriptor>;

/**
 * Middleware that lets a request through only when the presented tokens
 * authorize the operation its descriptor resolves to.
 */
export function requireOperation(
  authorizer: Authorizer,
  describe: DescribeRequest,
) {
  return createMiddleware<AuthEnv>(async (c, next) => {
    const operation = resolveOperation(await describe(c));
    const tokens = parseTokens(c.req.header("macaroons"));

    const allowed =
      !isNoOperation(operation) &&
      (await authorizer.allow(operation, tokens));

    if (!allowed) {
      logger.debug(
        { entity: operation.entity, action: operation.action },
        "Permission denied",
      );
      return c.json({ error: "permission denied" }, 403);
    }

    c.set("operation", operation);
    await next();
  });
}
