import path from "node:path";
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import type { Authorizer } from "./auth/authorizer.js";
import { requireOperation } from "./auth/middleware.js";
import type { Config } from "./config/types.js";
import type { LoginContext } from "./idp/identity-provider.js";
import { completeLogin, type LoginSink } from "./idp/login.js";
import {
  createIdentityProviders,
  IdentityProviderRegistry,
} from "./idp/registry.js";
import { logger } from "./logger.js";
import { MemoryUserStore } from "./storage/memory.js";
import { SqliteUserStore } from "./storage/sqlite.js";
import type { UserStore } from "./storage/types.js";

export interface AppOptions {
  registry: IdentityProviderRegistry;
  users: UserStore;
  /** Told about every finished login attempt. */
  sink?: LoginSink;
  /** Public base URL of the service; defaults to the URL requests arrive on. */
  location?: string;
  /** Checks capability tokens. User routes are only served when set. */
  authorizer?: Authorizer;
}

export interface ServerOptions {
  /** HTTP client for providers, replaced in tests. */
  fetch?: typeof fetch;
  authorizer?: Authorizer;
}

const loggingSink: LoginSink = {
  loginSuccess(user, ctx) {
    logger.debug({ username: user.username, waitId: ctx.waitId }, "Login complete");
  },
  loginFailure(error, ctx) {
    logger.debug({ error: error.message, waitId: ctx.waitId }, "Login rejected");
  },
};

function createStore(config: Config): UserStore {
  if (config.storage.type === "sqlite") {
    const dbPath =
      config.storage.path ?? path.join(process.cwd(), "data", "idgate.db");
    return SqliteUserStore.create(dbPath);
  }
  return new MemoryUserStore();
}

export function createApp(options: AppOptions): Hono {
  const { registry, users } = options;
  const sink = options.sink ?? loggingSink;
  const location = options.location?.replace(/\/+$/, "");

  // External URL of a request, as the remote party signed it.
  const externalUrl = (req: Request): string => {
    if (!location) return req.url;
    const url = new URL(req.url);
    return `${location}${url.pathname}${url.search}`;
  };

  const app = new Hono();

  // Request logging middleware (applies to all routes)
  app.use("*", async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const pathname = new URL(c.req.url).pathname;

    logger.debug({ method, path: pathname }, "Request received");

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    logger.debug(
      { method, path: pathname, status, duration: `${duration}ms` },
      "Request completed",
    );
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/v1/idp", (c) =>
    c.json(
      registry.list().map((p) => ({
        name: p.name,
        description: p.description,
        interactive: p.interactive,
      })),
    ),
  );

  app.get("/v1/idp/:name/login", (c) => {
    const name = c.req.param("name");
    const provider = registry.get(name);
    if (!provider) {
      return c.json({ error: `unknown identity provider "${name}"` }, 404);
    }

    const origin = location ?? new URL(c.req.url).origin;
    const base = `${origin}/v1/idp/${name}`;
    const url = provider.getLoginUrl(base, c.req.query("waitid"));
    if (provider.interactive) {
      return c.redirect(url, 302);
    }
    return c.json({ url });
  });

  app.all("/v1/idp/:name/callback", async (c) => {
    const name = c.req.param("name");
    const provider = registry.get(name);
    if (!provider) {
      return c.json({ error: `unknown identity provider "${name}"` }, 404);
    }

    const ctx: LoginContext = {
      request: c.req.raw,
      requestUrl: externalUrl(c.req.raw),
      waitId: c.req.query("waitid"),
      users,
      signal: c.req.raw.signal,
    };

    const outcome = await completeLogin(provider, ctx, sink);
    if (!outcome.ok) {
      return c.json({ error: outcome.error.message }, 401);
    }
    return c.json({ username: outcome.user.username });
  });

  if (options.authorizer) {
    app.get(
      "/v1/u/:username",
      requireOperation(options.authorizer, (c) => ({
        type: "user",
        username: c.req.param("username") ?? "",
      })),
      async (c) => {
        const username = c.req.param("username");
        const user = await users.getUser(username);
        if (!user) {
          return c.json({ error: `user "${username}" not found` }, 404);
        }
        return c.json(user);
      },
    );
  }

  // 404 for other routes
  app.notFound((c) => c.json({ error: "Not found" }, 404));

  // Error handler
  app.onError((err, c) => {
    logger.error({ error: err.message }, "Server error");
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export async function createServer(config: Config, options: ServerOptions = {}) {
  const users = createStore(config);
  for (const user of config.users) {
    await users.saveUser({
      username: user.username,
      externalId: user.externalId,
      fullName: user.fullName,
      email: user.email,
      groups: user.groups ?? [],
    });
  }
  if (config.users.length > 0) {
    logger.info({ count: config.users.length }, "Configured users loaded");
  }

  const registry = new IdentityProviderRegistry(
    createIdentityProviders(config.identityProviders, { fetch: options.fetch }),
  );

  const app = createApp({
    registry,
    users,
    location: config.server.location,
    authorizer: options.authorizer,
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: "0.0.0.0",
    },
    () => {
      logger.info(
        { providers: registry.list().map((p) => p.name) },
        "Identity providers registered",
      );
      logger.info(
        { port: config.server.port },
        `idgate listening on port ${config.server.port}`,
      );
    },
  );

  return {
    server,
    registry,
    async close() {
      logger.info("Shutting down idgate...");

      await users.close();

      return new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            logger.error({ error: err.message }, "Error closing server");
            reject(err);
          } else {
            logger.info("Server closed");
            resolve();
          }
        });
      });
    },
  };
}
