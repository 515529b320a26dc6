#!/usr/bin/env node
import {
  type LoadConfigResult,
  loadConfig,
  resolveConfigPath,
} from "./config/loader.js";
import { HELP_TEXT, parseArgs } from "./cli.js";
import { errorMessage } from "./errors.js";
import { configureLogger, logger } from "./logger.js";
import { createServer } from "./server.js";
import { VERSION } from "./version.js";

const args = parseArgs(process.argv.slice(2));

if (args.help) {
  console.log(HELP_TEXT);
  process.exit(0);
}

if (args.version) {
  console.log(VERSION);
  process.exit(0);
}

const configPath = resolveConfigPath(args.config);

let config: LoadConfigResult["config"];
let warnings: LoadConfigResult["warnings"];
try {
  ({ config, warnings } = loadConfig(configPath));
} catch (error) {
  // Log to stderr directly since logger config isn't loaded yet
  console.error(
    `Failed to load config from ${configPath}:\n${errorMessage(error)}`,
  );
  process.exit(1);
}

// Reconfigure logger with settings from config
configureLogger(config.log);

logger.info(
  {
    identityProviders: config.identityProviders.map((p) => p.name ?? p.type),
    storage: config.storage.type,
  },
  "Config loaded",
);

for (const warning of warnings) {
  logger.warn(warning);
}

let closeServer: (() => Promise<void>) | undefined;
let isShuttingDown = false;

async function shutdown(signal: string) {
  if (isShuttingDown) {
    logger.warn("Shutdown already in progress, forcing exit");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    if (closeServer) {
      await closeServer();
    }
    process.exit(0);
  } catch (error) {
    logger.error(
      { error: errorMessage(error) },
      "Error during shutdown",
    );
    process.exit(1);
  }
}

// Graceful shutdown handlers
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.error(
    {
      error: error.message,
      stack: error.stack,
    },
    "Uncaught exception",
  );
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.error(
    { reason: errorMessage(reason) },
    "Unhandled rejection",
  );
  process.exit(1);
});

try {
  const { close } = await createServer(config);
  closeServer = close;
} catch (error) {
  logger.error(
    { error: errorMessage(error) },
    "Failed to start server",
  );
  process.exit(1);
}
