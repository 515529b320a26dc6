export interface CliArgs {
  config?: string;
  help: boolean;
  version: boolean;
}

export const HELP_TEXT = `
idgate - Login and operation resolution for a capability-token service

Usage:
  idgate [options]

Options:
  -c, --config <path>   Path to config file (default: idgate.json)
  -h, --help            Show this help message
  -v, --version         Show version
`;

/** Parse command-line flags. Arguments that are not flags are ignored. */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    config: undefined,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
    } else if (arg === "-v" || arg === "--version") {
      result.version = true;
    } else if (arg === "-c" || arg === "--config") {
      result.config = args[++i];
    }
  }

  return result;
}
