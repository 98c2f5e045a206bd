import { isLogLevel, LOG_LEVELS, type LogLevel } from "@docroot/engine";

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "0.0.0.0";

export interface CliArgs {
  root: string;
  port: number;
  host: string;
  indexFilename: string;
  listing: boolean;
  quiet: boolean;
  logLevel: LogLevel;
  requestTimeoutMs?: number;
  drainTimeoutMs?: number;
}

export type CliCommand =
  | { kind: "serve"; args: CliArgs }
  | { kind: "help" }
  | { kind: "version" };

export type CliEnv = Record<string, string | undefined>;

/** Bad flags or environment. Reported with the usage text, exit status 1. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
docroot - serve a directory over HTTP

Usage: docroot [directory] [options]

Options:
  --port, -p <port>        Port to listen on (default: $PORT or ${DEFAULT_PORT})
  --host, -H <host>        Host to bind (default: $HOST or ${DEFAULT_HOST})
  --index <name>           File served for directory requests (default: index.html)
  --listing                List directories that have no index file
  --quiet, -q              Suppress the access log
  --log-level <level>      One of ${LOG_LEVELS.join(", ")} (default: info)
  --timeout <ms>           Request read timeout (default: 30000)
  --drain-timeout <ms>     Grace period for in-flight requests on shutdown (default: 5000)
  --version, -v            Show version
  --help, -h               Show this help

The directory defaults to $DOCROOT, then the working directory.
`;

export function parsePort(value: string, source: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`Invalid port from ${source}: ${JSON.stringify(value)}`);
  }
  const port = Number.parseInt(value, 10);
  if (port > 65535) {
    throw new CliUsageError(`Port out of range from ${source}: ${port}`);
  }
  return port;
}

function parseMilliseconds(value: string, flag: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) === 0) {
    throw new CliUsageError(`${flag} expects a positive number of milliseconds, got ${JSON.stringify(value)}`);
  }
  return Number.parseInt(value, 10);
}

function parseIndexFilename(value: string): string {
  if (value === "" || value === "." || value === ".." || /[/\\]/.test(value)) {
    throw new CliUsageError(`--index expects a plain file name, got ${JSON.stringify(value)}`);
  }
  return value;
}

export function parseArgs(argv: string[], env: CliEnv = {}): CliCommand {
  const args: CliArgs = {
    root: env.DOCROOT || ".",
    port: env.PORT ? parsePort(env.PORT, "PORT") : DEFAULT_PORT,
    host: env.HOST || DEFAULT_HOST,
    indexFilename: "index.html",
    listing: false,
    quiet: false,
    logLevel: "info",
  };

  let i = 0;
  const valueOf = (flag: string): string => {
    const value = argv[++i];
    if (value === undefined) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return value;
  };

  while (i < argv.length) {
    const arg = argv[i];
    if (arg === "--port" || arg === "-p") {
      args.port = parsePort(valueOf(arg), arg);
    } else if (arg === "--host" || arg === "-H") {
      args.host = valueOf(arg);
    } else if (arg === "--index") {
      args.indexFilename = parseIndexFilename(valueOf(arg));
    } else if (arg === "--listing") {
      args.listing = true;
    } else if (arg === "--quiet" || arg === "-q") {
      args.quiet = true;
    } else if (arg === "--log-level") {
      const level = valueOf(arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`Unknown log level: ${level}`);
      }
      args.logLevel = level;
    } else if (arg === "--timeout") {
      args.requestTimeoutMs = parseMilliseconds(valueOf(arg), arg);
    } else if (arg === "--drain-timeout") {
      args.drainTimeoutMs = parseMilliseconds(valueOf(arg), arg);
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      args.root = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "serve", args };
}
