import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type NodeServerOptions,
  prefixedLogger,
  ServerBindError,
  type ServerConfig,
  type WebServer,
} from "@docroot/engine";
import {
  type CliArgs,
  type CliCommand,
  type CliEnv,
  CliUsageError,
  HELP_TEXT,
  parseArgs,
} from "./args.js";
import { VERSION } from "./version.js";

export interface RunOptions {
  /** Aborting stops the server; `run` then resolves with 0. */
  signal: AbortSignal;
  cwd?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  createServer?: (options: NodeServerOptions) => WebServer;
}

export function toServerConfig(args: CliArgs, root: string): ServerConfig {
  const config: ServerConfig = {
    ...defaultConfig(root),
    port: args.port,
    host: args.host,
    indexFilename: args.indexFilename,
    directoryListing: args.listing,
    quiet: args.quiet,
  };
  if (args.requestTimeoutMs !== undefined) {
    config.requestTimeoutMs = args.requestTimeoutMs;
  }
  if (args.drainTimeoutMs !== undefined) {
    config.drainTimeoutMs = args.drainTimeoutMs;
  }
  return config;
}

export function displayHost(host: string): string {
  if (host === "0.0.0.0" || host === "::") return "localhost";
  return host.includes(":") ? `[${host}]` : host;
}

/** Runs the CLI to completion and resolves with the process exit status. */
export async function run(
  argv: string[],
  env: CliEnv,
  options: RunOptions,
): Promise<number> {
  const out = options.stdout ?? ((line: string) => console.log(line));
  const err = options.stderr ?? ((line: string) => console.error(line));

  let command: CliCommand;
  try {
    command = parseArgs(argv, env);
  } catch (e) {
    if (e instanceof CliUsageError) {
      err(e.message);
      err(HELP_TEXT);
      return 1;
    }
    throw e;
  }

  if (command.kind === "help") {
    out(HELP_TEXT);
    return 0;
  }
  if (command.kind === "version") {
    out(VERSION);
    return 0;
  }

  const args = command.args;
  const root = path.resolve(options.cwd ?? process.cwd(), args.root);
  try {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) {
      err(`Not a directory: ${root}`);
      return 1;
    }
  } catch (e) {
    err(`Cannot serve ${root}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const logger = filteredLogger(
    args.quiet ? "warn" : args.logLevel,
    prefixedLogger("docroot"),
  );
  const createServer = options.createServer ?? createNodeServer;
  const server = createServer({
    config: toServerConfig(args, root),
    logger,
    signal: options.signal,
  });

  if (options.signal.aborted) {
    return 0;
  }

  let port: number;
  try {
    port = await server.start();
  } catch (e) {
    if (e instanceof ServerBindError) {
      err(e.message);
      return 1;
    }
    throw e;
  }

  out(`docroot serving ${root}`);
  out(`  Local:   http://${displayHost(args.host)}:${port}`);
  if (args.host === "0.0.0.0") {
    out(`  Network: http://0.0.0.0:${port}`);
  }

  await server.whenClosed();
  return 0;
}
