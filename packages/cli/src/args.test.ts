import { describe, expect, it } from "vitest";
import { CliUsageError, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("defaults to the working directory on 0.0.0.0:8000", () => {
    expect(parseArgs([])).toEqual({
      kind: "serve",
      args: {
        root: ".",
        port: 8000,
        host: "0.0.0.0",
        indexFilename: "index.html",
        listing: false,
        quiet: false,
        logLevel: "info",
      },
    });
  });

  it("reads flags and a positional directory", () => {
    const command = parseArgs([
      "public",
      "-p",
      "9090",
      "--host",
      "127.0.0.1",
      "--index",
      "home.html",
      "--listing",
      "-q",
      "--log-level",
      "debug",
      "--timeout",
      "1500",
      "--drain-timeout",
      "250",
    ]);
    expect(command).toEqual({
      kind: "serve",
      args: {
        root: "public",
        port: 9090,
        host: "127.0.0.1",
        indexFilename: "home.html",
        listing: true,
        quiet: true,
        logLevel: "debug",
        requestTimeoutMs: 1500,
        drainTimeoutMs: 250,
      },
    });
  });

  it("takes defaults from the environment and lets flags win", () => {
    const env = { PORT: "3000", HOST: "::1", DOCROOT: "/srv/site" };
    const fromEnv = parseArgs([], env);
    expect(fromEnv.kind === "serve" && fromEnv.args).toMatchObject({
      port: 3000,
      host: "::1",
      root: "/srv/site",
    });

    const overridden = parseArgs(["--port", "4000", "other"], env);
    expect(overridden.kind === "serve" && overridden.args).toMatchObject({
      port: 4000,
      host: "::1",
      root: "other",
    });
  });

  it("accepts port 0 for an ephemeral port", () => {
    const command = parseArgs(["--port", "0"]);
    expect(command.kind === "serve" && command.args.port).toBe(0);
  });

  it("returns help and version commands", () => {
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["-h"])).toEqual({ kind: "help" });
    expect(parseArgs(["--version"])).toEqual({ kind: "version" });
    expect(parseArgs(["-v"])).toEqual({ kind: "version" });
  });

  it.each([
    [["--port", "abc"], "Invalid port from --port: \"abc\""],
    [["--port", "-1"], "Invalid port from --port: \"-1\""],
    [["--port", "65536"], "Port out of range from --port: 65536"],
    [["--port"], "--port requires a value"],
    [["--log-level", "trace"], "Unknown log level: trace"],
    [["--timeout", "0"], "--timeout expects a positive number of milliseconds, got \"0\""],
    [["--index", "../secret"], "--index expects a plain file name, got \"../secret\""],
    [["--cors"], "Unknown option: --cors"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(new CliUsageError(message));
  });

  it("rejects an invalid PORT from the environment", () => {
    expect(() => parseArgs([], { PORT: "http" })).toThrow(
      "Invalid port from PORT: \"http\"",
    );
  });
});
