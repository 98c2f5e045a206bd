import type { ServerConfig } from "../config/server-config.js";
import {
  type HttpRequestHead,
  HttpRequestParseError,
} from "../http/request-head.js";
import { RequestReader, type RequestLimits } from "../http/request-reader.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, ResponseOutcome } from "../http/types.js";
import { statusText } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import {
  type AccessLogEntry,
  formatAccessLogLine,
} from "../logging/access-log.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import { toError } from "../utils/errors.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { ServerBindError } from "./bind-error.js";
import { StaticServer } from "./static-server.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Aborting this signal shuts the server down gracefully. */
  signal?: AbortSignal;
}

export type WebServerEvents = {
  listening: [port: number];
  request: [entry: AccessLogEntry];
  error: [err: Error];
  close: [];
};

interface ConnectionState {
  /** A request is being answered; closing now would cut a response short. */
  busy: boolean;
}

export class WebServer extends EventEmitter<WebServerEvents> {
  private readonly socketFactory: ISocketFactory;
  private readonly config: Readonly<ServerConfig>;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;
  private readonly staticServer: StaticServer;
  private tcpServer: ITcpServer | null = null;
  private connections: Map<ITcpSocket, ConnectionState> = new Map();
  private draining = false;
  private stopPromise: Promise<void> | null = null;
  private drainWaiters: Array<() => void> = [];

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = Object.freeze({ ...options.config });
    this.logger = options.logger ?? basicLogger();
    this.signal = options.signal;

    this.staticServer = new StaticServer({
      root: this.config.root,
      fs: options.fileSystem,
      indexFilename: this.config.indexFilename,
      directoryListing: this.config.directoryListing,
      writeTimeoutMs: this.config.writeTimeoutMs,
      logger: this.logger,
    });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }
    if (this.signal?.aborted) {
      return Promise.reject(new Error("Server start aborted"));
    }

    this.draining = false;
    this.stopPromise = null;

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }

        if (this.draining) {
          socket.close();
          return;
        }

        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(new ServerBindError(this.config.host, this.config.port, err));
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.signal?.addEventListener("abort", this.onAbort, { once: true });
        this.emit("listening", port);
        resolve(port);
        // An abort between start() and now fired before the listener existed.
        if (this.signal?.aborted) {
          this.onAbort();
        }
      });
    });
  }

  /**
   * Stop accepting, close idle connections, give in-flight responses up to
   * `drainTimeoutMs` to finish, then force-close whatever is left.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  /** Resolves once the server has shut down (or was never started). */
  whenClosed(): Promise<void> {
    if (this.stopPromise) return this.stopPromise;
    if (!this.tcpServer) return Promise.resolve();
    return new Promise((resolve) => {
      this.once("close", () => resolve());
    });
  }

  private readonly onAbort = (): void => {
    this.logger.info("Shutting down...");
    this.stop().catch((err: unknown) => {
      this.logger.error("Shutdown failed:", err);
    });
  };

  private async shutdown(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;
    this.draining = true;
    this.signal?.removeEventListener("abort", this.onAbort);

    const listenerClosed = new Promise<void>((resolve) => {
      if (!server) {
        resolve();
        return;
      }
      server.close(() => resolve());
    });

    // Connections waiting for their next request have nothing in flight.
    for (const [socket, state] of this.connections) {
      if (!state.busy) {
        socket.close();
      }
    }

    const drained = await this.waitForDrain(this.config.drainTimeoutMs);
    if (!drained) {
      this.logger.warn(
        `Drain timeout after ${this.config.drainTimeoutMs}ms; closing ${this.connections.size} connection(s)`,
      );
      for (const socket of this.connections.keys()) {
        socket.close();
      }
    }

    await listenerClosed;
    this.emit("close");
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.connections.size === 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onDrained = () => {
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        this.drainWaiters = this.drainWaiters.filter(
          (waiter) => waiter !== onDrained,
        );
        resolve(false);
      }, timeoutMs);

      this.drainWaiters.push(onDrained);
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    const state: ConnectionState = { busy: false };
    this.connections.set(socket, state);

    socket.setIdleTimeout?.(this.config.idleTimeoutMs, () => {
      this.logger.debug(
        `Closing connection from ${socket.remoteAddress ?? "?"}: idle for ${this.config.idleTimeoutMs}ms`,
      );
      socket.close();
    });

    const reader = new RequestReader(
      socket,
      this.config.maxHeaderSize + this.config.maxRequestBodySize,
    );
    const limits: RequestLimits = {
      timeoutMs: this.config.requestTimeoutMs,
      maxHeaderSize: this.config.maxHeaderSize,
      maxBodySize: this.config.maxRequestBodySize,
    };

    try {
      while (!this.draining) {
        let head: HttpRequestHead;
        try {
          head = await reader.readHead(limits);
          state.busy = true;
          // GET and HEAD carry no meaningful body, but it has to leave the
          // stream before the next request on this connection can be read.
          await reader.skipBody(head.contentLength, limits);
        } catch (err) {
          this.rejectRequest(socket, err);
          break;
        }

        const keepAlive =
          !this.draining && shouldKeepAlive(head.httpVersion, head.headers);

        const request: HttpRequest = {
          method: head.method,
          url: head.url,
          httpVersion: head.httpVersion,
          headers: head.headers,
        };

        const outcome = await this.staticServer.handleRequest(
          socket,
          request,
          { connectionHeader: keepAlive ? "keep-alive" : "close" },
        );
        this.logAccess(socket, request, outcome);
        state.busy = false;

        if (!keepAlive || outcome.interrupted) {
          break;
        }
      }
    } finally {
      socket.close();
      this.connections.delete(socket);
      if (this.connections.size === 0) {
        this.notifyDrained();
      }
    }
  }

  private rejectRequest(socket: ITcpSocket, err: unknown): void {
    const outcome = classifyRequestParseFailure(err);
    const addr = socket.remoteAddress ?? "?";
    if (outcome === "close") {
      if (!(err instanceof HttpRequestParseError) || err.code === "INPUT_OVERFLOW") {
        this.logger.debug(`Connection from ${addr} failed:`, toError(err).message);
      }
      return;
    }

    this.logger.debug(
      `Rejecting request from ${addr} with ${outcome}: ${toError(err).message}`,
    );
    const text = statusText(outcome);
    sendResponse(socket, {
      status: outcome,
      statusText: text,
      headers: new Map([
        ["content-type", "text/plain; charset=utf-8"],
        ["connection", "close"],
      ]),
      body: fromString(text),
    });
  }

  private logAccess(
    socket: ITcpSocket,
    request: HttpRequest,
    outcome: ResponseOutcome,
  ): void {
    const entry: AccessLogEntry = {
      remoteAddress: socket.remoteAddress ?? "-",
      method: request.method,
      url: request.url,
      httpVersion: request.httpVersion,
      status: outcome.status,
      bytes: outcome.bytes,
    };
    this.emit("request", entry);
    if (!this.config.quiet) {
      this.logger.info(formatAccessLogLine(entry));
    }
  }

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

function shouldKeepAlive(
  httpVersion: string,
  headers: Map<string, string>,
): boolean {
  const connection = headers.get("connection")?.toLowerCase();
  if (httpVersion === "1.0") {
    return connection === "keep-alive";
  }
  return connection !== "close";
}

function classifyRequestParseFailure(
  err: unknown,
): 400 | 408 | 413 | 431 | 501 | 505 | "close" {
  if (!(err instanceof HttpRequestParseError)) {
    // Socket-level failure: nobody left to answer.
    return "close";
  }

  switch (err.code) {
    case "IDLE_TIMEOUT":
    case "CONNECTION_CLOSED":
    case "CONNECTION_CLOSED_INCOMPLETE":
    case "INPUT_OVERFLOW":
      return "close";
    case "REQUEST_TIMEOUT":
      return 408;
    case "HEADERS_TOO_LARGE":
      return 431;
    case "BODY_TOO_LARGE":
      return 413;
    case "UNSUPPORTED_TRANSFER_ENCODING":
      return 501;
    case "UNSUPPORTED_VERSION":
      return 505;
    default:
      return 400;
  }
}
