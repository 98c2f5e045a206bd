import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../../interfaces/socket.js";

/** Upper bound on flushing queued bytes to a peer that stopped reading. */
const FLUSH_TIMEOUT_MS = 5000;

export class NodeTcpSocket implements ITcpSocket {
  constructor(private readonly socket: net.Socket) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  private get writable(): boolean {
    return !this.socket.destroyed && this.socket.writable;
  }

  send(data: Uint8Array): void {
    if (this.writable) this.socket.write(data);
  }

  /** Resolves once `data` has been handed to the kernel. */
  sendAndWait(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.writable) {
        reject(new Error("Socket is not writable"));
        return;
      }
      // Pending write callbacks get ERR_STREAM_DESTROYED if the peer goes away.
      this.socket.write(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (chunk: Buffer) => cb(new Uint8Array(chunk)));
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  setIdleTimeout(timeoutMs: number, onTimeout: () => void): void {
    this.socket.setTimeout(timeoutMs, onTimeout);
  }

  close(): void {
    const { socket } = this;
    if (socket.destroyed) return;
    if (socket.writableLength === 0) {
      socket.destroy();
      return;
    }
    // Let queued response bytes go out first; destroy() would drop them.
    socket.end(() => socket.destroy());
    setTimeout(() => socket.destroy(), FLUSH_TIMEOUT_MS).unref();
  }
}

export class NodeTcpServer implements ITcpServer {
  private readonly server = net.createServer();

  listen(port: number, host?: string, callback?: () => void): void {
    this.server.listen(port, host, callback);
  }

  address(): { port: number } | null {
    const bound = this.server.address();
    return bound !== null && typeof bound === "object" ? { port: bound.port } : null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    this.server.on(event, cb);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (socket instanceof net.Socket) return new NodeTcpSocket(socket);
    throw new Error("Expected a Node net.Socket");
  }
}
