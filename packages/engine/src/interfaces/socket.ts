/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the server engine from the runtime's networking
 * so the listener loop can be driven in-process by tests.
 */

export interface ITcpSocket {
  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve when it has been accepted without backpressure.
   * Rejects when the peer went away before the write completed.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /**
   * Call `onTimeout` once the socket has seen no reads or writes for
   * `timeoutMs`. The socket is left open; the callback decides.
   */
  setIdleTimeout?(timeoutMs: number, onTimeout: () => void): void;

  /** Close the connection. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface ITcpServer {
  /** Start listening on the specified port and optional host. */
  listen(port: number, host?: string, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  on(event: "error", cb: (err: Error) => void): void;

  /** Stop accepting connections; the callback runs once all have ended. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
