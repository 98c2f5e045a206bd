export interface ServerConfig {
  /** Port to listen on. 0 picks a free port. Default: 8000 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** Document root. Nothing outside it is ever served. */
  root: string;
  /** File served for directory requests. Default: 'index.html' */
  indexFilename: string;
  /** Render an HTML listing for directories without an index file. Default: false */
  directoryListing: boolean;
  /** Suppress the access log. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a request head, and for an idle keep-alive connection. Default: 30000ms */
  requestTimeoutMs: number;
  /** Socket inactivity bound in either direction. Default: 60000ms */
  idleTimeoutMs: number;
  /** Max time one chunk of a response may wait for the peer to accept it. Default: 30000ms */
  writeTimeoutMs: number;
  /** Grace period for in-flight responses on shutdown. Default: 5000ms */
  drainTimeoutMs: number;
  /** Max size of the request line plus headers. Default: 8KB */
  maxHeaderSize: number;
  /** Max request body the server will read and discard. Default: 1MB */
  maxRequestBodySize: number;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8000,
    host: "0.0.0.0",
    root,
    indexFilename: "index.html",
    directoryListing: false,
    quiet: false,
    requestTimeoutMs: 30_000,
    idleTimeoutMs: 60_000,
    writeTimeoutMs: 30_000,
    drainTimeoutMs: 5_000,
    maxHeaderSize: 8 * 1024,
    maxRequestBodySize: 1024 * 1024,
  };
}
