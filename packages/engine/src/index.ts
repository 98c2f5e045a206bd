// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
} from "./http/request-head.js";
export {
  HttpRequestParseError,
  parseRequestHead,
} from "./http/request-head.js";
export type { RequestLimits } from "./http/request-reader.js";
export {
  DEFAULT_REQUEST_LIMITS,
  RequestReader,
} from "./http/request-reader.js";
export type {
  SendFileResponseOptions,
  SendResponseOptions,
} from "./http/response-writer.js";
export {
  ResponseInterruptedError,
  sendFileResponse,
  sendResponse,
} from "./http/response-writer.js";
export type {
  HttpRequest,
  HttpResponseOptions,
  ResponseOutcome,
} from "./http/types.js";
export { STATUS_TEXT, statusText } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { AccessLogEntry } from "./logging/access-log.js";
export { formatAccessLogLine } from "./logging/access-log.js";
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { ServerBindErrorCode } from "./server/bind-error.js";
export { ServerBindError } from "./server/bind-error.js";
export { getMimeType } from "./server/mime-types.js";
export type { PathResolution } from "./server/path-resolver.js";
export { isWithinRoot, resolveRequestPath } from "./server/path-resolver.js";
export type {
  RequestContext,
  StaticServerOptions,
} from "./server/static-server.js";
export { StaticServer } from "./server/static-server.js";
export type {
  WebServerEvents,
  WebServerOptions,
} from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export type { FileSystemOperation } from "./testing/in-memory-filesystem.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export type { InMemoryConnection } from "./testing/in-memory-socket-factory.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { errorCode } from "./utils/errors.js";
export { EventEmitter } from "./utils/event-emitter.js";
