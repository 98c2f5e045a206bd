import { errorCode } from "../utils/errors.js";

export type ServerBindErrorCode =
  | "ADDRESS_IN_USE"
  | "PERMISSION_DENIED"
  | "ADDRESS_NOT_AVAILABLE"
  | "UNKNOWN";

const CODE_BY_ERRNO: Record<string, ServerBindErrorCode> = {
  EADDRINUSE: "ADDRESS_IN_USE",
  EACCES: "PERMISSION_DENIED",
  EPERM: "PERMISSION_DENIED",
  EADDRNOTAVAIL: "ADDRESS_NOT_AVAILABLE",
  ENOTFOUND: "ADDRESS_NOT_AVAILABLE",
};

const HINTS: Record<ServerBindErrorCode, string> = {
  ADDRESS_IN_USE: "port is already in use",
  PERMISSION_DENIED: "permission denied (ports below 1024 usually need privileges)",
  ADDRESS_NOT_AVAILABLE: "address is not available on this machine",
  UNKNOWN: "listener failed",
};

/** The listener could not be bound. Fatal at startup. */
export class ServerBindError extends Error {
  readonly code: ServerBindErrorCode;

  constructor(
    readonly host: string,
    readonly port: number,
    readonly reason: Error,
  ) {
    const errno = errorCode(reason);
    const code = (errno !== undefined ? CODE_BY_ERRNO[errno] : undefined) ?? "UNKNOWN";
    super(`Cannot listen on ${host}:${port}: ${HINTS[code]} (${reason.message})`);
    this.name = "ServerBindError";
    this.code = code;
  }
}
