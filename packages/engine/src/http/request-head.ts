import { decodeToString } from "../utils/buffer.js";

// RFC 9110 token characters
const METHOD_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const VERSION_PATTERN = /^HTTP\/(\d)\.(\d)$/;

export interface HttpRequestHead {
  method: string;
  url: string;
  /** "1.0" or "1.1" */
  httpVersion: string;
  headers: Map<string, string>;
  contentLength: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER"
  | "UNSUPPORTED_VERSION"
  | "INVALID_CONTENT_LENGTH"
  | "UNSUPPORTED_TRANSFER_ENCODING"
  | "BODY_TOO_LARGE"
  | "INPUT_OVERFLOW";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/** Offset of the blank line ending the head, or -1 while it is incomplete. */
export function indexOfHeadEnd(buffer: Uint8Array): number {
  for (let i = 0; i + 3 < buffer.length; i++) {
    if (
      buffer[i] === 13 &&
      buffer[i + 1] === 10 &&
      buffer[i + 2] === 13 &&
      buffer[i + 3] === 10
    ) {
      return i;
    }
  }
  return -1;
}

/** Number of bytes taken by CRLFs in front of a request line. */
export function leadingCrlfLength(buffer: Uint8Array): number {
  let i = 0;
  while (i + 1 < buffer.length && buffer[i] === 13 && buffer[i + 1] === 10) {
    i += 2;
  }
  return i;
}

/** Parse a request head, the bytes before its terminating blank line. */
export function parseRequestHead(bytes: Uint8Array): HttpRequestHead {
  const [requestLine = "", ...fieldLines] = decodeToString(bytes).split("\r\n");
  const line = parseRequestLine(requestLine);
  const headers = parseHeaderFields(fieldLines);
  // Only Content-Length framing is understood; a chunked body would be
  // read as the next request.
  if (headers.has("transfer-encoding")) {
    throw new HttpRequestParseError(
      "UNSUPPORTED_TRANSFER_ENCODING",
      `Unsupported Transfer-Encoding: ${JSON.stringify(headers.get("transfer-encoding"))}`,
    );
  }
  return { ...line, headers, contentLength: parseContentLength(headers) };
}

function parseRequestLine(
  line: string,
): Pick<HttpRequestHead, "method" | "url" | "httpVersion"> {
  const parts = line.split(" ");
  if (parts.length !== 3 || parts.includes("")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: ${JSON.stringify(line)}`,
    );
  }

  const [method, url, protocol] = parts;
  if (!METHOD_PATTERN.test(method)) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Invalid method: ${JSON.stringify(method)}`,
    );
  }

  const version = VERSION_PATTERN.exec(protocol);
  if (!version) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Invalid protocol version: ${JSON.stringify(protocol)}`,
    );
  }
  const [, major, minor] = version;
  if (major !== "1") {
    throw new HttpRequestParseError(
      "UNSUPPORTED_VERSION",
      `Unsupported protocol version: ${protocol}`,
    );
  }

  return { method, url, httpVersion: `${major}.${minor}` };
}

/** Field names are lower-cased; repeated fields are joined with ", ". */
function parseHeaderFields(lines: string[]): Map<string, string> {
  const headers = new Map<string, string>();
  for (const line of lines) {
    const colon = line.indexOf(":");
    if (colon <= 0) {
      throw new HttpRequestParseError(
        "MALFORMED_HEADER",
        `Malformed header line: ${JSON.stringify(line)}`,
      );
    }
    const name = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    const previous = headers.get(name);
    headers.set(name, previous === undefined ? value : `${previous}, ${value}`);
  }
  return headers;
}

function parseContentLength(headers: Map<string, string>): number {
  const raw = headers.get("content-length");
  if (raw === undefined) return 0;
  if (!/^\d+$/.test(raw)) {
    throw new HttpRequestParseError(
      "INVALID_CONTENT_LENGTH",
      `Invalid Content-Length: ${JSON.stringify(raw)}`,
    );
  }
  return Number.parseInt(raw, 10);
}
