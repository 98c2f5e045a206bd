export interface HttpRequest {
  method: string;
  url: string;
  httpVersion: string;
  headers: Map<string, string>;
}

export interface HttpResponseOptions {
  status: number;
  statusText: string;
  headers?: Map<string, string> | Record<string, string>;
  body?: Uint8Array;
}

/** What actually went out on the wire for one request. */
export interface ResponseOutcome {
  status: number;
  /** Body bytes written, excluding the head. */
  bytes: number;
  /** The peer went away or the file read failed after the head was sent. */
  interrupted?: boolean;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  301: "Moved Permanently",
  304: "Not Modified",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  413: "Content Too Large",
  431: "Request Header Fields Too Large",
  500: "Internal Server Error",
  501: "Not Implemented",
  505: "HTTP Version Not Supported",
};

export function statusText(status: number): string {
  return STATUS_TEXT[status] ?? "Unknown";
}
