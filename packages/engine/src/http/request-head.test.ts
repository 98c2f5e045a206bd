import { describe, expect, it } from "vitest";
import { fromString } from "../utils/buffer.js";
import {
  HttpRequestParseError,
  indexOfHeadEnd,
  leadingCrlfLength,
  parseRequestHead,
} from "./request-head.js";

function failureCode(raw: string): string | undefined {
  try {
    parseRequestHead(fromString(raw));
  } catch (err) {
    if (err instanceof HttpRequestParseError) return err.code;
    throw err;
  }
  return undefined;
}

describe("parseRequestHead", () => {
  it("parses the request line and header fields", () => {
    const head = parseRequestHead(
      fromString("GET /index.html HTTP/1.1\r\nHost: localhost\r\nAccept: */*"),
    );

    expect(head.method).toBe("GET");
    expect(head.url).toBe("/index.html");
    expect(head.httpVersion).toBe("1.1");
    expect(head.headers.get("host")).toBe("localhost");
    expect(head.headers.get("accept")).toBe("*/*");
    expect(head.contentLength).toBe(0);
  });

  it("accepts HTTP/1.0 without header fields", () => {
    const head = parseRequestHead(fromString("HEAD / HTTP/1.0"));
    expect(head.httpVersion).toBe("1.0");
    expect(head.headers.size).toBe(0);
  });

  it("lower-cases names, trims values and joins repeats", () => {
    const head = parseRequestHead(
      fromString("GET / HTTP/1.1\r\nAccept:  text/html \r\naccept: text/plain"),
    );
    expect([...head.headers]).toEqual([["accept", "text/html, text/plain"]]);
  });

  it("reads Content-Length", () => {
    const head = parseRequestHead(
      fromString("GET / HTTP/1.1\r\nContent-Length: 42"),
    );
    expect(head.contentLength).toBe(42);
  });

  it.each([
    ["GET /", "MALFORMED_REQUEST_LINE"],
    ["GET  / HTTP/1.1", "MALFORMED_REQUEST_LINE"],
    ["GET / HTTP/1.1 extra", "MALFORMED_REQUEST_LINE"],
    ["G(T / HTTP/1.1", "MALFORMED_REQUEST_LINE"],
    ["GET / HTTP/one", "MALFORMED_REQUEST_LINE"],
    ["GET / HTTP/2.0", "UNSUPPORTED_VERSION"],
    ["GET / HTTP/0.9", "UNSUPPORTED_VERSION"],
    ["GET / HTTP/1.1\r\nno colon here", "MALFORMED_HEADER"],
    ["GET / HTTP/1.1\r\n: empty-name", "MALFORMED_HEADER"],
    ["GET / HTTP/1.1\r\nContent-Length: -5", "INVALID_CONTENT_LENGTH"],
    ["GET / HTTP/1.1\r\nContent-Length: 1, 2", "INVALID_CONTENT_LENGTH"],
    ["GET / HTTP/1.1\r\nTransfer-Encoding: chunked", "UNSUPPORTED_TRANSFER_ENCODING"],
  ])("rejects %j with %s", (raw, code) => {
    expect(failureCode(raw)).toBe(code);
  });
});

describe("indexOfHeadEnd", () => {
  it("finds the blank line", () => {
    expect(indexOfHeadEnd(fromString("GET / HTTP/1.1\r\n\r\nbody"))).toBe(14);
    expect(indexOfHeadEnd(fromString("GET / HTTP/1.1\r\n"))).toBe(-1);
  });
});

describe("leadingCrlfLength", () => {
  it("counts whole CRLF pairs only", () => {
    expect(leadingCrlfLength(fromString("\r\n\r\nGET"))).toBe(4);
    expect(leadingCrlfLength(fromString("\r"))).toBe(0);
    expect(leadingCrlfLength(fromString("GET"))).toBe(0);
  });
});
