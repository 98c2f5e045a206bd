import type { IFileHandle } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { toError } from "../utils/errors.js";
import type { HttpResponseOptions } from "./types.js";

const CHUNK_SIZE = 64 * 1024; // 64KB chunks

export interface SendResponseOptions {
  /** HEAD: keep Content-Length of the body but do not send it. */
  headOnly?: boolean;
}

export interface SendFileResponseOptions {
  /**
   * Fail the response when one chunk is not accepted within this time.
   * Only sockets with `sendAndWait` report when a chunk is accepted.
   */
  writeTimeoutMs?: number;
}

/**
 * Raised once a streamed response has started and cannot be completed.
 * The only safe reaction is to drop the connection.
 */
export class ResponseInterruptedError extends Error {
  constructor(
    readonly bytesSent: number,
    readonly reason: Error,
  ) {
    super(
      `Response interrupted after ${bytesSent} body bytes: ${reason.message}`,
    );
    this.name = "ResponseInterruptedError";
  }
}

/**
 * Send a complete HTTP response (headers + body) over a socket.
 * Returns the number of body bytes written.
 */
export function sendResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
  options?: SendResponseOptions,
): number {
  const declared = response.body ?? new Uint8Array(0);
  const body = options?.headOnly ? new Uint8Array(0) : declared;
  const fields = withDefaults(response.headers, {
    "content-length": String(declared.length),
    connection: "close",
  });

  socket.send(concat([encodeHead(response, fields), body]));
  return body.length;
}

/**
 * Send a streaming HTTP response: headers first, then the file in chunks.
 * Returns the number of body bytes written.
 */
export async function sendFileResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
  fileHandle: IFileHandle,
  fileSize: number,
  options?: SendFileResponseOptions,
): Promise<number> {
  const timeoutMs = options?.writeTimeoutMs;
  const fields = lowerCaseFields(response.headers);
  fields.set("content-length", String(fileSize));
  const head = encodeHead(response, withDefaults(fields, { connection: "close" }));

  let sent = 0;
  try {
    await write(socket, head, timeoutMs);
    while (sent < fileSize) {
      // Fresh chunk each time: the socket may still hold the previous one.
      const chunk = new Uint8Array(Math.min(CHUNK_SIZE, fileSize - sent));
      const { bytesRead } = await fileHandle.read(chunk, 0, chunk.length, sent);
      if (bytesRead === 0) {
        throw new Error(
          `File shrank while sending: expected ${fileSize} bytes, got ${sent}`,
        );
      }
      await write(socket, chunk.subarray(0, bytesRead), timeoutMs);
      sent += bytesRead;
    }
  } catch (err) {
    throw new ResponseInterruptedError(sent, toError(err));
  }
  return sent;
}

function write(
  socket: ITcpSocket,
  data: Uint8Array,
  timeoutMs: number | undefined,
): Promise<void> {
  if (!socket.sendAndWait) {
    socket.send(data);
    return Promise.resolve();
  }

  const accepted = socket.sendAndWait(data);
  if (timeoutMs === undefined) return accepted;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const stalled = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Write stalled for ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  return Promise.race([accepted, stalled]).finally(() => clearTimeout(timer));
}

function encodeHead(
  { status, statusText }: HttpResponseOptions,
  fields: Map<string, string>,
): Uint8Array {
  let head = `HTTP/1.1 ${status} ${statusText}\r\n`;
  for (const [name, value] of fields) {
    head += `${name}: ${value}\r\n`;
  }
  return fromString(`${head}\r\n`);
}

type HeaderInput = HttpResponseOptions["headers"];

function lowerCaseFields(headers: HeaderInput): Map<string, string> {
  const entries: Iterable<[string, string]> =
    headers === undefined ? [] : headers instanceof Map ? headers : Object.entries(headers);
  return new Map(
    Array.from(entries, ([name, value]): [string, string] => [name.toLowerCase(), value]),
  );
}

/** Header fields in their given order, followed by any `defaults` not already set. */
function withDefaults(
  headers: HeaderInput,
  defaults: Record<string, string>,
): Map<string, string> {
  const fields = lowerCaseFields(headers);
  for (const [name, value] of Object.entries(defaults)) {
    if (!fields.has(name)) fields.set(name, value);
  }
  return fields;
}
