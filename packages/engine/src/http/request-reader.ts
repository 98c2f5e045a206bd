import type { ITcpSocket } from "../interfaces/socket.js";
import { concat } from "../utils/buffer.js";
import {
  type HttpRequestHead,
  HttpRequestParseError,
  indexOfHeadEnd,
  leadingCrlfLength,
  parseRequestHead,
} from "./request-head.js";

const HEAD_TERMINATOR_LENGTH = 4;

export interface RequestLimits {
  /** Request line plus header fields, in bytes. */
  maxHeaderSize: number;
  maxBodySize: number;
  /** Deadline for one head or one body, from the call. */
  timeoutMs: number;
}

export const DEFAULT_REQUEST_LIMITS: Readonly<RequestLimits> = {
  maxHeaderSize: 8 * 1024,
  maxBodySize: 1024 * 1024,
  timeoutMs: 30_000,
};

/**
 * Reads requests off one connection. Bytes past the current head stay
 * buffered for the next call, so a keep-alive connection can carry several
 * requests, pipelined or not. Only one read may be outstanding at a time.
 *
 * At most `maxBuffered` unread bytes are held. A peer that sends more while
 * its last request is still being answered has the connection closed on it.
 */
export class RequestReader {
  private pending: Uint8Array = new Uint8Array(0);
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(
    socket: ITcpSocket,
    private readonly maxBuffered = DEFAULT_REQUEST_LIMITS.maxHeaderSize +
      DEFAULT_REQUEST_LIMITS.maxBodySize,
  ) {
    socket.onData((chunk) => {
      if (this.ended) return;
      if (this.pending.length + chunk.length > this.maxBuffered) {
        this.pending = new Uint8Array(0);
        this.failure = new HttpRequestParseError(
          "INPUT_OVERFLOW",
          `Peer sent more than ${this.maxBuffered} unread bytes`,
        );
        this.ended = true;
        socket.close();
      } else {
        this.pending = concat([this.pending, chunk]);
      }
      this.notify();
    });
    socket.onClose(() => {
      this.ended = true;
      this.notify();
    });
    socket.onError((err) => {
      this.failure = this.failure ?? err;
      this.ended = true;
      this.notify();
    });
  }

  async readHead(limits?: Partial<RequestLimits>): Promise<HttpRequestHead> {
    const { maxHeaderSize, timeoutMs } = { ...DEFAULT_REQUEST_LIMITS, ...limits };
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      // Blank lines before a request line are allowed (RFC 9112 §2.2).
      this.pending = this.pending.subarray(leadingCrlfLength(this.pending));

      const end = indexOfHeadEnd(this.pending);
      if (end > maxHeaderSize || (end === -1 && this.pending.length > maxHeaderSize)) {
        throw new HttpRequestParseError("HEADERS_TOO_LARGE", "Request headers too large");
      }
      if (end !== -1) {
        const head = parseRequestHead(this.pending.subarray(0, end));
        this.pending = this.pending.slice(end + HEAD_TERMINATOR_LENGTH);
        return head;
      }

      const started = this.pending.length > 0;
      if (this.ended) {
        throw this.failure ?? closedError(started);
      }
      if (!(await this.waitForInput(deadline))) {
        throw started
          ? new HttpRequestParseError("REQUEST_TIMEOUT", "Request head not received in time")
          : new HttpRequestParseError("IDLE_TIMEOUT", "Connection idle timed out");
      }
    }
  }

  /** Drop a request body the server has no use for. */
  async skipBody(length: number, limits?: Partial<RequestLimits>): Promise<void> {
    const { maxBodySize, timeoutMs } = { ...DEFAULT_REQUEST_LIMITS, ...limits };
    if (length > maxBodySize) {
      throw new HttpRequestParseError("BODY_TOO_LARGE", "Request body too large");
    }

    const deadline = Date.now() + timeoutMs;
    let remaining = length;
    while (remaining > 0) {
      if (this.pending.length > 0) {
        const take = Math.min(remaining, this.pending.length);
        this.pending = this.pending.slice(take);
        remaining -= take;
        continue;
      }
      if (this.ended) {
        throw this.failure ?? closedError(true);
      }
      if (!(await this.waitForInput(deadline))) {
        throw new HttpRequestParseError("REQUEST_TIMEOUT", "Request body not received in time");
      }
    }
  }

  /** Resolves true on new bytes or end of stream, false at the deadline. */
  private waitForInput(deadline: number): Promise<boolean> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve(false);
      }, remaining);
      this.wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function closedError(started: boolean): HttpRequestParseError {
  return started
    ? new HttpRequestParseError(
        "CONNECTION_CLOSED_INCOMPLETE",
        "Connection closed before request was complete",
      )
    : new HttpRequestParseError("CONNECTION_CLOSED", "Connection closed");
}
