export interface AccessLogEntry {
  remoteAddress: string
  method: string
  url: string
  httpVersion: string
  status: number
  bytes: number
}

/**
 * One line per request:
 * `127.0.0.1 "GET /index.html HTTP/1.1" 200 1234`
 */
export function formatAccessLogLine(entry: AccessLogEntry): string {
  // Request targets come straight off the wire; keep them on one line.
  const target = entry.url.replace(/[\x00-\x1f\x7f"]/g, (ch) =>
    `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`,
  )
  return `${entry.remoteAddress} "${entry.method} ${target} HTTP/${entry.httpVersion}" ${entry.status} ${entry.bytes}`
}
