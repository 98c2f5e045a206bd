import { describe, expect, it } from 'vitest'
import { formatAccessLogLine } from './access-log.js'

describe('formatAccessLogLine', () => {
  it('formats remote, request line, status and bytes', () => {
    expect(
      formatAccessLogLine({
        remoteAddress: '127.0.0.1',
        method: 'GET',
        url: '/index.html',
        httpVersion: '1.1',
        status: 200,
        bytes: 1234,
      }),
    ).toBe('127.0.0.1 "GET /index.html HTTP/1.1" 200 1234')
  })

  it('escapes quotes and control characters in the target', () => {
    expect(
      formatAccessLogLine({
        remoteAddress: '::1',
        method: 'HEAD',
        url: '/a"b\nc',
        httpVersion: '1.0',
        status: 404,
        bytes: 0,
      }),
    ).toBe('::1 "HEAD /a\\x22b\\x0ac HTTP/1.0" 404 0')
  })
})
