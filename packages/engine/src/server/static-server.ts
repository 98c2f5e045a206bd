import * as path from 'node:path'
import type { IFileStat, IFileSystem } from '../interfaces/filesystem.js'
import type { ITcpSocket } from '../interfaces/socket.js'
import type { HttpRequest, ResponseOutcome } from '../http/types.js'
import { statusText } from '../http/types.js'
import {
  ResponseInterruptedError,
  sendFileResponse,
  sendResponse,
} from '../http/response-writer.js'
import { getMimeType } from './mime-types.js'
import { readDirectoryEntries, renderDirectoryListing } from './directory-listing.js'
import { isWithinRoot, resolveRequestPath } from './path-resolver.js'
import { fromString } from '../utils/buffer.js'
import { errorCode } from '../utils/errors.js'
import type { Logger } from '../logging/logger.js'

export const ALLOWED_METHODS = ['GET', 'HEAD'] as const

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG'])

export interface StaticServerOptions {
  root: string
  fs: IFileSystem
  indexFilename: string
  directoryListing: boolean
  /** Passed to `sendFileResponse` for every file body. */
  writeTimeoutMs?: number
  logger?: Logger
}

export interface RequestContext {
  /** Value of the Connection header for this response. */
  connectionHeader: 'keep-alive' | 'close'
}

/**
 * Answers one parsed request from the document root. Never throws: every
 * failure becomes a status code, or an interrupted outcome once the head is
 * already out.
 */
export class StaticServer {
  private root: string
  private fs: IFileSystem
  private indexFilename: string
  private directoryListing: boolean
  private writeTimeoutMs?: number
  private logger?: Logger

  constructor(options: StaticServerOptions) {
    this.root = path.resolve(options.root)
    this.fs = options.fs
    this.indexFilename = options.indexFilename
    this.directoryListing = options.directoryListing
    this.writeTimeoutMs = options.writeTimeoutMs
    this.logger = options.logger
  }

  async handleRequest(
    socket: ITcpSocket,
    request: HttpRequest,
    context: RequestContext,
  ): Promise<ResponseOutcome> {
    const headers = new Map<string, string>()
    headers.set('server', 'docroot')
    headers.set('date', new Date().toUTCString())
    headers.set('connection', context.connectionHeader)

    const headOnly = request.method === 'HEAD'

    if (request.method !== 'GET' && request.method !== 'HEAD') {
      headers.set('allow', ALLOWED_METHODS.join(', '))
      return this.sendStatus(socket, 405, headers, false)
    }

    const resolved = resolveRequestPath(this.root, request.url)
    if (!resolved.ok) {
      this.logger?.debug(`Rejected ${JSON.stringify(request.url)}: ${resolved.reason}`)
      return this.sendStatus(socket, resolved.status, headers, headOnly)
    }

    try {
      const stat = await this.statOrNull(resolved.fsPath)
      if (!stat) {
        return this.sendStatus(socket, 404, headers, headOnly)
      }

      if (!(await this.isContained(resolved.fsPath))) {
        this.logger?.warn(`Refusing ${resolved.urlPath}: resolves outside document root`)
        return this.sendStatus(socket, 403, headers, headOnly)
      }

      if (stat.isDirectory) {
        if (!resolved.trailingSlash) {
          headers.set('location', `${resolved.rawPath}/${resolved.search}`)
          return this.sendStatus(socket, 301, headers, headOnly)
        }
        return await this.serveDirectory(socket, request, resolved.fsPath, resolved.urlPath, headers)
      }

      // A file never has children, so "/file.txt/" names nothing.
      if (stat.isFile && !resolved.trailingSlash) {
        return await this.serveFile(socket, request, resolved.fsPath, stat, headers)
      }

      return this.sendStatus(socket, 404, headers, headOnly)
    } catch (err) {
      if (err instanceof ResponseInterruptedError) {
        this.logger?.debug(`Abandoned ${resolved.urlPath}: ${err.reason.message}`)
        return { status: 200, bytes: err.bytesSent, interrupted: true }
      }

      this.logger?.error(`Error serving ${resolved.urlPath}:`, err)
      headers.delete('content-type')
      headers.delete('last-modified')
      headers.delete('etag')
      return this.sendStatus(socket, 500, headers, headOnly)
    }
  }

  private async serveDirectory(
    socket: ITcpSocket,
    request: HttpRequest,
    dirPath: string,
    urlPath: string,
    headers: Map<string, string>,
  ): Promise<ResponseOutcome> {
    const headOnly = request.method === 'HEAD'
    const indexPath = path.join(dirPath, this.indexFilename)
    const indexStat = await this.statOrNull(indexPath)

    if (indexStat?.isFile) {
      if (!(await this.isContained(indexPath))) {
        this.logger?.warn(`Refusing ${urlPath}${this.indexFilename}: resolves outside document root`)
        return this.sendStatus(socket, 403, headers, headOnly)
      }
      return this.serveFile(socket, request, indexPath, indexStat, headers)
    }

    if (!this.directoryListing) {
      return this.sendStatus(socket, 404, headers, headOnly)
    }

    const entries = await readDirectoryEntries(this.fs, dirPath)
    headers.set('content-type', 'text/html; charset=utf-8')
    const bytes = sendResponse(
      socket,
      {
        status: 200,
        statusText: statusText(200),
        headers,
        body: fromString(renderDirectoryListing(urlPath, entries)),
      },
      { headOnly },
    )
    return { status: 200, bytes }
  }

  private async serveFile(
    socket: ITcpSocket,
    request: HttpRequest,
    filePath: string,
    stat: IFileStat,
    headers: Map<string, string>,
  ): Promise<ResponseOutcome> {
    const etag = `"${stat.mtime.getTime().toString(36)}-${stat.size.toString(36)}"`
    headers.set('content-type', getMimeType(filePath))
    headers.set('last-modified', stat.mtime.toUTCString())
    headers.set('etag', etag)

    if (isNotModified(request.headers, etag, stat.mtime)) {
      // A 304 may only carry the Content-Length a 200 would have had.
      headers.set('content-length', String(stat.size))
      sendResponse(socket, { status: 304, statusText: statusText(304), headers }, { headOnly: true })
      return { status: 304, bytes: 0 }
    }

    if (request.method === 'HEAD') {
      headers.set('content-length', String(stat.size))
      sendResponse(socket, { status: 200, statusText: statusText(200), headers }, { headOnly: true })
      return { status: 200, bytes: 0 }
    }

    const handle = await this.fs.open(filePath)
    try {
      const bytes = await sendFileResponse(
        socket,
        { status: 200, statusText: statusText(200), headers },
        handle,
        stat.size,
        { writeTimeoutMs: this.writeTimeoutMs },
      )
      return { status: 200, bytes }
    } finally {
      // The response is already decided; a failed close must not replace it.
      await handle.close().catch((err: unknown) => {
        this.logger?.warn(`Failed to close ${filePath}:`, err)
      })
    }
  }

  private sendStatus(
    socket: ITcpSocket,
    status: number,
    headers: Map<string, string>,
    headOnly: boolean,
  ): ResponseOutcome {
    const text = statusText(status)
    headers.set('content-type', 'text/plain; charset=utf-8')
    const bytes = sendResponse(
      socket,
      { status, statusText: text, headers, body: fromString(text) },
      { headOnly },
    )
    return { status, bytes }
  }

  private async statOrNull(fsPath: string): Promise<IFileStat | null> {
    try {
      return await this.fs.stat(fsPath)
    } catch (err) {
      const code = errorCode(err)
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        return null
      }
      throw err
    }
  }

  /** Symlinks may point anywhere; compare real paths, not requested ones. */
  private async isContained(fsPath: string): Promise<boolean> {
    const [realRoot, realTarget] = await Promise.all([
      this.fs.realpath(this.root),
      this.fs.realpath(fsPath),
    ])
    return isWithinRoot(realRoot, realTarget)
  }
}

function isNotModified(
  requestHeaders: Map<string, string>,
  etag: string,
  mtime: Date,
): boolean {
  const ifNoneMatch = requestHeaders.get('if-none-match')
  if (ifNoneMatch !== undefined) {
    const tags = ifNoneMatch.split(',').map((tag) => tag.trim().replace(/^W\//, ''))
    return tags.includes('*') || tags.includes(etag)
  }

  const ifModifiedSince = requestHeaders.get('if-modified-since')
  if (ifModifiedSince !== undefined) {
    const since = Date.parse(ifModifiedSince)
    // HTTP dates have one-second resolution
    return !Number.isNaN(since) && Math.floor(mtime.getTime() / 1000) * 1000 <= since
  }

  return false
}
