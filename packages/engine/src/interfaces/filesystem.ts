/**
 * Abstract File System Interfaces
 *
 * The server only ever reads from its document root, so the surface is the
 * read side of a filesystem. Implementations reject with Node-style errors
 * that carry a `code` (ENOENT, ENOTDIR, EACCES, ...).
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /** Open a file for reading. */
  open(path: string): Promise<IFileHandle>

  /** Get file statistics, following symlinks. */
  stat(path: string): Promise<IFileStat>

  /** Read directory contents. Returns list of filenames (not full paths). */
  readdir(path: string): Promise<string[]>

  /** Canonical path with every symlink resolved. */
  realpath(path: string): Promise<string>
}
