import * as fs from "node:fs/promises";
import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../../interfaces/filesystem.js";

/**
 * The document root on local disk. Errors from node:fs pass through
 * untouched, `code` included, for the server to map to a status.
 */
export class NodeFileSystem implements IFileSystem {
  open(filePath: string): Promise<IFileHandle> {
    // fs.FileHandle already has the read/close shape the server uses
    return fs.open(filePath, "r");
  }

  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(filePath);
    const isDirectory = stats.isDirectory();
    return {
      size: isDirectory ? 0 : stats.size,
      mtime: stats.mtime,
      isDirectory,
      isFile: stats.isFile(),
    };
  }

  readdir(dirPath: string): Promise<string[]> {
    return fs.readdir(dirPath);
  }

  realpath(filePath: string): Promise<string> {
    return fs.realpath(filePath);
  }
}
