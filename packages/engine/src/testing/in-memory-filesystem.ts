import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../interfaces/filesystem.js";
import { fromString } from "../utils/buffer.js";

export type FileSystemOperation =
  | "open"
  | "stat"
  | "readdir"
  | "realpath"
  | "read"
  | "close";

type MemoryNode =
  | { kind: "file"; data: Uint8Array; mtime: Date }
  | { kind: "directory"; mtime: Date; children: Map<string, MemoryNode> };

type MemoryDirectory = Extract<MemoryNode, { kind: "directory" }>;

function fsError(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

function segmentsOf(path: string): string[] {
  const segments: string[] = [];
  for (const part of path.replace(/\\/g, "/").split("/")) {
    if (part === "" || part === ".") continue;
    if (part === "..") segments.pop();
    else segments.push(part);
  }
  return segments;
}

function toPath(segments: string[]): string {
  return `/${segments.join("/")}`;
}

/**
 * Read-only filesystem for tests, seeded through `writeFile`/`mkdir`.
 * There are no symlinks, so `realpath` only normalizes. Faults can be
 * injected per path and operation.
 */
export class InMemoryFileSystem implements IFileSystem {
  /** Handles opened and not yet closed. */
  openHandles = 0;

  private readonly root: MemoryDirectory = {
    kind: "directory",
    mtime: new Date(),
    children: new Map(),
  };
  private readonly faults = new Map<string, string>();

  async open(path: string): Promise<IFileHandle> {
    const segments = segmentsOf(path);
    const normalized = toPath(segments);
    this.failIfInjected("open", normalized);

    const node = this.lookup(segments);
    if (node.kind === "directory") {
      throw fsError("EISDIR", `illegal operation on a directory: ${normalized}`);
    }

    this.openHandles++;
    let open = true;
    return {
      read: async (buffer, offset, length, position) => {
        if (!open) throw new Error("File handle is closed");
        this.failIfInjected("read", normalized);
        const chunk = node.data.subarray(position, position + length);
        buffer.set(chunk, offset);
        return { bytesRead: chunk.length };
      },
      close: async () => {
        if (!open) return;
        open = false;
        this.openHandles--;
        this.failIfInjected("close", normalized);
      },
    };
  }

  async stat(path: string): Promise<IFileStat> {
    const segments = segmentsOf(path);
    this.failIfInjected("stat", toPath(segments));

    const node = this.lookup(segments);
    const isFile = node.kind === "file";
    return {
      size: isFile ? node.data.length : 0,
      mtime: new Date(node.mtime.getTime()),
      isDirectory: !isFile,
      isFile,
    };
  }

  async readdir(path: string): Promise<string[]> {
    const segments = segmentsOf(path);
    const normalized = toPath(segments);
    this.failIfInjected("readdir", normalized);

    const node = this.lookup(segments);
    if (node.kind !== "directory") {
      throw fsError("ENOTDIR", `not a directory: ${normalized}`);
    }
    return [...node.children.keys()];
  }

  async realpath(path: string): Promise<string> {
    const segments = segmentsOf(path);
    const normalized = toPath(segments);
    this.failIfInjected("realpath", normalized);
    this.lookup(segments);
    return normalized;
  }

  async mkdir(path: string): Promise<void> {
    this.directoryAt(segmentsOf(path));
  }

  async writeFile(
    path: string,
    data: Uint8Array | string,
    mtime: Date = new Date(),
  ): Promise<void> {
    const segments = segmentsOf(path);
    const name = segments.pop();
    if (name === undefined) {
      throw fsError("EISDIR", "illegal operation on a directory: /");
    }
    const bytes = typeof data === "string" ? fromString(data) : data.slice();
    this.directoryAt(segments).children.set(name, { kind: "file", data: bytes, mtime });
  }

  /** Make `operation` on `path` reject with a Node-style error `code`. */
  injectFault(path: string, operation: FileSystemOperation, code: string): void {
    this.faults.set(`${operation} ${toPath(segmentsOf(path))}`, code);
  }

  private failIfInjected(operation: FileSystemOperation, path: string): void {
    const code = this.faults.get(`${operation} ${path}`);
    if (code !== undefined) {
      throw fsError(code, `${operation} failed: ${path}`);
    }
  }

  private lookup(segments: string[]): MemoryNode {
    let node: MemoryNode = this.root;
    for (const [i, segment] of segments.entries()) {
      if (node.kind !== "directory") {
        throw fsError("ENOTDIR", `not a directory: ${toPath(segments.slice(0, i))}`);
      }
      const child: MemoryNode | undefined = node.children.get(segment);
      if (!child) {
        throw fsError("ENOENT", `no such file or directory: ${toPath(segments)}`);
      }
      node = child;
    }
    return node;
  }

  /** Walks to `segments`, creating missing directories on the way. */
  private directoryAt(segments: string[]): MemoryDirectory {
    let dir = this.root;
    for (const [i, segment] of segments.entries()) {
      let child: MemoryNode | undefined = dir.children.get(segment);
      if (child === undefined) {
        child = { kind: "directory", mtime: new Date(), children: new Map() };
        dir.children.set(segment, child);
      }
      if (child.kind === "file") {
        throw fsError(
          "ENOTDIR",
          `file exists where directory expected: ${toPath(segments.slice(0, i + 1))}`,
        );
      }
      dir = child;
    }
    return dir;
  }
}
