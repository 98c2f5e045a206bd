/**
 * Read the Node-style `code` property (ENOENT, EADDRINUSE, ...) off an
 * unknown thrown value.
 */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
