import { readFileSync } from "node:fs";
import * as path from "node:path";

export const DEFAULT_MIME_TYPE = "application/octet-stream";

// Lives at the package root so src/ and dist/ resolve it the same way.
const MIME_TYPES_URL = new URL("../../mime-types.json", import.meta.url);

function loadMimeTypes(): ReadonlyMap<string, string> {
  const parsed: unknown = JSON.parse(readFileSync(MIME_TYPES_URL, "utf8"));
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Invalid MIME table in ${MIME_TYPES_URL.pathname}`);
  }

  const table = new Map<string, string>();
  for (const [ext, type] of Object.entries(parsed)) {
    if (typeof type !== "string") {
      throw new Error(`Invalid MIME type for ${ext}`);
    }
    table.set(ext.toLowerCase(), type);
  }
  return table;
}

const MIME_TYPES = loadMimeTypes();

/** Content-Type for a file, from its extension. */
export function getMimeType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return MIME_TYPES.get(ext) ?? DEFAULT_MIME_TYPE;
}
