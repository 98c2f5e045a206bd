import * as path from "node:path";

export type PathResolution =
  | {
      ok: true;
      /** Decoded, canonical URL path ("/", "/docs/", "/docs/a.txt"). */
      urlPath: string;
      /** Absolute filesystem path, always inside the root. */
      fsPath: string;
      /** Path component exactly as received, for redirects. */
      rawPath: string;
      /** Query string including the leading "?", or "". */
      search: string;
      trailingSlash: boolean;
    }
  | {
      ok: false;
      status: 400 | 403;
      reason: string;
    };

const ABSOLUTE_FORM = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i;

/**
 * Map a request target onto the document root.
 *
 * Dot segments are resolved before anything touches the filesystem. A `..`
 * that would climb above the root is rejected outright rather than clamped,
 * and the joined result is checked for containment once more.
 */
export function resolveRequestPath(
  root: string,
  target: string,
): PathResolution {
  const absoluteRoot = path.resolve(root);

  let reference = target;
  const absoluteForm = ABSOLUTE_FORM.exec(reference);
  if (absoluteForm) {
    reference = reference.slice(absoluteForm[0].length) || "/";
  }

  if (!reference.startsWith("/")) {
    return { ok: false, status: 400, reason: "Request target is not a path" };
  }

  const [withoutFragment] = reference.split("#");
  const queryStart = withoutFragment.indexOf("?");
  const rawPath =
    queryStart === -1 ? withoutFragment : withoutFragment.slice(0, queryStart);
  const search = queryStart === -1 ? "" : withoutFragment.slice(queryStart);

  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return { ok: false, status: 400, reason: "Malformed percent-encoding" };
  }

  if (decoded.includes("\0")) {
    return { ok: false, status: 400, reason: "NUL byte in path" };
  }

  const segments: string[] = [];
  for (const segment of decoded.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (segments.length === 0) {
        return { ok: false, status: 403, reason: "Path escapes document root" };
      }
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  const fsPath = path.join(absoluteRoot, ...segments);
  if (!isWithinRoot(absoluteRoot, fsPath)) {
    return { ok: false, status: 403, reason: "Path escapes document root" };
  }

  const trailingSlash = decoded.endsWith("/");
  const joined = segments.join("/");
  const urlPath =
    segments.length === 0 ? "/" : `/${joined}${trailingSlash ? "/" : ""}`;

  return { ok: true, urlPath, fsPath, rawPath, search, trailingSlash };
}

/** True when `candidate` is `root` itself or a descendant of it. */
export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
}
