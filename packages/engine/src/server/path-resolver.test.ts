import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { isWithinRoot, resolveRequestPath } from "./path-resolver.js";

const ROOT = path.resolve("/srv/site");

describe("resolveRequestPath", () => {
  it("maps a plain path under the root", () => {
    expect(resolveRequestPath(ROOT, "/docs/a.txt")).toEqual({
      ok: true,
      urlPath: "/docs/a.txt",
      fsPath: path.join(ROOT, "docs", "a.txt"),
      rawPath: "/docs/a.txt",
      search: "",
      trailingSlash: false,
    });
  });

  it("maps / to the root itself", () => {
    const resolved = resolveRequestPath(ROOT, "/");
    expect(resolved).toMatchObject({
      ok: true,
      urlPath: "/",
      fsPath: ROOT,
      trailingSlash: true,
    });
  });

  it("splits off the query and drops the fragment", () => {
    const resolved = resolveRequestPath(ROOT, "/docs?x=1&y=2#top");
    expect(resolved).toMatchObject({
      ok: true,
      rawPath: "/docs",
      search: "?x=1&y=2",
      urlPath: "/docs",
    });
  });

  it("decodes percent-escapes", () => {
    const resolved = resolveRequestPath(ROOT, "/my%20file.txt");
    expect(resolved).toMatchObject({
      ok: true,
      urlPath: "/my file.txt",
      fsPath: path.join(ROOT, "my file.txt"),
    });
  });

  it("collapses dot segments and repeated slashes that stay inside", () => {
    const resolved = resolveRequestPath(ROOT, "//docs/./old/../new/");
    expect(resolved).toMatchObject({
      ok: true,
      urlPath: "/docs/new/",
      fsPath: path.join(ROOT, "docs", "new"),
      trailingSlash: true,
    });
  });

  it("takes the path of an absolute-form target", () => {
    const resolved = resolveRequestPath(ROOT, "http://example.test/a.txt?q");
    expect(resolved).toMatchObject({
      ok: true,
      urlPath: "/a.txt",
      search: "?q",
    });
  });

  it.each([
    "/..",
    "/../../etc/passwd",
    "/docs/../../secret",
    "/%2e%2e/secret",
    "/%2E%2E%2Fsecret",
    "/..%2f..%2fetc%2fpasswd",
  ])("refuses %s with 403", (target) => {
    expect(resolveRequestPath(ROOT, target)).toEqual({
      ok: false,
      status: 403,
      reason: "Path escapes document root",
    });
  });

  it.each([
    ["*", "Request target is not a path"],
    ["docs/a.txt", "Request target is not a path"],
    ["/%E0%A4%A", "Malformed percent-encoding"],
    ["/bad%zz", "Malformed percent-encoding"],
    ["/a%00.txt", "NUL byte in path"],
  ])("rejects %s with 400", (target, reason) => {
    expect(resolveRequestPath(ROOT, target)).toEqual({
      ok: false,
      status: 400,
      reason,
    });
  });
});

describe("isWithinRoot", () => {
  it("accepts the root and its descendants", () => {
    expect(isWithinRoot(ROOT, ROOT)).toBe(true);
    expect(isWithinRoot(ROOT, path.join(ROOT, "a", "b"))).toBe(true);
    expect(isWithinRoot(ROOT, path.join(ROOT, "..foo"))).toBe(true);
  });

  it("rejects siblings that share a prefix and parents", () => {
    expect(isWithinRoot(ROOT, `${ROOT}-other`)).toBe(false);
    expect(isWithinRoot(ROOT, path.dirname(ROOT))).toBe(false);
    expect(isWithinRoot(ROOT, path.resolve("/etc/passwd"))).toBe(false);
  });
});
