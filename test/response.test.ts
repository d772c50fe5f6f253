import { describe, expect, it } from "vitest";

import {
  buildDirectoryListing,
  renderErrorResponse,
  renderFileResponse,
  renderRedirectResponse,
  renderResponse,
} from "../src/response.js";

describe("response rendering", () => {
  it("serializes a file response with exact headers", () => {
    const response = renderFileResponse("text/plain; charset=utf-8", Buffer.from("hello\n", "utf8"));

    expect(response.toString("utf8")).toBe(
      [
        "HTTP/1.1 200 OK",
        "Content-Type: text/plain; charset=utf-8",
        "Content-Length: 6",
        "Connection: close",
        "",
        "hello\n",
      ].join("\r\n"),
    );
  });

  it("adds nosniff to HTML file responses only", () => {
    expect(renderFileResponse("text/html; charset=utf-8", Buffer.alloc(0)).toString("utf8")).toContain("X-Content-Type-Options: nosniff\r\n");
    expect(renderFileResponse("image/png", Buffer.alloc(0)).toString("utf8")).not.toContain("X-Content-Type-Options");
  });

  it("counts body bytes rather than characters", () => {
    const response = renderFileResponse("text/plain; charset=utf-8", Buffer.from("é", "utf8"));

    expect(response.toString("utf8")).toContain("Content-Length: 2\r\n");
  });

  it("serializes a redirect with an empty body and sanitized location", () => {
    expect(renderRedirectResponse("/docs/\r\nX-Injected: 1").toString("utf8")).toBe(
      ["HTTP/1.1 301 Moved Permanently", "Location: /docs/X-Injected: 1", "Content-Length: 0", "Connection: close", "", ""].join("\r\n"),
    );
  });

  it("serializes error responses with the fixed body", () => {
    const body = "<html><body><h1>404 Not Found</h1></body></html>";

    expect(renderErrorResponse(404).toString("utf8")).toBe(
      [
        "HTTP/1.1 404 Not Found",
        "Content-Type: text/html; charset=utf-8",
        `Content-Length: ${body.length}`,
        "Connection: close",
        "X-Content-Type-Options: nosniff",
        "X-Frame-Options: DENY",
        "",
        body,
      ].join("\r\n"),
    );
  });

  it("advertises the allowed method on 405", () => {
    const text = renderErrorResponse(405).toString("utf8");

    expect(text.startsWith("HTTP/1.1 405 Method Not Allowed\r\n")).toBe(true);
    expect(text).toContain("Connection: close\r\nAllow: GET\r\n");
  });

  it("uses the status phrases for limit errors", () => {
    expect(renderErrorResponse(413).toString("utf8")).toContain("<h1>413 Payload Too Large</h1>");
    expect(renderErrorResponse(503).toString("utf8")).toContain("<h1>503 Service Unavailable</h1>");
  });

  it("dispatches resolved responses by kind", () => {
    expect(renderResponse({ kind: "error", status: 403 }).toString("utf8").split("\r\n")[0]).toBe("HTTP/1.1 403 Forbidden");
    expect(renderResponse({ kind: "redirect", location: "/a/" }).toString("utf8").split("\r\n")[1]).toBe("Location: /a/");
    expect(renderResponse({ kind: "listing", requestPath: "/", entries: [] }).toString("utf8")).toContain("X-Frame-Options: DENY\r\n");
  });
});

describe("buildDirectoryListing", () => {
  it("sorts entries, marks directories and encodes links", () => {
    const html = buildDirectoryListing("/Study Room/", [
      { name: "zeta.txt", isDirectory: false },
      { name: "Alpha", isDirectory: true },
      { name: "b&c's <draft>.md", isDirectory: false },
    ]);
    const items = html.split("\n").filter((line) => line.startsWith("    <li"));

    expect(items).toEqual([
      '    <li class="entry entry-up"><a href="/">../</a></li>',
      '    <li class="entry entry-dir"><a href="/Study%20Room/Alpha/">Alpha/</a></li>',
      '    <li class="entry entry-file"><a href="/Study%20Room/b&amp;c&#39;s%20%3Cdraft%3E.md">b&amp;c&#39;s &lt;draft&gt;.md</a></li>',
      '    <li class="entry entry-file"><a href="/Study%20Room/zeta.txt">zeta.txt</a></li>',
    ]);
    expect(html).toContain("<title>Index of /Study Room/</title>");
    expect(html).toContain("<h1>Index of /Study Room/</h1>");
  });

  it("omits the parent link at the root", () => {
    const html = buildDirectoryListing("/", [{ name: "a.txt", isDirectory: false }]);

    expect(html).not.toContain("entry-up");
    expect(html).toContain('<a href="/a.txt">a.txt</a>');
  });

  it("links nested directories to their parent", () => {
    const html = buildDirectoryListing("/a/b/", []);

    expect(html).toContain('<li class="entry entry-up"><a href="/a/">../</a></li>');
  });

  it("escapes markup in the directory title", () => {
    expect(buildDirectoryListing("/<x>/", [])).toContain("<title>Index of /&lt;x&gt;/</title>");
  });
});
