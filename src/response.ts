import path from "node:path";

import { type HttpErrorStatus } from "./errors.js";
import {
  escapeHtml,
  type HttpStatus,
  isHtmlContentType,
  percentEncodePath,
  sanitizeHeaderValue,
  STATUS_MESSAGES,
} from "./http-utils.js";

export interface ListingEntry {
  name: string;
  isDirectory: boolean;
}

export type ResolvedResponse =
  | { kind: "file"; filePath: string; contentType: string; body: Buffer }
  | { kind: "listing"; requestPath: string; entries: ListingEntry[] }
  | { kind: "redirect"; location: string }
  | { kind: "error"; status: HttpErrorStatus };

const HTML_CONTENT_TYPE = "text/html; charset=utf-8";

interface ResponseHead {
  status: HttpStatus;
  location?: string;
  contentType?: string;
  allow?: string;
  frameDenied?: boolean;
}

function serializeResponse(head: ResponseHead, body: Buffer): Buffer {
  const lines = [`HTTP/1.1 ${head.status} ${STATUS_MESSAGES[head.status]}`];
  if (head.location !== undefined) {
    lines.push(`Location: ${sanitizeHeaderValue(head.location)}`);
  }

  if (head.contentType !== undefined) {
    lines.push(`Content-Type: ${head.contentType}`);
  }

  lines.push(`Content-Length: ${body.length}`, "Connection: close");
  if (head.allow !== undefined) {
    lines.push(`Allow: ${head.allow}`);
  }

  if (head.contentType !== undefined && isHtmlContentType(head.contentType)) {
    lines.push("X-Content-Type-Options: nosniff");
  }

  if (head.frameDenied === true) {
    lines.push("X-Frame-Options: DENY");
  }

  return Buffer.concat([Buffer.from(`${lines.join("\r\n")}\r\n\r\n`, "utf8"), body]);
}

export function renderFileResponse(contentType: string, body: Buffer): Buffer {
  return serializeResponse({ status: 200, contentType }, body);
}

export function renderRedirectResponse(location: string): Buffer {
  return serializeResponse({ status: 301, location }, Buffer.alloc(0));
}

export function renderErrorResponse(status: HttpErrorStatus): Buffer {
  const body = `<html><body><h1>${status} ${escapeHtml(STATUS_MESSAGES[status])}</h1></body></html>`;
  return serializeResponse(
    {
      status,
      contentType: HTML_CONTENT_TYPE,
      allow: status === 405 ? "GET" : undefined,
      frameDenied: true,
    },
    Buffer.from(body, "utf8"),
  );
}

export function compareEntryNames(left: ListingEntry, right: ListingEntry): number {
  if (left.name === right.name) {
    return 0;
  }

  return left.name < right.name ? -1 : 1;
}

function toParentPath(requestPath: string): string {
  const parent = path.posix.dirname(requestPath.endsWith("/") ? requestPath.slice(0, -1) : requestPath);
  return parent.endsWith("/") ? parent : `${parent}/`;
}

function joinRequestPath(requestPath: string, name: string): string {
  return requestPath.endsWith("/") ? `${requestPath}${name}` : `${requestPath}/${name}`;
}

export function buildDirectoryListing(requestPath: string, entries: ListingEntry[]): string {
  const listItems: string[] = [];
  if (requestPath !== "/") {
    const parentHref = percentEncodePath(toParentPath(requestPath));
    listItems.push(`    <li class="entry entry-up"><a href="${escapeHtml(parentHref)}">../</a></li>`);
  }

  for (const entry of [...entries].sort(compareEntryNames)) {
    const displayName = entry.isDirectory ? `${entry.name}/` : entry.name;
    const href = percentEncodePath(joinRequestPath(requestPath, displayName));
    const entryType = entry.isDirectory ? "dir" : "file";
    listItems.push(`    <li class="entry entry-${entryType}"><a href="${escapeHtml(href)}">${escapeHtml(displayName)}</a></li>`);
  }

  const title = escapeHtml(requestPath);
  return [
    "<!doctype html>",
    "<html lang=\"en\">",
    "<head>",
    "  <meta charset=\"utf-8\">",
    `  <title>Index of ${title}</title>`,
    "  <meta name=\"viewport\" content=\"width=device-width, initial-scale=1\">",
    "  <style>",
    "    body { font-family: -apple-system, \"Segoe UI\", Helvetica, Arial, sans-serif; padding: 20px; }",
    "    a { text-decoration: none; color: #007aff; }",
    "    a:hover { text-decoration: underline; }",
    "    li { padding: 4px 0; }",
    "  </style>",
    "</head>",
    "<body>",
    `  <h1>Index of ${title}</h1>`,
    "  <ul>",
    ...listItems,
    "  </ul>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export function renderListingResponse(requestPath: string, entries: ListingEntry[]): Buffer {
  return serializeResponse(
    { status: 200, contentType: HTML_CONTENT_TYPE, frameDenied: true },
    Buffer.from(buildDirectoryListing(requestPath, entries), "utf8"),
  );
}

export function renderResponse(resolved: ResolvedResponse): Buffer {
  switch (resolved.kind) {
    case "file":
      return renderFileResponse(resolved.contentType, resolved.body);
    case "listing":
      return renderListingResponse(resolved.requestPath, resolved.entries);
    case "redirect":
      return renderRedirectResponse(resolved.location);
    case "error":
      return renderErrorResponse(resolved.status);
  }
}
