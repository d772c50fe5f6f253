import path from "node:path";

import { lookup as lookupMimeType } from "mime-types";

import type { HttpErrorStatus } from "./errors.js";

export type HttpStatus = 200 | 301 | HttpErrorStatus;

export const STATUS_MESSAGES: Record<HttpStatus, string> = {
  200: "OK",
  301: "Moved Permanently",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  413: "Payload Too Large",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

const SERVED_EXTENSIONS = new Set(["html", "htm", "css", "js", "json", "png", "jpg", "jpeg", "gif", "svg", "pdf", "txt", "md"]);
const FALLBACK_CONTENT_TYPE = "application/octet-stream";

// RFC 3986 pchar plus "/", the set a path may carry unescaped.
const PATH_SAFE_CHARACTER = /^[A-Za-z0-9\-._~!$&'()*+,;=:@/]$/;
const HEADER_BREAKING_CHARACTERS = /[\r\n\0]/g;

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

export function percentEncodePath(value: string): string {
  return Array.from(value, (character) => (PATH_SAFE_CHARACTER.test(character) ? character : encodeURIComponent(character))).join("");
}

export function sanitizeHeaderValue(value: string): string {
  return value.replace(HEADER_BREAKING_CHARACTERS, "");
}

export function resolveContentType(filePath: string): string {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  if (!SERVED_EXTENSIONS.has(extension)) {
    return FALLBACK_CONTENT_TYPE;
  }

  const detectedType = lookupMimeType(extension);
  if (typeof detectedType !== "string") {
    return FALLBACK_CONTENT_TYPE;
  }

  return detectedType.startsWith("text/") ? `${detectedType}; charset=utf-8` : detectedType;
}

export function isHtmlContentType(contentType: string): boolean {
  return contentType === "text/html" || contentType.startsWith("text/html;");
}
