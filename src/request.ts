import { ProtocolError } from "./errors.js";

export interface HttpRequest {
  method: "GET";
  target: string;
  /** Percent-decoded path component of the target, always starting with "/". */
  path: string;
}

interface RequestTarget {
  path: string;
  query: string | undefined;
  fragment: string | undefined;
}

const ABSOLUTE_FORM_TARGET = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;
const LEADING_SLASHES = /^\/+/;

export function splitRequestTarget(target: string): RequestTarget {
  let remainder = target;
  let fragment: string | undefined;
  let query: string | undefined;

  const fragmentIndex = remainder.indexOf("#");
  if (fragmentIndex !== -1) {
    fragment = remainder.slice(fragmentIndex + 1);
    remainder = remainder.slice(0, fragmentIndex);
  }

  const queryIndex = remainder.indexOf("?");
  if (queryIndex !== -1) {
    query = remainder.slice(queryIndex + 1);
    remainder = remainder.slice(0, queryIndex);
  }

  if (ABSOLUTE_FORM_TARGET.test(remainder)) {
    try {
      remainder = new URL(remainder).pathname;
    } catch {
      throw new ProtocolError(400, `Malformed request target: ${target}`);
    }
  }

  return { path: remainder, query, fragment };
}

export function decodeRequestPath(rawPath: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    throw new ProtocolError(400, `Malformed percent-encoding in ${rawPath}`);
  }

  if (decoded.length === 0) {
    return "/";
  }

  // A leading "//" would turn redirect locations into protocol-relative URLs.
  return decoded.startsWith("/") ? decoded.replace(LEADING_SLASHES, "/") : `/${decoded}`;
}

export function parseRequest(headerBlock: string): HttpRequest {
  const requestLine = headerBlock.split("\r\n", 1)[0] ?? "";
  if (requestLine.trim().length === 0) {
    throw new ProtocolError(400, "Missing request line");
  }

  const parts = requestLine.split(" ").filter((part) => part.length > 0);
  const [method, target, version] = parts;
  if (method === undefined || target === undefined) {
    throw new ProtocolError(400, "Missing request target");
  }

  if (method !== "GET" || parts.length > 3 || (version !== undefined && !version.startsWith("HTTP/"))) {
    throw new ProtocolError(405, `Unsupported request line: ${requestLine}`);
  }

  const { path } = splitRequestTarget(target);
  return {
    method,
    target,
    path: decodeRequestPath(path),
  };
}
