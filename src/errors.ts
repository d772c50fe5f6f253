export type HttpErrorStatus = 400 | 403 | 404 | 405 | 413 | 500 | 503;

/** An error that is answered with an HTTP error response instead of propagating. */
export class HttpError extends Error {
  constructor(
    public readonly status: HttpErrorStatus,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class ProtocolError extends HttpError {
  constructor(status: 400 | 405, message: string) {
    super(status, message);
    this.name = "ProtocolError";
  }
}

export class LimitExceededError extends HttpError {
  constructor(status: 413 | 503, message: string) {
    super(status, message);
    this.name = "LimitExceededError";
  }
}

export class PathViolationError extends HttpError {
  constructor(public readonly requestPath: string) {
    super(403, `Path escapes the server root: ${requestPath}`);
    this.name = "PathViolationError";
  }
}

export class FileAccessError extends HttpError {
  constructor(
    public readonly filePath: string,
    public readonly failure: unknown,
  ) {
    super(500, `Failed to read ${filePath}: ${toErrorMessage(failure)}`);
    this.name = "FileAccessError";
  }
}

export type BindFailureReason = "in-use" | "privileged" | "invalid-port" | "unavailable" | "unknown";

export class BindError extends Error {
  constructor(
    public readonly reason: BindFailureReason,
    public readonly port: number,
    message: string,
  ) {
    super(message);
    this.name = "BindError";
  }
}

export class InvalidRootError extends Error {
  constructor(
    public readonly directory: string,
    message: string,
  ) {
    super(message);
    this.name = "InvalidRootError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function toErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }

  return undefined;
}
