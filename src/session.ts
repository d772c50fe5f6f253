import { type Socket } from "node:net";

import { HttpError, LimitExceededError, ProtocolError, toErrorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { parseRequest } from "./request.js";
import { renderErrorResponse, renderResponse } from "./response.js";
import { resolveRequest } from "./routes.js";
import { type PathSandbox } from "./sandbox.js";

const HEADER_TERMINATOR = Buffer.from("\r\n\r\n", "latin1");

export type SessionCloseReason = "response-sent" | "deadline" | "socket-error" | "server-stopped" | "peer-closed";

export interface SessionContext {
  sandbox: PathSandbox;
  requestTimeoutMs: number;
  maxHeaderBytes: number;
  logger: Logger;
  onClose: (sessionId: number, reason: SessionCloseReason) => void;
}

type SessionPhase = "framing" | "responding" | "closed";

/**
 * One accepted socket: frames a single request, answers it, and closes.
 */
export class ConnectionSession {
  private buffer = Buffer.alloc(0);
  private phase: SessionPhase = "framing";
  private deadline: NodeJS.Timeout | undefined;

  public constructor(
    public readonly id: number,
    private readonly socket: Socket,
    private readonly context: SessionContext,
  ) {}

  public get isClosed(): boolean {
    return this.phase === "closed";
  }

  public run(): void {
    this.deadline = setTimeout(() => {
      this.context.logger.debug(`session ${this.id} timed out before a request was framed`);
      this.close("deadline");
    }, this.context.requestTimeoutMs);

    this.socket.on("data", (chunk: Buffer) => {
      this.receive(chunk);
    });
    this.socket.on("end", () => {
      this.handlePeerEnd();
    });
    this.socket.on("error", (error: Error) => {
      this.context.logger.debug(`session ${this.id} socket error: ${error.message}`);
      this.close("socket-error");
    });
    this.socket.on("close", () => {
      this.close("peer-closed");
    });
  }

  /** Destroys the socket and deregisters the session. Safe to call more than once. */
  public close(reason: SessionCloseReason): void {
    if (this.phase === "closed") {
      return;
    }

    this.phase = "closed";
    this.cancelDeadline();
    this.socket.destroy();
    this.context.onClose(this.id, reason);
  }

  private cancelDeadline(): void {
    if (this.deadline !== undefined) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }

  private receive(chunk: Buffer): void {
    if (this.phase !== "framing") {
      return;
    }

    const searchStart = Math.max(0, this.buffer.length - (HEADER_TERMINATOR.length - 1));
    this.buffer = Buffer.concat([this.buffer, chunk]);

    const terminatorIndex = this.buffer.indexOf(HEADER_TERMINATOR, searchStart);
    if (terminatorIndex !== -1 && terminatorIndex + HEADER_TERMINATOR.length <= this.context.maxHeaderBytes) {
      const headerBytes = this.buffer.subarray(0, terminatorIndex);
      this.beginResponse();
      void this.respond(headerBytes);
      return;
    }

    if (this.buffer.length > this.context.maxHeaderBytes) {
      this.beginResponse();
      this.reject(new LimitExceededError(413, `Header block exceeds ${this.context.maxHeaderBytes} bytes`));
    }
  }

  private handlePeerEnd(): void {
    if (this.phase !== "framing") {
      return;
    }

    this.beginResponse();
    this.reject(new ProtocolError(400, "Stream ended before the header block was complete"));
  }

  private beginResponse(): void {
    this.phase = "responding";
    this.cancelDeadline();
    this.buffer = Buffer.alloc(0);
  }

  private reject(error: HttpError): void {
    this.context.logger.debug(`session ${this.id}: ${error.message}`);
    this.write(renderErrorResponse(error.status));
  }

  private async respond(headerBytes: Buffer): Promise<void> {
    let headerText: string;
    try {
      headerText = new TextDecoder("utf-8", { fatal: true }).decode(headerBytes);
    } catch {
      this.reject(new ProtocolError(400, "Header block is not valid UTF-8"));
      return;
    }

    let response: Buffer;
    try {
      const request = parseRequest(headerText);
      response = renderResponse(await resolveRequest(request, this.context.sandbox, this.context.logger));
    } catch (error: unknown) {
      if (error instanceof HttpError) {
        this.reject(error);
        return;
      }

      this.context.logger.error(`session ${this.id} failed: ${toErrorMessage(error)}`);
      response = renderErrorResponse(500);
    }

    this.write(response);
  }

  private write(response: Buffer): void {
    if (this.phase === "closed") {
      return;
    }

    this.socket.end(response, () => {
      this.close("response-sent");
    });
  }
}
