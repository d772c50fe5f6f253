import { createServer, type Server, type Socket } from "node:net";

import { BindError, type BindFailureReason, toErrnoCode, toErrorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { renderErrorResponse } from "./response.js";
import { PathSandbox } from "./sandbox.js";
import { ConnectionSession, type SessionCloseReason } from "./session.js";

export const DEFAULT_MAX_CONNECTIONS = 50;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_MAX_HEADER_BYTES = 64 * 1024;

const LOOPBACK_HOST = "127.0.0.1";
const ALL_INTERFACES_HOST = "0.0.0.0";

export interface StaticServerOptions {
  port: number;
  rootDirectory: string;
  exposeToLAN?: boolean;
  maxConnections?: number;
  requestTimeoutMs?: number;
  maxHeaderBytes?: number;
  logger?: Logger;
  /** Called when the listener fails after a successful start. The server has already stopped itself. */
  onFailure?: (error: Error) => void;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= 65_535;
}

function toBindFailureReason(error: unknown): BindFailureReason {
  switch (toErrnoCode(error)) {
    case "EADDRINUSE":
      return "in-use";
    case "EACCES":
    case "EPERM":
      return "privileged";
    case "EADDRNOTAVAIL":
      return "unavailable";
    default:
      return "unknown";
  }
}

function toBindError(port: number, error: unknown): BindError {
  const reason = toBindFailureReason(error);
  if (reason === "in-use") {
    return new BindError(reason, port, `Port ${port} is already in use`);
  }

  if (reason === "privileged") {
    return new BindError(reason, port, `Port ${port} requires elevated privileges`);
  }

  return new BindError(reason, port, `Failed to bind port ${port}: ${toErrorMessage(error)}`);
}

/**
 * Serves one directory over HTTP/1.1. Each accepted socket becomes a
 * {@link ConnectionSession}; the number of live sessions is capped.
 */
export class StaticServer {
  public readonly exposeToLAN: boolean;
  public readonly maxConnections: number;
  private readonly requestTimeoutMs: number;
  private readonly maxHeaderBytes: number;
  private readonly logger: Logger;
  private readonly onFailure: ((error: Error) => void) | undefined;
  private readonly sessions = new Map<number, ConnectionSession>();
  private readonly rejectedSockets = new Set<Socket>();
  private server: Server | undefined;
  private sandbox: PathSandbox | undefined;
  private boundPort: number | undefined;
  private nextSessionId = 1;

  public constructor(private readonly options: StaticServerOptions) {
    this.exposeToLAN = options.exposeToLAN === true;
    this.maxConnections = options.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxHeaderBytes = options.maxHeaderBytes ?? DEFAULT_MAX_HEADER_BYTES;
    this.logger = options.logger ?? Logger.silent();
    this.onFailure = options.onFailure;
  }

  public get isRunning(): boolean {
    return this.server !== undefined;
  }

  /** The bound port once running (differs from the requested one when 0 was asked for). */
  public get port(): number {
    return this.boundPort ?? this.options.port;
  }

  /** Canonical root directory; available once started. */
  public get rootDirectory(): string {
    return this.sandbox?.root ?? this.options.rootDirectory;
  }

  public get activeSessionCount(): number {
    return this.sessions.size;
  }

  public async start(): Promise<void> {
    if (this.server !== undefined) {
      return;
    }

    const { port } = this.options;
    if (!isValidPort(port)) {
      throw new BindError("invalid-port", port, `Invalid port: ${port}`);
    }

    const sandbox = await PathSandbox.create(this.options.rootDirectory);
    const server = createServer({ allowHalfOpen: true }, (socket) => {
      this.accept(socket, sandbox);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        server.off("listening", onListening);
        reject(toBindError(port, error));
      };
      const onListening = (): void => {
        server.off("error", onError);
        resolve();
      };

      server.once("error", onError);
      server.once("listening", onListening);
      server.listen({ port, host: this.exposeToLAN ? ALL_INTERFACES_HOST : LOOPBACK_HOST });
    });

    server.on("error", (error: Error) => {
      this.handleRuntimeFailure(error);
    });

    const address = server.address();
    this.server = server;
    this.sandbox = sandbox;
    this.boundPort = typeof address === "object" && address !== null ? address.port : port;
    this.logger.info(`Serving ${sandbox.root} on ${this.exposeToLAN ? ALL_INTERFACES_HOST : LOOPBACK_HOST}:${this.boundPort}`);
  }

  /** Hard stop: open sessions are destroyed without waiting for pending writes. */
  public async stop(): Promise<void> {
    const server = this.server;
    if (server === undefined) {
      return;
    }

    this.server = undefined;
    for (const session of [...this.sessions.values()]) {
      session.close("server-stopped");
    }

    for (const socket of this.rejectedSockets) {
      socket.destroy();
    }

    this.rejectedSockets.clear();
    await new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
    });
    this.logger.info(`Stopped server on port ${this.port}`);
  }

  private accept(socket: Socket, sandbox: PathSandbox): void {
    if (this.server === undefined) {
      socket.destroy();
      return;
    }

    if (this.sessions.size >= this.maxConnections) {
      this.rejectOverCapacity(socket);
      return;
    }

    const session = new ConnectionSession(this.nextSessionId, socket, {
      sandbox,
      requestTimeoutMs: this.requestTimeoutMs,
      maxHeaderBytes: this.maxHeaderBytes,
      logger: this.logger,
      onClose: (sessionId, reason) => {
        this.deregister(sessionId, reason);
      },
    });
    this.nextSessionId += 1;
    this.sessions.set(session.id, session);
    session.run();
  }

  private rejectOverCapacity(socket: Socket): void {
    this.logger.warn(`Connection limit of ${this.maxConnections} reached on port ${this.port}; answering 503`);
    this.rejectedSockets.add(socket);
    socket.on("error", () => {
      socket.destroy();
    });
    socket.on("close", () => {
      this.rejectedSockets.delete(socket);
    });
    socket.end(renderErrorResponse(503), () => {
      socket.destroy();
    });
  }

  private deregister(sessionId: number, reason: SessionCloseReason): void {
    if (this.sessions.delete(sessionId)) {
      this.logger.debug(`session ${sessionId} closed (${reason})`);
    }
  }

  private handleRuntimeFailure(error: Error): void {
    this.logger.error(`Server on port ${this.port} failed: ${error.message}`);
    void this.stop().then(() => {
      this.onFailure?.(error);
    });
  }
}
