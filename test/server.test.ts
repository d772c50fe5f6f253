import { mkdirSync, mkdtempSync, realpathSync, writeFileSync } from "node:fs";
import { connect, type Socket } from "node:net";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { BindError, InvalidRootError } from "../src/errors.js";
import { DEFAULT_MAX_CONNECTIONS, StaticServer, type StaticServerOptions } from "../src/server.js";

const startedServers: StaticServer[] = [];
const openSockets: Socket[] = [];

afterEach(async () => {
  for (const socket of openSockets.splice(0)) {
    socket.destroy();
  }

  await Promise.all(startedServers.splice(0).map((server) => server.stop()));
});

function createSiteRoot(): string {
  const baseDir = realpathSync(mkdtempSync(path.join(tmpdir(), "portlight-server-")));
  const root = path.join(baseDir, "site");
  mkdirSync(path.join(root, "docs"), { recursive: true });
  writeFileSync(path.join(root, "docs", "notes.txt"), "hello\n", "utf8");
  writeFileSync(path.join(baseDir, "secret.txt"), "outside\n", "utf8");
  return root;
}

async function startServer(options: Partial<StaticServerOptions> = {}): Promise<StaticServer> {
  const server = new StaticServer({ port: 0, rootDirectory: createSiteRoot(), ...options });
  await server.start();
  startedServers.push(server);
  return server;
}

function openSocket(port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ port, host: "127.0.0.1" });
    openSockets.push(socket);
    socket.once("connect", () => {
      socket.off("error", reject);
      socket.on("error", () => {
        socket.destroy();
      });
      resolve(socket);
    });
    socket.once("error", reject);
  });
}

/** Collects everything the server sends until it closes the connection. */
function readUntilClosed(socket: Socket): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    socket.once("error", (error) => {
      if (chunks.length > 0) {
        resolve(Buffer.concat(chunks).toString("utf8"));
        return;
      }

      reject(error);
    });
    socket.once("close", () => {
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
  });
}

async function sendRequest(port: number, payload: string, endAfterWrite = false): Promise<string> {
  const socket = await openSocket(port);
  const response = readUntilClosed(socket);
  if (endAfterWrite) {
    socket.end(payload);
  } else {
    socket.write(payload);
  }

  return response;
}

function statusLine(response: string): string {
  return response.split("\r\n", 1)[0] ?? "";
}

describe("StaticServer", () => {
  it("serves a file and closes the connection", async () => {
    const server = await startServer();

    const response = await sendRequest(server.port, "GET /docs/notes.txt HTTP/1.1\r\nHost: localhost\r\n\r\n");

    expect(response).toBe(
      ["HTTP/1.1 200 OK", "Content-Type: text/plain; charset=utf-8", "Content-Length: 6", "Connection: close", "", "hello\n"].join("\r\n"),
    );
    await vi.waitFor(() => {
      expect(server.activeSessionCount).toBe(0);
    });
  });

  it("accepts a request delivered in several chunks", async () => {
    const server = await startServer();
    const socket = await openSocket(server.port);
    const response = readUntilClosed(socket);

    socket.write("GET /docs/notes.txt HT");
    socket.write("TP/1.1\r\n\r");
    socket.write("\n");

    expect(statusLine(await response)).toBe("HTTP/1.1 200 OK");
  });

  it("redirects directory requests without a trailing slash", async () => {
    const server = await startServer();

    const response = await sendRequest(server.port, "GET /docs HTTP/1.1\r\n\r\n");

    expect(response).toBe(["HTTP/1.1 301 Moved Permanently", "Location: /docs/", "Content-Length: 0", "Connection: close", "", ""].join("\r\n"));
  });

  it("keeps redirects for doubled leading slashes on this host", async () => {
    const server = await startServer();

    const response = await sendRequest(server.port, "GET //docs HTTP/1.1\r\n\r\n");

    expect(response).toBe(["HTTP/1.1 301 Moved Permanently", "Location: /docs/", "Content-Length: 0", "Connection: close", "", ""].join("\r\n"));
  });

  it("renders a directory listing", async () => {
    const server = await startServer();

    const response = await sendRequest(server.port, "GET /docs/ HTTP/1.1\r\n\r\n");

    expect(statusLine(response)).toBe("HTTP/1.1 200 OK");
    expect(response).toContain('    <li class="entry entry-file"><a href="/docs/notes.txt">notes.txt</a></li>');
  });

  it("answers 403 for plain and encoded traversal", async () => {
    const server = await startServer();

    expect(statusLine(await sendRequest(server.port, "GET /../secret.txt HTTP/1.1\r\n\r\n"))).toBe("HTTP/1.1 403 Forbidden");
    expect(statusLine(await sendRequest(server.port, "GET /%2e%2e/secret.txt HTTP/1.1\r\n\r\n"))).toBe("HTTP/1.1 403 Forbidden");
  });

  it("answers 404, 405 and 400", async () => {
    const server = await startServer();

    expect(statusLine(await sendRequest(server.port, "GET /missing.txt HTTP/1.1\r\n\r\n"))).toBe("HTTP/1.1 404 Not Found");
    expect(statusLine(await sendRequest(server.port, "DELETE /docs/notes.txt HTTP/1.1\r\n\r\n"))).toBe("HTTP/1.1 405 Method Not Allowed");
    expect(statusLine(await sendRequest(server.port, "GET /docs/notes.txt HTTP/1.1\r\n", true))).toBe("HTTP/1.1 400 Bad Request");
  });

  it("answers 413 when the header block exceeds the limit", async () => {
    const server = await startServer({ maxHeaderBytes: 1024 });

    const response = await sendRequest(server.port, `GET /${"a".repeat(2048)}`);

    expect(statusLine(response)).toBe("HTTP/1.1 413 Payload Too Large");
  });

  it("closes connections that miss the request deadline", async () => {
    const server = await startServer({ requestTimeoutMs: 100 });

    const response = await sendRequest(server.port, "GET /docs/notes.txt HTTP/1.1\r\n");

    expect(response).toBe("");
    expect(server.activeSessionCount).toBe(0);
  });

  it("answers 503 to the connection after the fiftieth while the others proceed", async () => {
    const server = await startServer();
    const heldSockets = await Promise.all(Array.from({ length: DEFAULT_MAX_CONNECTIONS }, () => openSocket(server.port)));
    await vi.waitFor(() => {
      expect(server.activeSessionCount).toBe(50);
    });

    const rejected = await sendRequest(server.port, "GET /docs/notes.txt HTTP/1.1\r\n\r\n");

    expect(statusLine(rejected)).toBe("HTTP/1.1 503 Service Unavailable");
    expect(server.activeSessionCount).toBe(50);

    const responses = await Promise.all(
      heldSockets.map((socket) => {
        const response = readUntilClosed(socket);
        socket.write("GET /docs/notes.txt HTTP/1.1\r\n\r\n");
        return response;
      }),
    );

    expect(responses.map(statusLine)).toEqual(Array.from({ length: 50 }, () => "HTTP/1.1 200 OK"));
    await vi.waitFor(() => {
      expect(server.activeSessionCount).toBe(0);
    });
  });

  it("honours a custom connection cap", async () => {
    const server = await startServer({ maxConnections: 1 });
    await openSocket(server.port);
    await vi.waitFor(() => {
      expect(server.activeSessionCount).toBe(1);
    });

    expect(statusLine(await sendRequest(server.port, "GET / HTTP/1.1\r\n\r\n"))).toBe("HTTP/1.1 503 Service Unavailable");
  });

  it("answers repeated requests identically", async () => {
    const server = await startServer();
    const request = "GET /docs/notes.txt HTTP/1.1\r\n\r\n";

    const first = await sendRequest(server.port, request);
    const second = await sendRequest(server.port, request);

    expect(second).toBe(first);
  });

  it("escapes markup-like file names in listings", async () => {
    const server = await startServer();
    writeFileSync(path.join(server.rootDirectory, "docs", "<script>.html"), "x", "utf8");

    const response = await sendRequest(server.port, "GET /docs/ HTTP/1.1\r\n\r\n");

    expect(response).toContain('<a href="/docs/%3Cscript%3E.html">&lt;script&gt;.html</a>');
    expect(response).not.toContain("<script>");
  });

  it("closes open sessions on stop and tolerates repeated stops", async () => {
    const server = await startServer();
    const idle = await openSocket(server.port);
    const closed = readUntilClosed(idle);
    await vi.waitFor(() => {
      expect(server.activeSessionCount).toBe(1);
    });

    await server.stop();
    await server.stop();

    expect(await closed).toBe("");
    expect(server.isRunning).toBe(false);
    expect(server.activeSessionCount).toBe(0);
  });

  it("reports the port and canonical root once started", async () => {
    const root = createSiteRoot();
    const server = await startServer({ rootDirectory: path.join(root, "docs", "..") });

    expect(server.port).toBeGreaterThan(0);
    expect(server.rootDirectory).toBe(root);
    expect(server.isRunning).toBe(true);
  });

  it("fails with an in-use bind error when the port is taken", async () => {
    const first = await startServer();
    const second = new StaticServer({ port: first.port, rootDirectory: createSiteRoot() });

    const error = await second.start().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BindError);
    expect(error instanceof BindError ? error.reason : undefined).toBe("in-use");
    expect(second.isRunning).toBe(false);
  });

  it("rejects out-of-range ports and missing roots", async () => {
    const invalidPort = new StaticServer({ port: 70_000, rootDirectory: createSiteRoot() });
    const missingRoot = new StaticServer({ port: 0, rootDirectory: path.join(createSiteRoot(), "missing") });

    await expect(invalidPort.start()).rejects.toMatchObject({ name: "BindError", reason: "invalid-port" });
    await expect(missingRoot.start()).rejects.toBeInstanceOf(InvalidRootError);
  });
});
