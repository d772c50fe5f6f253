import { type Dirent } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";

import { FileAccessError, HttpError } from "./errors.js";
import { percentEncodePath, resolveContentType } from "./http-utils.js";
import { Logger } from "./logger.js";
import { type HttpRequest } from "./request.js";
import { type ListingEntry, type ResolvedResponse } from "./response.js";
import { type PathSandbox } from "./sandbox.js";

const INDEX_FILE_NAMES = ["index.html", "index.htm"] as const;

async function isDirectoryEntry(directoryPath: string, entry: Dirent): Promise<boolean> {
  if (entry.isDirectory()) {
    return true;
  }

  if (!entry.isSymbolicLink()) {
    return false;
  }

  try {
    return (await stat(path.join(directoryPath, entry.name))).isDirectory();
  } catch {
    return false;
  }
}

async function listDirectory(directoryPath: string): Promise<ListingEntry[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directoryPath, { withFileTypes: true });
  } catch (error: unknown) {
    throw new FileAccessError(directoryPath, error);
  }

  return Promise.all(
    entries.map(async (entry) => ({
      name: entry.name,
      isDirectory: await isDirectoryEntry(directoryPath, entry),
    })),
  );
}

async function readServedFile(filePath: string): Promise<ResolvedResponse> {
  try {
    return {
      kind: "file",
      filePath,
      contentType: resolveContentType(filePath),
      body: await readFile(filePath),
    };
  } catch (error: unknown) {
    throw new FileAccessError(filePath, error);
  }
}

async function findIndexFile(sandbox: PathSandbox, directoryRequestPath: string): Promise<string | undefined> {
  for (const indexName of INDEX_FILE_NAMES) {
    const candidate = await sandbox.resolve(`${directoryRequestPath}${indexName}`);
    if (candidate.stats?.isFile() === true) {
      return candidate.path;
    }
  }

  return undefined;
}

async function resolveSandboxedRequest(request: HttpRequest, sandbox: PathSandbox): Promise<ResolvedResponse> {
  const target = await sandbox.resolve(request.path);
  if (target.stats === undefined) {
    return { kind: "error", status: 404 };
  }

  if (target.stats.isDirectory()) {
    if (!request.path.endsWith("/")) {
      return { kind: "redirect", location: percentEncodePath(`${request.path}/`) };
    }

    const indexPath = await findIndexFile(sandbox, request.path);
    if (indexPath !== undefined) {
      return readServedFile(indexPath);
    }

    return {
      kind: "listing",
      requestPath: request.path,
      entries: await listDirectory(target.path),
    };
  }

  if (!target.stats.isFile()) {
    return { kind: "error", status: 404 };
  }

  return readServedFile(target.path);
}

/**
 * Maps a parsed request onto the sandboxed filesystem. Failures that have an
 * HTTP answer come back as error responses; anything else propagates to the session.
 */
export async function resolveRequest(
  request: HttpRequest,
  sandbox: PathSandbox,
  logger: Logger = Logger.silent(),
): Promise<ResolvedResponse> {
  try {
    return await resolveSandboxedRequest(request, sandbox);
  } catch (error: unknown) {
    if (error instanceof FileAccessError) {
      logger.error(error.message);
      return { kind: "error", status: error.status };
    }

    if (error instanceof HttpError) {
      logger.debug(`${request.path}: ${error.message}`);
      return { kind: "error", status: error.status };
    }

    throw error;
  }
}
