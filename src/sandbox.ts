import { type Stats } from "node:fs";
import { realpath, stat } from "node:fs/promises";
import path from "node:path";

import { FileAccessError, InvalidRootError, PathViolationError, toErrnoCode } from "./errors.js";

export interface SandboxTarget {
  /** Canonical absolute path inside the root. */
  path: string;
  /** Present when the target exists. */
  stats: Stats | undefined;
}

interface CanonicalPath {
  path: string;
  exists: boolean;
}

function isMissingPathError(error: unknown): boolean {
  const code = toErrnoCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

export function isWithinRoot(rootPath: string, candidatePath: string): boolean {
  if (candidatePath === rootPath) {
    return true;
  }

  const prefix = rootPath.endsWith(path.sep) ? rootPath : `${rootPath}${path.sep}`;
  return candidatePath.startsWith(prefix);
}

/**
 * Resolves client paths against a fixed root directory. The root is
 * canonicalized once; every resolved path is canonicalized through symlinks
 * before the containment check.
 */
export class PathSandbox {
  private constructor(public readonly root: string) {}

  public static async create(rootDirectory: string): Promise<PathSandbox> {
    const absoluteRoot = path.resolve(rootDirectory);
    let canonicalRoot: string;
    let rootStats: Stats;
    try {
      canonicalRoot = await realpath(absoluteRoot);
      rootStats = await stat(canonicalRoot);
    } catch (error: unknown) {
      throw new InvalidRootError(absoluteRoot, `Cannot serve ${absoluteRoot}: ${toErrnoCode(error) ?? "unreadable"}`);
    }

    if (!rootStats.isDirectory()) {
      throw new InvalidRootError(absoluteRoot, `Cannot serve ${absoluteRoot}: not a directory`);
    }

    return new PathSandbox(canonicalRoot);
  }

  public async resolve(requestPath: string): Promise<SandboxTarget> {
    if (requestPath.includes("\0") || requestPath.split("/").includes("..")) {
      throw new PathViolationError(requestPath);
    }

    const joinedPath = path.join(this.root, requestPath);
    const canonical = await this.canonicalize(joinedPath, requestPath);
    if (!isWithinRoot(this.root, canonical.path)) {
      throw new PathViolationError(requestPath);
    }

    if (!canonical.exists) {
      return { path: canonical.path, stats: undefined };
    }

    try {
      return { path: canonical.path, stats: await stat(canonical.path) };
    } catch (error: unknown) {
      if (isMissingPathError(error)) {
        return { path: canonical.path, stats: undefined };
      }

      throw new FileAccessError(canonical.path, error);
    }
  }

  private async canonicalize(absolutePath: string, requestPath: string): Promise<CanonicalPath> {
    const missingSegments: string[] = [];
    let currentPath = absolutePath;

    for (;;) {
      try {
        const resolvedPath = await realpath(currentPath);
        return {
          path: missingSegments.length === 0 ? resolvedPath : path.join(resolvedPath, ...missingSegments.reverse()),
          exists: missingSegments.length === 0,
        };
      } catch (error: unknown) {
        if (toErrnoCode(error) === "ELOOP") {
          throw new PathViolationError(requestPath);
        }

        if (!isMissingPathError(error)) {
          throw new FileAccessError(currentPath, error);
        }
      }

      const parentPath = path.dirname(currentPath);
      if (parentPath === currentPath) {
        throw new PathViolationError(requestPath);
      }

      missingSegments.push(path.basename(currentPath));
      currentPath = parentPath;
    }
  }
}
