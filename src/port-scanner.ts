import { spawn } from "node:child_process";

import { toErrorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { type ListeningPortRecord, parseListeningPorts } from "./port-parser.js";

export const DEFAULT_SCAN_TTL_MS = 2 * 1000;

export interface ScanCommand {
  command: string;
  args: string[];
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export interface PortScannerOptions {
  ttlMs?: number;
  command?: ScanCommand;
  runCommand?: CommandRunner;
  now?: () => number;
  logger?: Logger;
}

interface CacheEntry {
  records: readonly ListeningPortRecord[];
  capturedAt: number;
}

// TCP sockets in LISTEN state, numeric hosts and ports, field-prefixed output.
export const LSOF_SCAN_COMMAND: ScanCommand = {
  command: "lsof",
  args: ["-iTCP", "-sTCP:LISTEN", "-n", "-P", "-Fpcn"],
};

export function runCommandWithSpawn(command: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });
    child.once("error", reject);
    child.once("close", (exitCode) => {
      resolve({
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
      });
    });
  });
}

/**
 * Lists listening TCP ports through an external command, caching the result
 * for a short time. `scan()` and `forceScan()` are serialized, so concurrent
 * callers share one capture instead of spawning the command repeatedly.
 */
export class PortScanner {
  private readonly ttlMs: number;
  private readonly command: ScanCommand;
  private readonly runCommand: CommandRunner;
  private readonly now: () => number;
  private readonly logger: Logger;
  private cache: CacheEntry | undefined;
  private queue: Promise<void> = Promise.resolve();

  public constructor(options: PortScannerOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SCAN_TTL_MS;
    this.command = options.command ?? LSOF_SCAN_COMMAND;
    this.runCommand = options.runCommand ?? runCommandWithSpawn;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? Logger.silent();
  }

  public scan(): Promise<readonly ListeningPortRecord[]> {
    return this.exclusive(async () => {
      const cached = this.cache;
      if (cached !== undefined && this.now() - cached.capturedAt < this.ttlMs) {
        return cached.records;
      }

      return this.refresh();
    });
  }

  public forceScan(): Promise<readonly ListeningPortRecord[]> {
    return this.exclusive(() => this.refresh());
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async refresh(): Promise<readonly ListeningPortRecord[]> {
    const records = Object.freeze(await this.capture());
    this.cache = {
      records,
      capturedAt: this.now(),
    };
    return records;
  }

  private async capture(): Promise<ListeningPortRecord[]> {
    const { command, args } = this.command;
    let result: CommandResult;
    try {
      result = await this.runCommand(command, args);
    } catch (error: unknown) {
      this.logger.error(`Failed to run ${command}: ${toErrorMessage(error)}`);
      return [];
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().length > 0 ? result.stderr.trim() : "no error output";
      if (result.stdout.trim().length === 0) {
        this.logger.error(`${command} exited with status ${result.exitCode ?? "unknown"}: ${detail}`);
        return [];
      }

      this.logger.warn(`${command} exited with status ${result.exitCode ?? "unknown"}: ${detail}`);
    }

    return parseListeningPorts(result.stdout);
  }
}
