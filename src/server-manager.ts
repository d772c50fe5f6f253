import { stat } from "node:fs/promises";

import { toErrorMessage } from "./errors.js";
import { Logger } from "./logger.js";
import { type ListeningPortRecord } from "./port-parser.js";
import { StaticServer } from "./server.js";
import { type SavedServer } from "./state.js";

export interface ServerInstance {
  readonly id: number;
  readonly port: number;
  readonly rootDirectory: string;
  readonly exposeToLAN: boolean;
  readonly startedAt: string;
}

export interface PortSource {
  scan(): Promise<readonly ListeningPortRecord[]>;
}

export interface ServerLimits {
  maxConnections?: number;
  requestTimeoutMs?: number;
  maxHeaderBytes?: number;
}

export interface PortRange {
  start: number;
  end: number;
}

export interface ServerManagerOptions {
  scanner: PortSource;
  limits?: ServerLimits;
  logger?: Logger;
  random?: () => number;
  nowIso?: () => string;
  onServerFailure?: (instance: ServerInstance, error: Error) => void;
  onServersChanged?: (servers: SavedServer[]) => void;
}

export type RestoreSkipReason = "missing-directory" | "start-failed";

export interface RestoreResult {
  restored: ServerInstance[];
  skipped: Array<{ entry: SavedServer; reason: RestoreSkipReason }>;
}

interface ManagedServer {
  instance: ServerInstance;
  server: StaticServer;
}

const PROBE_WINDOW = 100;
export const PROBE_FALLBACK_RANGE: PortRange = { start: 8200, end: 9000 };
export const RESTORE_CANDIDATE_RANGE: PortRange = { start: 8080, end: 9000 };
export const RESTORE_FALLBACK_RANGE: PortRange = { start: 9001, end: 65_535 };

export function pickRandomPort(range: PortRange, random: () => number): number {
  const span = range.end - range.start + 1;
  return range.start + Math.min(span - 1, Math.floor(random() * span));
}

/** Lowest free port of the candidate range, or a random one above it when the range is exhausted. */
export function chooseRestorePort(takenPorts: ReadonlySet<number>, random: () => number): number {
  for (let port = RESTORE_CANDIDATE_RANGE.start; port <= RESTORE_CANDIDATE_RANGE.end; port += 1) {
    if (!takenPorts.has(port)) {
      return port;
    }
  }

  return pickRandomPort(RESTORE_FALLBACK_RANGE, random);
}

async function isExistingDirectory(directoryPath: string): Promise<boolean> {
  try {
    return (await stat(directoryPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Owns every running {@link StaticServer}. Instances are keyed by a generated
 * integer id; callers hold the frozen {@link ServerInstance} value.
 */
export class ServerManager {
  private readonly servers = new Map<number, ManagedServer>();
  private readonly scanner: PortSource;
  private readonly limits: ServerLimits;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly nowIso: () => string;
  private nextId = 1;

  public constructor(private readonly options: ServerManagerOptions) {
    this.scanner = options.scanner;
    this.limits = options.limits ?? {};
    this.logger = options.logger ?? Logger.silent();
    this.random = options.random ?? Math.random;
    this.nowIso = options.nowIso ?? (() => new Date().toISOString());
  }

  public listServers(): ServerInstance[] {
    return [...this.servers.values()].map((managed) => managed.instance);
  }

  public getServer(id: number): ServerInstance | undefined {
    return this.servers.get(id)?.instance;
  }

  public async startServer(port: number, rootDirectory: string, exposeToLAN = false): Promise<ServerInstance> {
    const instance = await this.launch(port, rootDirectory, exposeToLAN);
    this.notifyChanged();
    return instance;
  }

  public async stopServer(target: ServerInstance | number): Promise<boolean> {
    const id = typeof target === "number" ? target : target.id;
    const managed = this.servers.get(id);
    if (!managed) {
      return false;
    }

    this.servers.delete(id);
    await managed.server.stop();
    this.notifyChanged();
    return true;
  }

  public async stopAllServers(): Promise<void> {
    const managedServers = [...this.servers.values()];
    this.servers.clear();
    await Promise.all(managedServers.map((managed) => managed.server.stop()));
    if (managedServers.length > 0) {
      this.notifyChanged();
    }
  }

  public async isPortInUse(port: number): Promise<boolean> {
    if (this.listServers().some((instance) => instance.port === port)) {
      return true;
    }

    const records = await this.scanner.scan();
    return records.some((record) => record.port === port);
  }

  /** Probes upward from `startingFrom`; falls back to a random high port when the window is taken. */
  public async findAvailablePort(startingFrom: number): Promise<number> {
    const endPort = Math.min(startingFrom + PROBE_WINDOW, 65_535);
    for (let port = Math.max(1, startingFrom); port <= endPort; port += 1) {
      if (!(await this.isPortInUse(port))) {
        return port;
      }
    }

    return pickRandomPort(PROBE_FALLBACK_RANGE, this.random);
  }

  /**
   * Starts saved servers in order. One scan is taken up front; a saved port
   * that is already taken moves to {@link chooseRestorePort}.
   */
  public async restoreServers(saved: readonly SavedServer[]): Promise<RestoreResult> {
    const result: RestoreResult = { restored: [], skipped: [] };
    const scannedPorts = new Set((await this.scanner.scan()).map((record) => record.port));
    const reservedPorts = new Set<number>();

    for (const entry of saved) {
      if (!(await isExistingDirectory(entry.directoryPath))) {
        this.logger.warn(`Skipping saved server for missing directory ${entry.directoryPath}`);
        result.skipped.push({ entry, reason: "missing-directory" });
        continue;
      }

      const takenPorts = new Set([...scannedPorts, ...reservedPorts, ...this.listServers().map((instance) => instance.port)]);
      const port = takenPorts.has(entry.port) ? chooseRestorePort(takenPorts, this.random) : entry.port;
      if (port !== entry.port) {
        this.logger.info(`Saved port ${entry.port} is taken; restoring ${entry.directoryPath} on ${port}`);
      }

      reservedPorts.add(port);
      try {
        result.restored.push(await this.launch(port, entry.directoryPath, entry.exposeToLAN));
      } catch (error: unknown) {
        this.logger.error(`Failed to restore server on port ${port}: ${toErrorMessage(error)}`);
        result.skipped.push({ entry, reason: "start-failed" });
      }
    }

    if (result.restored.length > 0) {
      this.notifyChanged();
    }

    return result;
  }

  public toSavedServers(): SavedServer[] {
    return this.listServers().map((instance) => ({
      port: instance.port,
      directoryPath: instance.rootDirectory,
      exposeToLAN: instance.exposeToLAN,
    }));
  }

  private async launch(port: number, rootDirectory: string, exposeToLAN: boolean): Promise<ServerInstance> {
    const id = this.nextId;
    this.nextId += 1;

    const server = new StaticServer({
      port,
      rootDirectory,
      exposeToLAN,
      ...this.limits,
      logger: this.logger.child(`server-${id}`),
      onFailure: (error) => {
        this.handleServerFailure(id, error);
      },
    });
    await server.start();

    const instance: ServerInstance = Object.freeze({
      id,
      port: server.port,
      rootDirectory: server.rootDirectory,
      exposeToLAN,
      startedAt: this.nowIso(),
    });
    this.servers.set(id, { instance, server });
    return instance;
  }

  private handleServerFailure(id: number, error: Error): void {
    const managed = this.servers.get(id);
    if (!managed) {
      return;
    }

    this.servers.delete(id);
    this.notifyChanged();
    this.options.onServerFailure?.(managed.instance, error);
  }

  private notifyChanged(): void {
    this.options.onServersChanged?.(this.toSavedServers());
  }
}
