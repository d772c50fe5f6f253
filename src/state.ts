import { existsSync, mkdirSync, readFileSync, renameSync, statSync, unlinkSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";

export interface SavedServer {
  port: number;
  directoryPath: string;
  exposeToLAN: boolean;
}

export interface PortlightState {
  defaultPort: number;
  persistServers: boolean;
  servers: SavedServer[];
}

export type StateMutator = (state: PortlightState) => void;

export const DEFAULT_PORT = 8080;
const STATE_RELATIVE_PATH = path.join(".portlight", "state.json");
const STATE_LOCK_RETRY_COUNT = 5;
const STATE_LOCK_RETRY_DELAY_MS = 100;
const STATE_LOCK_STALE_TIMEOUT_MS = 10_000;
const SLEEP_ARRAY = new Int32Array(new SharedArrayBuffer(4));

function toObjectRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }

  return value as Record<string, unknown>;
}

export function parsePortNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value > 0 && value <= 65_535 ? value : undefined;
  }

  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim();
  if (!/^\d+$/.test(normalized)) {
    return undefined;
  }

  const parsed = Number.parseInt(normalized, 10);
  return parsed > 0 && parsed <= 65_535 ? parsed : undefined;
}

function parseSavedServer(value: unknown): SavedServer | undefined {
  const rawServer = toObjectRecord(value);
  const port = typeof rawServer.port === "number" ? parsePortNumber(rawServer.port) : undefined;
  if (port === undefined) {
    return undefined;
  }

  if (typeof rawServer.directoryPath !== "string" || !path.isAbsolute(rawServer.directoryPath)) {
    return undefined;
  }

  if (rawServer.exposeToLAN !== undefined && typeof rawServer.exposeToLAN !== "boolean") {
    return undefined;
  }

  return {
    port,
    directoryPath: rawServer.directoryPath,
    exposeToLAN: rawServer.exposeToLAN === true,
  };
}

/** Decodes a persisted server list, dropping malformed entries instead of failing the whole list. */
export function decodeSavedServers(value: unknown): SavedServer[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const servers: SavedServer[] = [];
  for (const entry of value) {
    const server = parseSavedServer(entry);
    if (server) {
      servers.push(server);
    }
  }

  return servers;
}

function sleepSync(milliseconds: number): void {
  Atomics.wait(SLEEP_ARRAY, 0, 0, milliseconds);
}

function isLockStale(lockPath: string): boolean {
  try {
    const lockStats = statSync(lockPath);
    return Date.now() - lockStats.mtimeMs > STATE_LOCK_STALE_TIMEOUT_MS;
  } catch {
    return false;
  }
}

function removeLockIfStale(lockPath: string): boolean {
  if (!isLockStale(lockPath)) {
    return false;
  }

  try {
    unlinkSync(lockPath);
    return true;
  } catch {
    return false;
  }
}

function acquireStateLock(lockPath: string): void {
  for (let attempt = 0; attempt <= STATE_LOCK_RETRY_COUNT; attempt += 1) {
    try {
      writeFileSync(lockPath, `${process.pid}\n${Date.now()}\n`, { encoding: "utf8", flag: "wx" });
      return;
    } catch (error: unknown) {
      if (!(error instanceof Error) || !("code" in error) || error.code !== "EEXIST") {
        throw error;
      }
    }

    if (removeLockIfStale(lockPath)) {
      continue;
    }

    if (attempt === STATE_LOCK_RETRY_COUNT) {
      throw new Error(`Failed to acquire state lock: ${lockPath}`);
    }

    sleepSync(STATE_LOCK_RETRY_DELAY_MS);
  }
}

function releaseStateLock(lockPath: string): void {
  try {
    unlinkSync(lockPath);
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return;
    }

    throw error;
  }
}

export function getStatePath(): string {
  return path.join(homedir(), STATE_RELATIVE_PATH);
}

export function createDefaultState(): PortlightState {
  return {
    defaultPort: DEFAULT_PORT,
    persistServers: true,
    servers: [],
  };
}

function parsePersistedState(parsed: Record<string, unknown>): PortlightState {
  return {
    defaultPort: parsePortNumber(parsed.defaultPort) ?? DEFAULT_PORT,
    persistServers: parsed.persistServers !== false,
    servers: decodeSavedServers(parsed.servers),
  };
}

function readStateFile(statePath: string): PortlightState {
  if (!existsSync(statePath)) {
    return createDefaultState();
  }

  try {
    const raw = readFileSync(statePath, "utf8");
    return parsePersistedState(toObjectRecord(JSON.parse(raw)));
  } catch {
    return createDefaultState();
  }
}

function writeStateFile(statePath: string, state: PortlightState): void {
  const persistedState: PortlightState = {
    ...state,
    servers: state.persistServers ? state.servers : [],
  };
  const temporaryPath = `${statePath}.tmp`;
  writeFileSync(temporaryPath, `${JSON.stringify(persistedState, null, 2)}\n`, "utf8");
  renameSync(temporaryPath, statePath);
}

export function readState(): PortlightState {
  return readStateFile(getStatePath());
}

export function writeState(state: PortlightState): void {
  const statePath = getStatePath();
  const lockPath = `${statePath}.lock`;
  mkdirSync(path.dirname(statePath), { recursive: true });

  acquireStateLock(lockPath);
  try {
    writeStateFile(statePath, state);
  } finally {
    releaseStateLock(lockPath);
  }
}

export function updateState(mutator: StateMutator): PortlightState {
  const statePath = getStatePath();
  const lockPath = `${statePath}.lock`;
  mkdirSync(path.dirname(statePath), { recursive: true });

  acquireStateLock(lockPath);
  try {
    const currentState = readStateFile(statePath);
    mutator(currentState);
    writeStateFile(statePath, currentState);
    return currentState;
  } finally {
    releaseStateLock(lockPath);
  }
}
