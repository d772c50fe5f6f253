import { DEFAULT_MAX_CONNECTIONS, DEFAULT_MAX_HEADER_BYTES, DEFAULT_REQUEST_TIMEOUT_MS } from "./server.js";
import { DEFAULT_SCAN_TTL_MS } from "./port-scanner.js";
import { type PortlightState, parsePortNumber } from "./state.js";

export interface PortlightConfig {
  defaultPort: number;
  persistServers: boolean;
  maxConnections: number;
  requestTimeoutMs: number;
  maxHeaderBytes: number;
  scanTtlMs: number;
  verbose: boolean;
}

const DEFAULT_PORT_ENV_KEY = "PORTLIGHT_DEFAULT_PORT";
const PERSIST_SERVERS_ENV_KEY = "PORTLIGHT_PERSIST_SERVERS";
const MAX_CONNECTIONS_ENV_KEY = "PORTLIGHT_MAX_CONNECTIONS";
const REQUEST_TIMEOUT_ENV_KEY = "PORTLIGHT_REQUEST_TIMEOUT_MS";
const MAX_HEADER_BYTES_ENV_KEY = "PORTLIGHT_MAX_HEADER_BYTES";
const SCAN_TTL_ENV_KEY = "PORTLIGHT_SCAN_TTL_MS";
const VERBOSE_ENV_KEY = "PORTLIGHT_VERBOSE";

function parsePositiveInteger(value: string | undefined): number | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim();
  if (!/^\d+$/.test(normalized)) {
    return undefined;
  }

  const parsed = Number.parseInt(normalized, 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }

  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }

  return undefined;
}

/**
 * Builds the runtime configuration from persisted settings, letting
 * environment variables override them. Unparseable values are ignored.
 */
export function resolveConfig(state: Pick<PortlightState, "defaultPort" | "persistServers">, env: NodeJS.ProcessEnv = process.env): PortlightConfig {
  return {
    defaultPort: parsePortNumber(env[DEFAULT_PORT_ENV_KEY]) ?? state.defaultPort,
    persistServers: parseBoolean(env[PERSIST_SERVERS_ENV_KEY]) ?? state.persistServers,
    maxConnections: parsePositiveInteger(env[MAX_CONNECTIONS_ENV_KEY]) ?? DEFAULT_MAX_CONNECTIONS,
    requestTimeoutMs: parsePositiveInteger(env[REQUEST_TIMEOUT_ENV_KEY]) ?? DEFAULT_REQUEST_TIMEOUT_MS,
    maxHeaderBytes: parsePositiveInteger(env[MAX_HEADER_BYTES_ENV_KEY]) ?? DEFAULT_MAX_HEADER_BYTES,
    scanTtlMs: parsePositiveInteger(env[SCAN_TTL_ENV_KEY]) ?? DEFAULT_SCAN_TTL_MS,
    verbose: parseBoolean(env[VERBOSE_ENV_KEY]) ?? false,
  };
}
