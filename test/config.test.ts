import { describe, expect, it } from "vitest";

import { resolveConfig } from "../src/config.js";

const persisted = { defaultPort: 8080, persistServers: true };

describe("resolveConfig", () => {
  it("uses persisted settings and built-in limits without overrides", () => {
    expect(resolveConfig(persisted, {})).toEqual({
      defaultPort: 8080,
      persistServers: true,
      maxConnections: 50,
      requestTimeoutMs: 30_000,
      maxHeaderBytes: 65_536,
      scanTtlMs: 2_000,
      verbose: false,
    });
  });

  it("lets environment variables override persisted settings", () => {
    const config = resolveConfig(persisted, {
      PORTLIGHT_DEFAULT_PORT: "9100",
      PORTLIGHT_PERSIST_SERVERS: "no",
      PORTLIGHT_MAX_CONNECTIONS: "8",
      PORTLIGHT_REQUEST_TIMEOUT_MS: "1500",
      PORTLIGHT_MAX_HEADER_BYTES: "4096",
      PORTLIGHT_SCAN_TTL_MS: "500",
      PORTLIGHT_VERBOSE: "TRUE",
    });

    expect(config).toEqual({
      defaultPort: 9100,
      persistServers: false,
      maxConnections: 8,
      requestTimeoutMs: 1_500,
      maxHeaderBytes: 4_096,
      scanTtlMs: 500,
      verbose: true,
    });
  });

  it("ignores values that do not parse", () => {
    const config = resolveConfig(
      { defaultPort: 8500, persistServers: false },
      {
        PORTLIGHT_DEFAULT_PORT: "70000",
        PORTLIGHT_PERSIST_SERVERS: "maybe",
        PORTLIGHT_MAX_CONNECTIONS: "0",
        PORTLIGHT_REQUEST_TIMEOUT_MS: "-5",
        PORTLIGHT_VERBOSE: "",
      },
    );

    expect(config.defaultPort).toBe(8500);
    expect(config.persistServers).toBe(false);
    expect(config.maxConnections).toBe(50);
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.verbose).toBe(false);
  });
});
