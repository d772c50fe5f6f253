#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { realpathSync } from "node:fs";
import { networkInterfaces } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { type PortlightConfig, resolveConfig } from "./config.js";
import { Logger, type OutputWriter } from "./logger.js";
import { type ListeningPortRecord } from "./port-parser.js";
import { type CommandRunner, PortScanner } from "./port-scanner.js";
import { type ServerInstance, ServerManager } from "./server-manager.js";
import { parsePortNumber, readState, type SavedServer, updateState } from "./state.js";

interface PortsCommandOptions {
  json?: boolean;
  fresh?: boolean;
}

interface ServeCommandOptions {
  port?: string;
  lan?: boolean;
}

interface SavedCommandOptions {
  json?: boolean;
}

export interface CliRuntime {
  waitForShutdown: () => Promise<void>;
  runCommand?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

interface CliContext {
  config: PortlightConfig;
  logger: Logger;
  scanner: PortScanner;
  manager: ServerManager;
  /** Cleared before shutdown so stopping servers does not erase them from the saved list. */
  persistence: { enabled: boolean };
}

function waitForTerminationSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve();
    };

    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
}

const defaultCliRuntime: CliRuntime = {
  waitForShutdown: waitForTerminationSignal,
};

function formatTable(rows: string[][]): string {
  const columnCount = rows[0]?.length ?? 0;
  const columnWidths = Array.from({ length: columnCount }, (_, columnIndex) =>
    Math.max(...rows.map((row) => row[columnIndex]?.length ?? 0)),
  );

  return rows
    .map((row) => row.map((cell, index) => (cell ?? "").padEnd(columnWidths[index] ?? 0)).join("  ").trimEnd())
    .join("\n");
}

function formatPortRows(records: readonly ListeningPortRecord[]): string[][] {
  return [
    ["PORT", "PID", "PROCESS", "ADDRESS"],
    ...records.map((record) => [`${record.port}`, `${record.pid}`, record.processName, record.address]),
  ];
}

function formatSavedRows(servers: readonly SavedServer[]): string[][] {
  return [
    ["PORT", "ACCESS", "DIRECTORY"],
    ...servers.map((server) => [`${server.port}`, server.exposeToLAN ? "lan" : "local", server.directoryPath]),
  ];
}

function listLanAddresses(): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(networkInterfaces())) {
    for (const entry of entries ?? []) {
      if (entry.family === "IPv4" && !entry.internal) {
        addresses.push(entry.address);
      }
    }
  }

  return addresses;
}

export function toServerUrls(instance: ServerInstance, lanAddresses: readonly string[] = listLanAddresses()): string[] {
  const urls = [`http://localhost:${instance.port}/`];
  if (instance.exposeToLAN) {
    urls.push(...lanAddresses.map((address) => `http://${address}:${instance.port}/`));
  }

  return urls;
}

function warnIfExposed(stderr: OutputWriter, instance: ServerInstance): void {
  if (instance.exposeToLAN) {
    stderr.write(`Warning: ${instance.rootDirectory} is reachable from the local network on port ${instance.port}\n`);
  }
}

/** Replaces saved entries for the directories this process serves, keeping the rest. */
function mergeSavedServers(existing: readonly SavedServer[], running: readonly SavedServer[]): SavedServer[] {
  const runningDirectories = new Set(running.map((server) => server.directoryPath));
  return [...existing.filter((server) => !runningDirectories.has(server.directoryPath)), ...running];
}

function createCliContext(stderr: OutputWriter, runtime: CliRuntime): CliContext {
  const state = readState();
  const config = resolveConfig(state, runtime.env ?? process.env);
  const logger = new Logger(stderr, { verbose: config.verbose });
  const scanner = new PortScanner({
    ttlMs: config.scanTtlMs,
    runCommand: runtime.runCommand,
    logger: logger.child("scanner"),
  });
  const persistence = { enabled: true };
  const manager = new ServerManager({
    scanner,
    limits: {
      maxConnections: config.maxConnections,
      requestTimeoutMs: config.requestTimeoutMs,
      maxHeaderBytes: config.maxHeaderBytes,
    },
    logger: logger.child("servers"),
    onServerFailure: (instance, error) => {
      logger.error(`Server on port ${instance.port} stopped: ${error.message}`);
    },
    onServersChanged: (running) => {
      if (!persistence.enabled) {
        return;
      }

      updateState((currentState) => {
        currentState.servers = config.persistServers ? mergeSavedServers(currentState.servers, running) : [];
      });
    },
  });

  return { config, logger, scanner, manager, persistence };
}

async function runUntilShutdown(context: CliContext, runtime: CliRuntime): Promise<void> {
  try {
    await runtime.waitForShutdown();
  } finally {
    context.persistence.enabled = false;
    await context.manager.stopAllServers();
  }
}

function parsePortOption(value: string): number {
  const port = parsePortNumber(value);
  if (port === undefined) {
    throw new Error(`Invalid port: ${value}`);
  }

  return port;
}

export function buildProgram(stdout: OutputWriter, stderr: OutputWriter, runtime: CliRuntime = defaultCliRuntime): Command {
  const program = new Command();

  program.name("portlight").description("List listening TCP ports and serve directories over HTTP").exitOverride();

  program.configureOutput({
    writeOut: (message) => {
      stdout.write(message);
    },
    writeErr: (message) => {
      stderr.write(message);
    },
  });

  program
    .command("ports")
    .description("List processes listening on TCP ports")
    .option("--json", "Print records as JSON")
    .option("--fresh", "Bypass the scan cache")
    .action(async (options: PortsCommandOptions) => {
      const { scanner } = createCliContext(stderr, runtime);
      const records = options.fresh === true ? await scanner.forceScan() : await scanner.scan();

      if (options.json === true) {
        stdout.write(`${JSON.stringify(records, null, 2)}\n`);
        return;
      }

      if (records.length === 0) {
        stdout.write("No listening TCP ports found.\n");
        return;
      }

      stdout.write(`${formatTable(formatPortRows(records))}\n`);
    });

  program
    .command("serve")
    .description("Serve a directory over HTTP until interrupted")
    .argument("<directory>")
    .option("-p, --port <port>", "Port to bind (defaults to the first free port from the configured default)")
    .option("--lan", "Accept connections from the local network, not only localhost")
    .action(async (directory: string, options: ServeCommandOptions) => {
      const context = createCliContext(stderr, runtime);
      const port =
        typeof options.port === "string" ? parsePortOption(options.port) : await context.manager.findAvailablePort(context.config.defaultPort);
      const instance = await context.manager.startServer(port, path.resolve(directory), options.lan === true);

      stderr.write(`Serving ${instance.rootDirectory}\n`);
      warnIfExposed(stderr, instance);
      for (const url of toServerUrls(instance)) {
        stdout.write(`${url}\n`);
      }

      await runUntilShutdown(context, runtime);
    });

  program
    .command("restore")
    .description("Start every saved server until interrupted")
    .action(async () => {
      const context = createCliContext(stderr, runtime);
      const { restored, skipped } = await context.manager.restoreServers(readState().servers);

      for (const { entry, reason } of skipped) {
        stderr.write(`Skipped ${entry.directoryPath} (${reason})\n`);
      }

      if (restored.length === 0) {
        stderr.write("No saved servers to restore.\n");
        return;
      }

      for (const instance of restored) {
        stdout.write(`${instance.rootDirectory} -> ${toServerUrls(instance).join(" ")}\n`);
        warnIfExposed(stderr, instance);
      }

      await runUntilShutdown(context, runtime);
    });

  program
    .command("saved")
    .description("List saved servers")
    .option("--json", "Print saved servers as JSON")
    .action((options: SavedCommandOptions) => {
      const { servers } = readState();
      if (options.json === true) {
        stdout.write(`${JSON.stringify(servers, null, 2)}\n`);
        return;
      }

      if (servers.length === 0) {
        stdout.write("No saved servers.\n");
        return;
      }

      stdout.write(`${formatTable(formatSavedRows(servers))}\n`);
    });

  program
    .command("forget")
    .description("Remove a saved server")
    .argument("<port>")
    .action((rawPort: string) => {
      const port = parsePortOption(rawPort);
      let removed = false;
      updateState((currentState) => {
        const remaining = currentState.servers.filter((server) => server.port !== port);
        removed = remaining.length !== currentState.servers.length;
        currentState.servers = remaining;
      });

      if (!removed) {
        throw new Error(`No saved server on port ${port}`);
      }
    });

  return program;
}

export async function run(
  argv: string[] = process.argv,
  stdout: OutputWriter = process.stdout,
  stderr: OutputWriter = process.stderr,
  runtime: CliRuntime = defaultCliRuntime,
): Promise<number> {
  const program = buildProgram(stdout, stderr, runtime);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const message = error instanceof Error ? error.message : "Unknown error";
    stderr.write(`${message}\n`);
    return 1;
  }
}

/** True when `entry` names this module, including through an npm bin symlink. */
export function isMainModule(entry: string | undefined = process.argv[1], moduleUrl: string = import.meta.url): boolean {
  if (!entry) {
    return false;
  }

  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return path.resolve(entry) === fileURLToPath(moduleUrl);
  }
}

if (isMainModule()) {
  void run().then((code) => {
    process.exitCode = code;
  });
}
