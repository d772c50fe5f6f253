export interface ListeningPortRecord {
  readonly port: number;
  readonly pid: number;
  readonly processName: string;
  readonly address: string;
}

interface NameField {
  address: string;
  port: number;
}

const UNKNOWN_PROCESS_NAME = "unknown";
const LISTEN_MARKER = "(LISTEN)";
// COMMAND PID USER FD TYPE DEVICE SIZE/OFF NODE NAME, with "(LISTEN)" split off the name.
const MIN_TABULAR_COLUMNS = 10;
const INT32_MAX = 2_147_483_647;

function parsePid(value: string): number | undefined {
  const normalized = value.trim();
  if (!/^\d+$/.test(normalized)) {
    return undefined;
  }

  const pid = Number.parseInt(normalized, 10);
  return pid <= INT32_MAX ? pid : undefined;
}

function parsePort(value: string): number | undefined {
  const normalized = value.trim();
  if (!/^\d+$/.test(normalized)) {
    return undefined;
  }

  const port = Number.parseInt(normalized, 10);
  return port <= 65_535 ? port : undefined;
}

/** Splits `address:port` on the last colon so bracketed IPv6 addresses survive. */
export function parseNameField(value: string): NameField | undefined {
  const trimmed = value.trim();
  const lastColon = trimmed.lastIndexOf(":");
  if (lastColon === -1) {
    return undefined;
  }

  const port = parsePort(trimmed.slice(lastColon + 1));
  if (port === undefined) {
    return undefined;
  }

  return {
    address: trimmed.slice(0, lastColon).trim(),
    port,
  };
}

function toRecord(nameField: NameField, pid: number, processName: string | undefined): ListeningPortRecord {
  return Object.freeze({
    port: nameField.port,
    pid,
    processName: processName === undefined || processName.length === 0 ? UNKNOWN_PROCESS_NAME : processName,
    address: nameField.address,
  });
}

class RecordCollector {
  public readonly records: ListeningPortRecord[] = [];
  private readonly seenPorts = new Set<number>();

  public add(record: ListeningPortRecord): void {
    if (this.seenPorts.has(record.port)) {
      return;
    }

    this.seenPorts.add(record.port);
    this.records.push(record);
  }
}

function toLines(output: string): string[] {
  return output.split(/\r?\n/).filter((line) => line.length > 0);
}

/**
 * Parses `lsof -F` output, where each line starts with a field tag:
 * `p` opens a process, `c` names its command, `n` carries `address:port`.
 */
export function parseFieldOutput(output: string): ListeningPortRecord[] {
  const collector = new RecordCollector();
  let currentPid: number | undefined;
  let currentCommand: string | undefined;

  for (const line of toLines(output)) {
    const value = line.slice(1);
    switch (line[0]) {
      case "p":
        currentPid = parsePid(value);
        currentCommand = undefined;
        break;
      case "c":
        currentCommand = value;
        break;
      case "n": {
        if (currentPid === undefined) {
          break;
        }

        const nameField = parseNameField(value);
        if (nameField !== undefined) {
          collector.add(toRecord(nameField, currentPid, currentCommand));
        }
        break;
      }
      default:
        break;
    }
  }

  return collector.records;
}

/** Parses the default column layout of `lsof`, one socket per line. */
export function parseTabularOutput(output: string): ListeningPortRecord[] {
  const collector = new RecordCollector();

  for (const line of toLines(output)) {
    const columns = line.trim().split(/\s+/);
    if (columns.length < MIN_TABULAR_COLUMNS || columns[columns.length - 1] !== LISTEN_MARKER) {
      continue;
    }

    const pid = parsePid(columns[1] ?? "");
    const nameField = parseNameField(columns[columns.length - 2] ?? "");
    if (pid === undefined || nameField === undefined) {
      continue;
    }

    collector.add(toRecord(nameField, pid, columns[0]));
  }

  return collector.records;
}

function isTabularOutput(output: string): boolean {
  const firstLine = toLines(output)[0]?.trim() ?? "";
  return firstLine.startsWith("COMMAND ") || firstLine.endsWith(LISTEN_MARKER);
}

export function parseListeningPorts(output: string): ListeningPortRecord[] {
  return isTabularOutput(output) ? parseTabularOutput(output) : parseFieldOutput(output);
}
