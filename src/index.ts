export { resolveConfig, type PortlightConfig } from "./config.js";
export {
  BindError,
  FileAccessError,
  HttpError,
  InvalidRootError,
  LimitExceededError,
  PathViolationError,
  ProtocolError,
  type BindFailureReason,
  type HttpErrorStatus,
} from "./errors.js";
export { escapeHtml, percentEncodePath, resolveContentType, sanitizeHeaderValue } from "./http-utils.js";
export { Logger, type LoggerOptions, type OutputWriter } from "./logger.js";
export { parseListeningPorts, type ListeningPortRecord } from "./port-parser.js";
export { LSOF_SCAN_COMMAND, PortScanner, type CommandResult, type CommandRunner, type PortScannerOptions } from "./port-scanner.js";
export { PathSandbox, type SandboxTarget } from "./sandbox.js";
export { StaticServer, type StaticServerOptions } from "./server.js";
export {
  ServerManager,
  type RestoreResult,
  type ServerInstance,
  type ServerManagerOptions,
} from "./server-manager.js";
export { readState, updateState, writeState, type PortlightState, type SavedServer } from "./state.js";
