export type OutputWriter = Pick<NodeJS.WriteStream, "write">;

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
  verbose?: boolean;
  scope?: string;
  now?: () => Date;
}

export class Logger {
  private readonly verbose: boolean;
  private readonly scope: string | undefined;
  private readonly now: () => Date;

  public constructor(
    private readonly output: OutputWriter | undefined,
    options: LoggerOptions = {},
  ) {
    this.verbose = options.verbose === true;
    this.scope = options.scope;
    this.now = options.now ?? (() => new Date());
  }

  /** A logger that drops every line. Components default to it. */
  public static silent(): Logger {
    return new Logger(undefined);
  }

  public child(scope: string): Logger {
    return new Logger(this.output, {
      verbose: this.verbose,
      scope: this.scope === undefined ? scope : `${this.scope}:${scope}`,
      now: this.now,
    });
  }

  public debug(message: string): void {
    if (!this.verbose) {
      return;
    }

    this.print("DEBUG", message);
  }

  public info(message: string): void {
    this.print("INFO", message);
  }

  public warn(message: string): void {
    this.print("WARN", message);
  }

  public error(message: string): void {
    this.print("ERROR", message);
  }

  private print(level: LogLevel, message: string): void {
    if (this.output === undefined) {
      return;
    }

    const scope = this.scope === undefined ? "" : ` [${this.scope}]`;
    this.output.write(`[${this.now().toISOString()}] [${level}]${scope} ${message}\n`);
  }
}
