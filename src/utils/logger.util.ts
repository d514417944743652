import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const parseLevel = (raw: string | undefined): LogLevel => {
  const normalized = (raw ?? "").toLowerCase().trim();
  if (normalized === "trace") return "debug";
  if (
    normalized === "error" ||
    normalized === "warn" ||
    normalized === "info" ||
    normalized === "debug"
  ) {
    return normalized;
  }
  return "info";
};

const resolveLevelFromEnv = (): LogLevel => {
  const read = (key: string): string | undefined =>
    process.env[key] ?? process.env[key.toLowerCase()];
  if (read("DEBUG") === "1") {
    return "debug";
  }
  return parseLevel(read("LOG_LEVEL"));
};

// Secrets shorter than this are not masked: they would match ordinary text.
const MIN_REDACTABLE_LENGTH = 6;

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  /** Values masked wherever they appear in an emitted line */
  secrets?: Array<string | undefined>;
};

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly secrets: string[];

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? resolveLevelFromEnv();
    this.secrets = (options.secrets ?? []).filter(
      (s): s is string => typeof s === "string" && s.length >= MIN_REDACTABLE_LENGTH,
    );
  }

  info(msg: string): void {
    if (!this.shouldLog("info")) return;
    console.log(chalk.cyan("[INFO]"), this.redact(msg));
  }

  warn(msg: string): void {
    if (!this.shouldLog("warn")) return;
    console.warn(chalk.yellow("[WARN]"), this.redact(msg));
  }

  error(msg: string, err?: Error): void {
    if (!this.shouldLog("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      this.redact(msg),
      err ? `\n${this.redact(err.stack ?? err.message)}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.shouldLog("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), this.redact(msg));
  }

  /**
   * Replace every registered secret with a length-only marker
   */
  redact(text: string): string {
    let out = text;
    for (const secret of this.secrets) {
      out = out.split(secret).join(`[REDACTED len=${secret.length}]`);
    }
    return out;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }
}
