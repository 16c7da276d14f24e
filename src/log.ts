export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.TASKTRACK_DEBUG === "1") {
    return "debug";
  }
  const configured = LOG_LEVELS.find((l) => l === env.TASKTRACK_LOG_LEVEL?.toLowerCase());
  return configured ?? "info";
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    const text = String(value);
    parts.push(/\s/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/**
 * Line-oriented logger writing to stderr, so that stdout stays clean for
 * command output (and for --json consumers).
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? resolveLogLevel());
  const write = options.write ?? ((line: string) => process.stderr.write(line + "\n"));
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    write(
      `${now().toISOString()} ${level.toUpperCase()} ${scope}: ${message}${formatFields(fields)}`,
    );
  }

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
  };
}

export function errorFields(err: unknown): LogFields {
  if (err instanceof Error) {
    return { error: err.name, detail: err.message };
  }
  return { error: String(err) };
}
