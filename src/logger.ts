// Console logging with "[LEVEL] [Component] message key=value" lines.
// Components take a Logger so tests can pass spies instead of console.

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(component: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Minimal console surface, so output can be captured. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export function formatContext(context?: LogContext): string {
  if (!context) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    const text = typeof value === "string" && /\s/.test(value) ? JSON.stringify(value) : String(value);
    parts.push(`${key}=${text}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function formatLine(level: LogLevel, component: string, message: string, context?: LogContext): string {
  return `[${level.toUpperCase()}] [${component}] ${message}${formatContext(context)}`;
}

export function createLogger(
  component: string,
  options: { level?: LogLevel; sink?: LogSink } = {},
): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? "info"];
  const sink: LogSink = options.sink ?? console;

  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < minLevel) return;
    const line = formatLine(level, component, message, context);
    if (level === "error") sink.error(line);
    else if (level === "warn") sink.warn(line);
    else sink.log(line);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (name) => createLogger(`${component}:${name}`, options),
  };
}

/** Discards everything. Used where no logger is injected in tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
