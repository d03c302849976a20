/**
 * Line-oriented logger.
 *
 * One line per record, prefixed with a bracketed component tag:
 *
 *   [commitfs/pipeline] info committed 3f2a1c0 on main: [add] a.txt – seed
 *
 * Written to stderr so CLI stdout stays machine-readable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  child(component: string): Logger;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

function formatFields(fields: Record<string, unknown> | undefined): string {
  if (!fields) return "";
  const parts: string[] = [];
  for (const key of Object.keys(fields).sort()) {
    const value = fields[key];
    if (value === undefined) continue;
    parts.push(
      `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`,
    );
  }
  return parts.length > 0 ? " " + parts.join(" ") : "";
}

export function createLogger(
  component: string,
  level: LogLevel = "info",
  sink: LogSink = stderrSink,
): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (
    at: LogLevel,
    message: string,
    fields?: Record<string, unknown>,
  ): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    sink(`[${component}] ${at} ${message}${formatFields(fields)}`);
  };
  return {
    debug: (m, f) => emit("debug", m, f),
    info: (m, f) => emit("info", m, f),
    warn: (m, f) => emit("warn", m, f),
    error: (m, f) => emit("error", m, f),
    child: (sub) => createLogger(`${component}/${sub}`, level, sink),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
