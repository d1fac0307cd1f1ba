export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;
export type LogEntry = {
  ts: number;
  level: LogLevel;
  tag: string;
  message: string;
  context?: LogContext;
};

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const tagEnabled = new Map<string, boolean>();
const logBuffer: LogEntry[] = [];
const LOG_BUFFER_SIZE = 200;
let minLevel: LogLevel = "info";

export function setLogEnabled(tag: string, enabled: boolean): void {
  tagEnabled.set(tag, enabled);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function shouldLog(tag: string, level: LogLevel): boolean {
  if (level === "error" || level === "warn") return true;
  const explicit = tagEnabled.get(tag);
  if (explicit !== undefined) return explicit;
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

function format(tag: string, message: string): string {
  return `[StatusLedger][${tag}] ${message}`;
}

function pushLog(entry: LogEntry): void {
  logBuffer.push(entry);
  if (logBuffer.length > LOG_BUFFER_SIZE) {
    logBuffer.splice(0, logBuffer.length - LOG_BUFFER_SIZE);
  }
}

function emit(level: LogLevel, tag: string, message: string, context?: LogContext): void {
  if (!shouldLog(tag, level)) return;
  const line = format(tag, message);
  pushLog({ ts: Date.now(), level, tag, message, context });
  if (level === "error") {
    console.error(line, context ?? "");
    return;
  }
  if (level === "warn") {
    console.warn(line, context ?? "");
    return;
  }
  if (level === "debug") {
    console.debug(line, context ?? "");
    return;
  }
  console.log(line, context ?? "");
}

export function getLogger(tag: string): Logger {
  return {
    debug: (message, context) => emit("debug", tag, message, context),
    info: (message, context) => emit("info", tag, message, context),
    warn: (message, context) => emit("warn", tag, message, context),
    error: (message, context) => emit("error", tag, message, context),
  };
}

export function getLogBuffer(limit = 20): LogEntry[] {
  if (limit <= 0) return [];
  return logBuffer.slice(-limit);
}

export function clearLogBuffer(): void {
  logBuffer.length = 0;
}

export function createCorrelationId(prefix = "submit"): string {
  if (typeof crypto !== "undefined" && "randomUUID" in crypto) {
    return `${prefix}_${crypto.randomUUID()}`;
  }
  return `${prefix}_${Date.now()}_${Math.random().toString(36).slice(2, 10)}`;
}
