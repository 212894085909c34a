type LogContext = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value != null && value in LEVEL_ORDER;
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return LEVEL_ORDER[isLogLevel(configured) ? configured : "info"];
}

function emit(level: LogLevel, msg: string, context?: LogContext) {
  if (LEVEL_ORDER[level] < threshold()) return;
  const entry = { level, msg, ts: new Date().toISOString(), ...context };
  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export type Logger = {
  debug: (msg: string, context?: LogContext) => void;
  info: (msg: string, context?: LogContext) => void;
  warn: (msg: string, context?: LogContext) => void;
  error: (msg: string, context?: LogContext) => void;
  /** Logger that merges `bindings` into every entry (e.g. a run id). */
  child: (bindings: LogContext) => Logger;
};

function createLogger(bindings: LogContext = {}): Logger {
  const withBindings = (context?: LogContext) => ({ ...bindings, ...context });
  return {
    debug: (msg, context) => emit("debug", msg, withBindings(context)),
    info: (msg, context) => emit("info", msg, withBindings(context)),
    warn: (msg, context) => emit("warn", msg, withBindings(context)),
    error: (msg, context) => emit("error", msg, withBindings(context)),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const log = createLogger();
