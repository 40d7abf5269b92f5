export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevel(l: string): l is keyof typeof LEVELS {
  return l in LEVELS;
}

function minLevel(): number {
  const l = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevel(l) ? LEVELS[l] : LEVELS.info;
}

function emit(level: LogLevel, msg: string, obj: Record<string, unknown>) {
  if (LEVELS[level] < minLevel()) return;
  const line = JSON.stringify({ level, msg, ...obj });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function logDebug(msg: string, obj: Record<string, unknown> = {}) {
  emit("debug", msg, obj);
}
export function logInfo(msg: string, obj: Record<string, unknown> = {}) {
  emit("info", msg, obj);
}
export function logWarn(msg: string, obj: Record<string, unknown> = {}) {
  emit("warn", msg, obj);
}
export function logError(msg: string, obj: Record<string, unknown> = {}) {
  emit("error", msg, obj);
}
