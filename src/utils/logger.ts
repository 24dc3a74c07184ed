export type Level = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

/** Thin interface so services can take an injected logger. */
export interface Logger {
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
  log?(level: Level, category: string, msg: string, meta?: unknown): void;
}

const LEVELS: readonly Level[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

let context: Record<string, string | number | boolean> = {};
const redactKeys = new Set<string>(['secret', 'token', 'password', 'authorization']);
const onceFlags = new Set<string>();

/**
 * Numeric weight of a level: TRACE=0, DEBUG=10, INFO=20, WARN=30, ERROR=40, FATAL=50.
 */
function levelValue(l: Level): number {
  return LEVELS.indexOf(l) * 10;
}

function isLevel(value: string): value is Level {
  return LEVELS.some(l => l === value);
}

/** Threshold from LOG_LEVEL; anything unrecognised falls back to INFO. */
function currentThreshold(): number {
  const env = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return levelValue(isLevel(env) ? env : "INFO");
}

function ts(): string { return new Date().toISOString(); }

function redactMeta(meta: unknown): unknown {
  if (meta == null || typeof meta !== 'object') return meta;
  if (Array.isArray(meta)) return meta.map(redactMeta);
  const out: Record<string, unknown> = {};
  let redacted = false;
  for (const [k, v] of Object.entries(meta)) {
    if (redactKeys.has(k.toLowerCase())) { out[k] = '***'; redacted = true; continue; }
    out[k] = redactMeta(v);
  }
  if (redacted) out.redacted = true;
  return out;
}

function write(level: Level, line: string, extra: unknown[]) {
  if (level === "ERROR" || level === "FATAL") console.error(line, ...extra);
  else if (level === "WARN") console.warn(line, ...extra);
  else console.log(line, ...extra);
}

/**
 * Emits a record when its level clears the LOG_LEVEL threshold.
 * LOG_JSON=1 switches to one JSON object per line; the logger context is merged into every record.
 */
function emit(level: Level, category: string | undefined, message: string, meta?: unknown) {
  if (levelValue(level) < currentThreshold()) return;
  const redMeta = redactMeta(meta);
  if (process.env.LOG_JSON === "1") {
    const entry = {
      ts: ts(),
      level,
      category,
      message,
      data: redMeta != null ? [redMeta] : [],
      ...context
    };
    write(level, JSON.stringify(entry), []);
    return;
  }

  let ctxStr = "";
  if (Object.keys(context).length > 0) {
    ctxStr = " " + Object.entries(context).map(([k, v]) => `[${k}=${String(v)}]`).join(" ");
  }
  const prefix = `[${level}]${category ? `[${category}]` : ''}`;
  write(level, `${prefix} ${message}${ctxStr}`, redMeta != null ? [redMeta] : []);
}

/** Merge keys into the context attached to every record. */
export function setLoggerContext(ctx: Record<string, string | number | boolean>) {
  context = { ...context, ...ctx };
}

/** Drop the given context keys, or all of them when called without arguments. */
export function clearLoggerContext(keys?: string[]) {
  if (!keys) { context = {}; return; }
  const next = { ...context };
  for (const k of keys) delete next[k];
  context = next;
}

export function addLoggerRedactFields(keys: string[]) {
  for (const k of keys) redactKeys.add(String(k).toLowerCase());
}

/** WARN once per id for the life of the process. */
export function warnOnce(id: string, message: string, meta?: unknown, category = 'CONFIG') {
  if (onceFlags.has(id)) return;
  onceFlags.add(id);
  emit('WARN', category, message, meta);
}

/** Test helper: forget which warnOnce ids have fired. */
export function resetWarnOnce() {
  onceFlags.clear();
}

export function logTrace(message: string, meta?: unknown) { emit("TRACE", undefined, message, meta); }
export function logDebug(message: string, meta?: unknown) { emit("DEBUG", undefined, message, meta); }
export function logInfo(message: string, meta?: unknown) { emit("INFO", undefined, message, meta); }
export function logWarn(message: string, meta?: unknown) { emit("WARN", undefined, message, meta); }
export function logError(message: string, meta?: unknown) { emit("ERROR", undefined, message, meta); }

export function log(level: Level, category: string, message: string, meta?: unknown) {
  emit(level, category, message, meta);
}

export const logger: Logger = {
  debug: (msg, meta) => emit("DEBUG", undefined, msg, meta),
  info: (msg, meta) => emit("INFO", undefined, msg, meta),
  warn: (msg, meta) => emit("WARN", undefined, msg, meta),
  error: (msg, meta) => emit("ERROR", undefined, msg, meta),
  log: (level, category, msg, meta) => emit(level, category, msg, meta),
};
