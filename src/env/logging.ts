// src/env/logging.ts
// Central log-level helpers. Everything goes to stderr; while the prompter
// owns the screen, lines are held and written once it is handed back.
// Levels:
// 0 = silent
// 1 = normal (state transitions + warnings/errors)
// 2 = verbose detail
// 3 = trace/stack heavy diagnostics

const MIN_LOG_LEVEL = 0;
const MAX_LOG_LEVEL = 3;
const DEFAULT_LOG_LEVEL = 1;
const ENV_KEY = 'PROMPTER_LOG_LEVEL';

const MAX_HELD_LINES = 200;

type ConsoleMethod = 'error' | 'warn';
interface HeldLine {
  method: ConsoleMethod;
  args: unknown[];
}

const tagLastAt = new Map<string, number>();
let runtimeLevel: number | null = null;
let heldLines: HeldLine[] | null = null;

function clampLogLevel(value: number): number {
  if (!Number.isFinite(value)) return MIN_LOG_LEVEL;
  return Math.max(MIN_LOG_LEVEL, Math.min(MAX_LOG_LEVEL, Math.floor(value)));
}

function parseLogLevelRaw(value: unknown): number | null {
  if (value == null || value === '') return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return null;
  return clampLogLevel(parsed);
}

export function setLogLevel(level: number | null): void {
  runtimeLevel = level == null ? null : clampLogLevel(level);
}

export function getLogLevel(): number {
  if (runtimeLevel != null) return runtimeLevel;
  const fromEnv = parseLogLevelRaw(process.env[ENV_KEY]);
  if (fromEnv != null) return fromEnv;
  return DEFAULT_LOG_LEVEL;
}

export function shouldLogLevel(minLevel: number): boolean {
  return getLogLevel() >= clampLogLevel(minLevel);
}

export function shouldLogTag(
  tag: string,
  minLevel = 2,
  throttleMs = 500,
): boolean {
  if (!shouldLogLevel(minLevel)) return false;
  const throttle = Math.max(0, Math.floor(throttleMs));
  if (!tag || throttle <= 0) return true;
  const now = Date.now();
  const last = tagLastAt.get(tag) ?? 0;
  if (now - last < throttle) return false;
  tagLastAt.set(tag, now);
  return true;
}

export function resetLogThrottle(): void {
  tagLastAt.clear();
}

function emit(method: ConsoleMethod, tag: string, args: unknown[]): void {
  const line = [`[${tag}]`, ...args];
  if (heldLines) {
    if (heldLines.length >= MAX_HELD_LINES) heldLines.shift();
    heldLines.push({ method, args: line });
    return;
  }
  console[method](...line);
}

/**
 * Queue log output instead of writing it. The returned function flushes the
 * queue (oldest lines are dropped past MAX_HELD_LINES). Nested holds are no-ops.
 */
export function holdConsole(): () => void {
  if (heldLines) return () => undefined;
  heldLines = [];
  return () => {
    const lines = heldLines ?? [];
    heldLines = null;
    for (const { method, args } of lines) console[method](...args);
  };
}

export function debugLog(tag: string, ...args: unknown[]): void {
  if (!shouldLogLevel(2)) return;
  emit('error', tag, args);
}

export function traceLog(tag: string, ...args: unknown[]): void {
  if (!shouldLogLevel(3)) return;
  emit('error', tag, args);
}

export function infoLog(tag: string, ...args: unknown[]): void {
  if (!shouldLogLevel(1)) return;
  emit('error', tag, args);
}

export function warnLog(tag: string, ...args: unknown[]): void {
  if (!shouldLogLevel(1)) return;
  emit('warn', tag, args);
}
