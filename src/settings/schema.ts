// src/settings/schema.ts
import { readFile } from 'node:fs/promises';
import { ConfigError, describeError } from '../core/errors';
import { warnLog } from '../env/logging';
import type { SegmentMode } from '../script/segment';
import type { PolicyKind } from '../scroll/policy';
import { VOICE_TRIGGERS, type VoiceTrigger } from '../speech/triggers';
import type { BackendErrorPolicy } from '../speech/voice-source';

export interface PrompterConfig {
  mode: PolicyKind;
  segment: Exclude<SegmentMode, 'flat'>;
  manual: boolean;
  trigger: VoiceTrigger;
  minWords: number;
  matchThreshold: number;      // 0.0–1.0
  pauseThresholdSec: number;   // silence that ends an utterance
  captureTimeoutSec: number;
  maxPhraseSec: number;
  maxUnitLength: number;
  baseSpeed: number;           // chars/sec at 1×
  speedLadder: number[];
  tapWindowMs: number;
  tickMs: number;
  idlePollMs: number;
  backendBackoffMs: number;
  onBackendError: BackendErrorPolicy;
  locale: string;
  captureCommand: string | null;
  transcribeCommand: string | null;
  displayPort: number | null;
  displayToken: string | null;
}

export const DEFAULT_CONFIG: Readonly<PrompterConfig> = Object.freeze({
  mode: 'step',
  segment: 'sentence',
  manual: false,
  trigger: 'words',
  minWords: 3,
  matchThreshold: 0.4,
  pauseThresholdSec: 1.5,
  captureTimeoutSec: 30,
  maxPhraseSec: 15,
  maxUnitLength: 150,
  baseSpeed: 15,
  speedLadder: [1, 1.5, 2],
  tapWindowMs: 300,
  tickMs: 16,
  idlePollMs: 200,
  backendBackoffMs: 500,
  onBackendError: 'retry',
  locale: 'en-US',
  captureCommand: null,
  transcribeCommand: null,
  displayPort: null,
  displayToken: null,
});

export type ConfigInput = { [K in keyof PrompterConfig]?: unknown };

function isConfigKey(key: string): key is keyof PrompterConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  const v = String(value ?? '').toLowerCase();
  return allowed.find((option) => option === v) ?? fallback;
}

function num(value: unknown, fallback: number, min: number, max: number): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, n));
}

function int(value: unknown, fallback: number, min: number, max: number): number {
  return Math.round(num(value, fallback, min, max));
}

function bool(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return fallback;
}

function text(value: unknown, fallback: string | null): string | null {
  if (typeof value !== 'string') return fallback;
  const trimmed = value.trim();
  return trimmed || fallback;
}

function ladder(value: unknown, fallback: readonly number[]): number[] {
  if (!Array.isArray(value)) return [...fallback];
  const steps = value
    .map((step) => (typeof step === 'number' ? step : Number(step)))
    .filter((step) => Number.isFinite(step) && step > 0);
  return steps.length ? steps : [...fallback];
}

/**
 * Fill gaps from defaults and clamp everything into a sane range.
 * Unknown enum values fall back to the default rather than failing.
 */
export function normalizeConfig(input: ConfigInput = {}, base: Readonly<PrompterConfig> = DEFAULT_CONFIG): PrompterConfig {
  const port = input.displayPort === null ? null : int(input.displayPort, base.displayPort ?? -1, -1, 65535);
  return {
    mode: pick(input.mode, ['step', 'scroll'], base.mode),
    segment: pick(input.segment, ['sentence', 'paragraph'], base.segment),
    manual: bool(input.manual, base.manual),
    trigger: pick(input.trigger, VOICE_TRIGGERS, base.trigger),
    minWords: int(input.minWords, base.minWords, 1, 50),
    matchThreshold: num(input.matchThreshold, base.matchThreshold, 0, 1),
    pauseThresholdSec: num(input.pauseThresholdSec, base.pauseThresholdSec, 0.1, 10),
    captureTimeoutSec: num(input.captureTimeoutSec, base.captureTimeoutSec, 0.5, 300),
    maxPhraseSec: num(input.maxPhraseSec, base.maxPhraseSec, 1, 120),
    maxUnitLength: int(input.maxUnitLength, base.maxUnitLength, 20, 2000),
    baseSpeed: num(input.baseSpeed, base.baseSpeed, 1, 200),
    speedLadder: ladder(input.speedLadder, base.speedLadder),
    tapWindowMs: int(input.tapWindowMs, base.tapWindowMs, 0, 2000),
    tickMs: int(input.tickMs, base.tickMs, 5, 200),
    idlePollMs: int(input.idlePollMs, base.idlePollMs, 10, 5000),
    backendBackoffMs: int(input.backendBackoffMs, base.backendBackoffMs, 0, 60_000),
    onBackendError: pick(input.onBackendError, ['retry', 'advance'], base.onBackendError),
    locale: text(input.locale, base.locale) ?? DEFAULT_CONFIG.locale,
    captureCommand: text(input.captureCommand, base.captureCommand),
    transcribeCommand: text(input.transcribeCommand, base.transcribeCommand),
    displayPort: port != null && port >= 0 ? port : null,
    displayToken: text(input.displayToken, base.displayToken),
  };
}

/** Parse a JSON config file into raw (not yet normalized) values. */
export async function loadConfigFile(path: string): Promise<ConfigInput> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config ${path}: ${describeError(err)}`, { cause: err });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config ${path} is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Config ${path} must be a JSON object`);
  }
  const out: ConfigInput = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key)) {
      out[key] = value;
    } else {
      warnLog('config', `ignoring unknown key "${key}" in ${path}`);
    }
  }
  return out;
}
