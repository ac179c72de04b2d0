// =============================================================
// File: src/speech/engines/command.ts
// =============================================================
import { spawn, type ChildProcess } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BackendError,
  CaptureTimeoutError,
  DeviceError,
  UnrecognizedError,
  describeError,
} from '../../core/errors';
import { debugLog } from '../../env/logging';
import type { AudioClip, CaptureOptions, SpeechBackend } from '../backend';

/**
 * sox `rec`: wait for sound, stop after {pause}s of silence, never record
 * longer than {max}s.
 */
export const DEFAULT_CAPTURE_COMMAND =
  'rec -q -c 1 -r 16000 {out} silence 1 0.1 1% 1 {pause} 1% trim 0 {max}';

const DEFAULT_TRANSCRIBE_TIMEOUT_MS = 20_000;
// A WAV header alone is 44 bytes.
const MIN_AUDIO_BYTES = 45;

export interface CommandEngineOptions {
  captureCommand?: string;
  transcribeCommand?: string | null;
  tmpDir?: string;
  transcribeTimeoutMs?: number;
}

export interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: Error;
  stdout: string;
  stderr: string;
}

export type CaptureVerdict = 'clip' | 'timeout' | 'device';

export type TranscribeVerdict =
  | { kind: 'text'; text: string }
  | { kind: 'unrecognized' }
  | { kind: 'backend'; message: string };

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Replace `{name}` placeholders with shell-quoted values; unknown names stay. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole: string, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? shellQuote(vars[name]) : whole,
  );
}

function firstLine(text: string): string {
  return text.split('\n').map((l) => l.trim()).find(Boolean) ?? '';
}

export function classifyCapture(result: ProcessResult, audioBytes: number): CaptureVerdict {
  if (result.spawnError) return 'device';
  if (result.code === 126 || result.code === 127) return 'device';
  if (result.timedOut || result.aborted) return 'timeout';
  if (result.code !== 0) return 'device';
  return audioBytes >= MIN_AUDIO_BYTES ? 'clip' : 'timeout';
}

export function classifyTranscribe(result: ProcessResult): TranscribeVerdict {
  if (result.spawnError) return { kind: 'backend', message: result.spawnError.message };
  if (result.timedOut) return { kind: 'backend', message: 'transcriber timed out' };
  if (result.code !== 0) {
    const detail = firstLine(result.stderr);
    return { kind: 'backend', message: `transcriber exited ${result.code ?? result.signal}${detail ? `: ${detail}` : ''}` };
  }
  const text = result.stdout.replace(/\s+/g, ' ').trim();
  return text ? { kind: 'text', text } : { kind: 'unrecognized' };
}

// Grace period between SIGTERM and SIGKILL for a stopped command.
const KILL_GRACE_MS = 1000;

/**
 * Signal the whole process group. Commands run through `sh -c`, so a
 * pipeline's members only die when the group does.
 */
function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  // the shell may be gone while the rest of its group still holds stdout
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    debugLog('speech', `group kill failed (${describeError(err)}); signalling the shell only`);
    child.kill(signal);
  }
}

export function runCommand(command: string, opts: { timeoutMs: number; signal?: AbortSignal }): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | null = null;
    // stdin stays ignored: the prompter owns the terminal in raw mode.
    // detached puts the command in its own process group.
    const child = spawn(command, { shell: true, detached: true, stdio: ['ignore', 'pipe', 'pipe'] });

    const stop = () => {
      if (killTimer) return;
      killGroup(child, 'SIGTERM');
      killTimer = setTimeout(() => killGroup(child, 'SIGKILL'), KILL_GRACE_MS);
    };
    const timer = setTimeout(() => {
      timedOut = true;
      stop();
    }, Math.max(1, opts.timeoutMs));
    opts.signal?.addEventListener('abort', stop, { once: true });

    const finish = (code: number | null, signal: NodeJS.Signals | null, spawnError?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      opts.signal?.removeEventListener('abort', stop);
      resolve({ code, signal, timedOut, aborted: !!opts.signal?.aborted, spawnError, stdout, stderr });
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', (err) => finish(null, null, err));
    child.on('close', (code, signal) => finish(code, signal));
    if (opts.signal?.aborted) stop();
  });
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

/**
 * Speech backend that shells out: one process records an utterance to a
 * temp file, another prints its transcript on stdout.
 */
export class CommandSpeechEngine implements SpeechBackend {
  readonly name = 'command';
  readonly canTranscribe: boolean;
  private readonly captureCommand: string;
  private readonly transcribeCommand: string | null;
  private readonly tmpDir: string;
  private readonly transcribeTimeoutMs: number;

  constructor(opts: CommandEngineOptions = {}) {
    this.captureCommand = opts.captureCommand?.trim() || DEFAULT_CAPTURE_COMMAND;
    this.transcribeCommand = opts.transcribeCommand?.trim() || null;
    this.canTranscribe = this.transcribeCommand != null;
    this.tmpDir = opts.tmpDir ?? tmpdir();
    this.transcribeTimeoutMs = opts.transcribeTimeoutMs ?? DEFAULT_TRANSCRIBE_TIMEOUT_MS;
  }

  async capture(opts: CaptureOptions): Promise<AudioClip> {
    const id = randomUUID();
    const path = join(this.tmpDir, `voice-prompter-${id}.wav`);
    const command = fillTemplate(this.captureCommand, {
      out: path,
      pause: (opts.pauseThresholdMs / 1000).toFixed(2),
      max: (opts.maxDurationMs / 1000).toFixed(2),
      timeout: (opts.timeoutMs / 1000).toFixed(2),
    });
    debugLog('speech', 'capture', command);
    const result = await runCommand(command, {
      timeoutMs: opts.timeoutMs + opts.maxDurationMs,
      signal: opts.signal,
    });
    const verdict = classifyCapture(result, await fileSize(path));
    if (verdict === 'clip') return { id, path, capturedAt: Date.now() };

    await rm(path, { force: true });
    if (verdict === 'device') {
      const detail = result.spawnError?.message || firstLine(result.stderr) || `exit ${result.code}`;
      throw new DeviceError(`capture command failed: ${detail}`, { cause: result.spawnError });
    }
    throw new CaptureTimeoutError();
  }

  async transcribe(clip: AudioClip, locale: string, signal?: AbortSignal): Promise<string> {
    if (!this.transcribeCommand) throw new BackendError('no transcribe command configured');
    if (!clip.path) throw new BackendError(`clip ${clip.id} has no audio file`);
    const command = fillTemplate(this.transcribeCommand, { in: clip.path, lang: locale });
    debugLog('speech', 'transcribe', command);
    const verdict = classifyTranscribe(await runCommand(command, { timeoutMs: this.transcribeTimeoutMs, signal }));
    if (verdict.kind === 'unrecognized') throw new UnrecognizedError();
    if (verdict.kind === 'backend') throw new BackendError(verdict.message);
    return verdict.text;
  }

  async release(clip: AudioClip): Promise<void> {
    if (clip.path) await rm(clip.path, { force: true });
  }
}

export function createCommandSpeechEngine(opts?: CommandEngineOptions): CommandSpeechEngine {
  return new CommandSpeechEngine(opts);
}
