import type { CommandChannel } from '../core/channel';
import { next } from '../core/commands';
import {
  CaptureTimeoutError,
  DeviceError,
  UnrecognizedError,
  describeError,
} from '../core/errors';
import { sleep, systemClock } from '../core/timing';
import { debugLog, shouldLogTag, warnLog } from '../env/logging';
import type { PrompterSession } from '../state/session';
import type { AudioClip, SpeechBackend } from './backend';
import { needsTranscript, shouldAdvance, type VoiceTrigger } from './triggers';

export type BackendErrorPolicy = 'retry' | 'advance';

export interface VoiceSourceOptions {
  trigger: VoiceTrigger;
  minWords: number;
  matchThreshold: number;
  captureTimeoutMs: number;
  maxPhraseMs: number;
  pauseThresholdMs: number;
  idlePollMs: number;
  backoffMs: number;
  onBackendError: BackendErrorPolicy;
  locale: string;
}

export type VoiceOutcome =
  | 'advanced'
  | 'rejected'
  | 'stale'
  | 'timeout'
  | 'unrecognized'
  | 'backend-error'
  | 'device-lost'
  | 'stopped';

/**
 * Produces `next` commands from speech. One capture at a time; every wait
 * is bounded and observes the session stop signal.
 */
export class VoiceSource {
  private readonly backend: SpeechBackend;
  private readonly channel: CommandChannel;
  private readonly session: PrompterSession;
  private readonly opts: VoiceSourceOptions;

  constructor(backend: SpeechBackend, channel: CommandChannel, session: PrompterSession, opts: VoiceSourceOptions) {
    this.backend = backend;
    this.channel = channel;
    this.session = session;
    this.opts = opts;
  }

  async run(): Promise<void> {
    const signal = this.session.signal;
    debugLog('voice', 'source started', { backend: this.backend.name, trigger: this.opts.trigger });
    while (!signal.aborted) {
      if (!this.session.voiceEnabled) {
        if (!this.session.voiceAvailable) break;
        await sleep(this.opts.idlePollMs, signal);
        continue;
      }
      const startedAt = systemClock();
      const outcome = await this.attempt();
      if (outcome === 'device-lost') break;
      // a capture that gives up at once (muted input, header-only file) must not respawn in a tight loop
      if (outcome === 'timeout' && systemClock() - startedAt < this.opts.idlePollMs) {
        await sleep(this.opts.idlePollMs, signal);
      }
    }
    debugLog('voice', 'source stopped');
  }

  /** One capture → transcribe → decide cycle. */
  async attempt(): Promise<VoiceOutcome> {
    const signal = this.session.signal;
    const { version } = this.session.expected.peek();

    let clip: AudioClip;
    try {
      clip = await this.backend.capture({
        timeoutMs: this.opts.captureTimeoutMs,
        maxDurationMs: this.opts.maxPhraseMs,
        pauseThresholdMs: this.opts.pauseThresholdMs,
        signal,
      });
    } catch (err) {
      if (signal.aborted) return 'stopped';
      if (err instanceof CaptureTimeoutError) return 'timeout';
      const reason = err instanceof DeviceError ? err.message : describeError(err);
      warnLog('voice', `microphone unavailable (${reason}); manual mode`);
      this.session.markVoiceUnavailable();
      return 'device-lost';
    }

    try {
      return await this.decide(clip, version, signal);
    } finally {
      await this.backend.release(clip).catch((err: unknown) => {
        debugLog('voice', 'release failed', describeError(err));
      });
    }
  }

  private async decide(clip: AudioClip, version: number, signal: AbortSignal): Promise<VoiceOutcome> {
    if (signal.aborted) return 'stopped';
    let transcript: string | null = null;

    if (needsTranscript(this.opts.trigger)) {
      try {
        transcript = await this.backend.transcribe(clip, this.opts.locale, signal);
      } catch (err) {
        if (signal.aborted) return 'stopped';
        if (err instanceof UnrecognizedError) {
          if (shouldLogTag('voice:miss')) debugLog('voice', 'not understood');
          return 'unrecognized';
        }
        return this.onBackendFailure(err, version, signal);
      }
    }

    if (!this.isCurrent(version)) return 'stale';
    const expected = this.session.expected.peek().value;
    if (!shouldAdvance(this.opts.trigger, transcript, expected, this.opts)) {
      debugLog('voice', 'heard, not advancing', { transcript });
      return 'rejected';
    }
    this.channel.push(next('voice'));
    return 'advanced';
  }

  private async onBackendFailure(err: unknown, version: number, signal: AbortSignal): Promise<VoiceOutcome> {
    const reason = describeError(err);
    if (this.opts.onBackendError === 'advance') {
      warnLog('voice', `speech backend error (${reason}); advancing`);
      if (!this.isCurrent(version)) return 'stale';
      this.channel.push(next('voice'));
      return 'advanced';
    }
    warnLog('voice', `speech backend error (${reason}); retrying in ${this.opts.backoffMs}ms`);
    await sleep(this.opts.backoffMs, signal);
    return 'backend-error';
  }

  // Voice switched off, or the unit moved on while we were listening.
  private isCurrent(version: number): boolean {
    return this.session.voiceEnabled && this.session.expected.isCurrent(version);
  }
}
