import { Bus } from '../core/bus';
import { infoLog } from '../env/logging';
import { Mailbox } from './mailbox';

export type StopReason = 'quit' | 'done' | 'error' | 'signal';

export type SessionEvents = {
  'voice-state': { enabled: boolean; available: boolean };
  stop: { reason: StopReason };
};

export interface SessionState {
  voiceEnabled: boolean;
  voiceAvailable: boolean;
  stopped: boolean;
  stopReason: StopReason | null;
}

/**
 * Everything shared across the input sources and the engine lives here:
 * the voice flag, the expected-unit mailbox and the one-shot stop signal.
 */
export class PrompterSession {
  readonly expected = new Mailbox<string>();
  readonly events = new Bus<SessionEvents>();
  private readonly stopController = new AbortController();
  private _voiceEnabled: boolean;
  private _voiceAvailable: boolean;
  private _stopReason: StopReason | null = null;

  constructor(opts: { voice: boolean }) {
    this._voiceAvailable = opts.voice;
    this._voiceEnabled = opts.voice;
  }

  get signal(): AbortSignal {
    return this.stopController.signal;
  }

  get voiceEnabled(): boolean {
    return this._voiceEnabled;
  }

  get voiceAvailable(): boolean {
    return this._voiceAvailable;
  }

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  /** Flip the voice flag; no-op (returns false) once voice is unavailable. */
  toggleVoice(): boolean {
    if (!this._voiceAvailable) return false;
    this._voiceEnabled = !this._voiceEnabled;
    infoLog('session', `voice ${this._voiceEnabled ? 'on' : 'off'}`);
    this.emitVoiceState();
    return true;
  }

  /** Voice source gave up on the device: manual-only from here on. */
  markVoiceUnavailable(): void {
    if (!this._voiceAvailable && !this._voiceEnabled) return;
    this._voiceAvailable = false;
    this._voiceEnabled = false;
    this.emitVoiceState();
  }

  /** Set once, never unset. Later calls keep the first reason. */
  stop(reason: StopReason): void {
    if (this.stopped) return;
    this._stopReason = reason;
    this.stopController.abort();
    this.events.emit('stop', { reason });
  }

  getState(): SessionState {
    return {
      voiceEnabled: this._voiceEnabled,
      voiceAvailable: this._voiceAvailable,
      stopped: this.stopped,
      stopReason: this._stopReason,
    };
  }

  private emitVoiceState(): void {
    this.events.emit('voice-state', { enabled: this._voiceEnabled, available: this._voiceAvailable });
  }
}
