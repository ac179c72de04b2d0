// Speech backend contract. The core never recognizes speech itself; it
// asks a backend to capture one utterance and to transcribe it.
//
// capture    → AudioClip | CaptureTimeoutError | DeviceError
// transcribe → text      | UnrecognizedError  | BackendError

export interface AudioClip {
  readonly id: string;
  /** Where the audio landed, for backends that go through files. */
  readonly path?: string;
  readonly capturedAt: number;
}

export interface CaptureOptions {
  /** How long to wait for speech to start. */
  timeoutMs: number;
  /** Hard cap on one utterance. */
  maxDurationMs: number;
  /** Silence that ends an utterance. */
  pauseThresholdMs: number;
  signal?: AbortSignal;
}

export interface SpeechBackend {
  readonly name: string;
  /** False when the backend can capture but has nothing to transcribe with. */
  readonly canTranscribe: boolean;
  capture(opts: CaptureOptions): Promise<AudioClip>;
  transcribe(clip: AudioClip, locale: string, signal?: AbortSignal): Promise<string>;
  release(clip: AudioClip): Promise<void>;
}
