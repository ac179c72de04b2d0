// Error taxonomy shared by the sources, the engine and boot.
// Only ConfigError is fatal; the rest are recovered where they surface.

export type PrompterErrorCode =
  | 'config'
  | 'device'
  | 'capture-timeout'
  | 'unrecognized'
  | 'backend'
  | 'terminal-state';

export class PrompterError extends Error {
  readonly code: PrompterErrorCode;

  constructor(code: PrompterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad file path, bad flag or config value. Reported before the engine starts. */
export class ConfigError extends PrompterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

export class EmptyScriptError extends ConfigError {
  constructor(message = 'No text found in script') {
    super(message);
  }
}

/** Microphone or capture tool missing. Degrades to manual-only mode. */
export class DeviceError extends PrompterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('device', message, options);
  }
}

/** Nothing was said before the capture deadline. */
export class CaptureTimeoutError extends PrompterError {
  constructor(message = 'No speech captured before timeout') {
    super('capture-timeout', message);
  }
}

/** Speech was captured but the backend could not make words of it. */
export class UnrecognizedError extends PrompterError {
  constructor(message = 'Speech not understood') {
    super('unrecognized', message);
  }
}

/** Transcription service failed (crash, network, deadline). */
export class BackendError extends PrompterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('backend', message, options);
  }
}

export class TerminalStateError extends PrompterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('terminal-state', message, options);
  }
}

export function isFatal(err: unknown): boolean {
  return err instanceof ConfigError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  // errors raised by Node internals under a vm context fail instanceof
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
