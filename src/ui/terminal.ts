// Scoped terminal ownership: raw mode, hidden cursor and the alternate
// screen are taken once per session and always given back.
import { TerminalStateError, describeError } from '../core/errors';
import { debugLog, holdConsole } from '../env/logging';

export const ENTER_ALT_SCREEN = '\x1b[?1049h';
export const LEAVE_ALT_SCREEN = '\x1b[?1049l';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';

export interface RawModeInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput {
  write(chunk: string): boolean;
  isTTY?: boolean;
  columns?: number;
  rows?: number;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export function terminalSize(output: TerminalOutput): TerminalSize {
  const columns = output.columns && output.columns > 0 ? output.columns : FALLBACK_SIZE.columns;
  const rows = output.rows && output.rows > 0 ? output.rows : FALLBACK_SIZE.rows;
  return { columns, rows };
}

export interface TerminalLease {
  readonly raw: boolean;
  release(): void;
}

export function acquireTerminal(input: RawModeInput, output: TerminalOutput): TerminalLease {
  const wasRaw = input.isRaw === true;
  const canRaw = input.isTTY === true && typeof input.setRawMode === 'function';
  if (canRaw) input.setRawMode?.(true);
  if (output.isTTY) output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
  debugLog('terminal', 'acquired', { raw: canRaw });
  // stderr shares the tty; log lines would land on top of the frame
  const releaseConsole = output.isTTY ? holdConsole() : () => undefined;

  let released = false;
  return {
    raw: canRaw,
    release() {
      if (released) return;
      released = true;
      let failure: unknown = null;
      if (canRaw) {
        try {
          input.setRawMode?.(wasRaw);
        } catch (err) {
          failure = err;
        }
      }
      if (output.isTTY) output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
      releaseConsole();
      debugLog('terminal', 'released');
      if (failure) {
        throw new TerminalStateError(`could not restore terminal mode: ${describeError(failure)}`, { cause: failure });
      }
    },
  };
}

/** Run `fn` with the terminal acquired; released on every exit path. */
export async function withTerminal<T>(
  input: RawModeInput,
  output: TerminalOutput,
  fn: (lease: TerminalLease) => Promise<T>,
): Promise<T> {
  const lease = acquireTerminal(input, output);
  try {
    return await fn(lease);
  } finally {
    lease.release();
  }
}
