import { emitKeypressEvents } from 'node:readline';
import type { CommandChannel } from '../core/channel';
import { describeCommand } from '../core/commands';
import { debugLog, traceLog } from '../env/logging';
import type { PolicyKind } from '../scroll/policy';
import type { PrompterSession } from '../state/session';
import { mapKey, type KeyPress } from './keymap';

/**
 * Turns keypresses on `input` into commands. Event driven: nothing here
 * ever waits, and listening ends with the session stop signal.
 */
export class KeyboardSource {
  private readonly input: NodeJS.ReadableStream;
  private readonly channel: CommandChannel;
  private readonly session: PrompterSession;
  private readonly kind: PolicyKind;
  private listening = false;

  constructor(input: NodeJS.ReadableStream, channel: CommandChannel, session: PrompterSession, kind: PolicyKind) {
    this.input = input;
    this.channel = channel;
    this.session = session;
    this.kind = kind;
  }

  isListening(): boolean {
    return this.listening;
  }

  start(): void {
    if (this.listening || this.session.stopped) return;
    emitKeypressEvents(this.input);
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
    this.session.signal.addEventListener('abort', this.stop, { once: true });
    this.listening = true;
    debugLog('keys', 'listening');
  }

  readonly stop = (): void => {
    if (!this.listening) return;
    this.listening = false;
    this.input.off('keypress', this.onKeypress);
    this.input.pause();
    this.session.signal.removeEventListener('abort', this.stop);
    debugLog('keys', 'stopped');
  };

  private readonly onKeypress = (_str: string | undefined, key: KeyPress | undefined): void => {
    if (!key || this.session.stopped) return;
    const cmd = mapKey(key, this.kind);
    if (!cmd) return;
    traceLog('keys', key.name ?? key.sequence, '→', describeCommand(cmd));
    this.channel.push(cmd);
  };
}
