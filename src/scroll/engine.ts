// Advancement engine: the single consumer of the command channel and the
// sole owner of cursor state. The loop never blocks longer than one tick,
// so quit and the stop signal are seen within `tickMs`.
import type { CommandChannel } from '../core/channel';
import { describeCommand, type Command } from '../core/commands';
import { systemClock, type Clock } from '../core/timing';
import { debugLog, infoLog, shouldLogTag, traceLog, warnLog } from '../env/logging';
import type { PrompterSession } from '../state/session';
import type { PresentationSink } from '../ui/frame';
import { isTerminal, type AdvancementPolicy } from './policy';

export type EngineExit = 'done' | 'exited';

export interface EngineOptions {
  tickMs: number;
  now?: Clock;
}

export class AdvancementEngine {
  private readonly policy: AdvancementPolicy;
  private readonly channel: CommandChannel;
  private readonly session: PrompterSession;
  private readonly sink: PresentationSink;
  private readonly tickMs: number;
  private readonly now: Clock;
  private dirty = true;
  private postedPosition: number | null = null;

  constructor(
    policy: AdvancementPolicy,
    channel: CommandChannel,
    session: PrompterSession,
    sink: PresentationSink,
    opts: EngineOptions,
  ) {
    this.policy = policy;
    this.channel = channel;
    this.session = session;
    this.sink = sink;
    this.tickMs = Math.max(1, opts.tickMs);
    this.now = opts.now ?? systemClock;
  }

  /** Apply one command. Returns true when the screen needs a redraw. */
  dispatch(cmd: Command): boolean {
    if (isTerminal(this.policy.status())) return false;
    traceLog('engine', describeCommand(cmd));
    let changed: boolean;
    switch (cmd.type) {
      case 'toggle-voice':
        changed = this.session.toggleVoice();
        if (!changed) warnLog('engine', 'voice unavailable; manual mode only');
        break;
      case 'quit':
        changed = this.policy.apply(cmd);
        this.session.stop('quit');
        break;
      default:
        changed = this.policy.apply(cmd);
    }
    if (changed) {
      this.dirty = true;
      this.publishExpected();
    }
    return changed;
  }

  /** Force a redraw on the next loop pass (terminal resize and the like). */
  invalidate(): void {
    this.dirty = true;
  }

  /** Draw now if anything changed since the last draw. */
  flush(): void {
    // nothing to show after quit; the terminal is about to be handed back
    if (!this.dirty || this.policy.status() === 'exited') return;
    this.dirty = false;
    try {
      this.sink.render(this.policy.frame({
        enabled: this.session.voiceEnabled,
        available: this.session.voiceAvailable,
      }));
    } catch (err) {
      if (shouldLogTag('engine:render', 1, 1000)) warnLog('engine', 'render failed', err);
    }
  }

  async run(): Promise<EngineExit> {
    const signal = this.session.signal;
    const offVoice = this.session.events.on('voice-state', () => this.invalidate());
    this.publishExpected();
    this.dirty = true;
    this.flush();
    infoLog('engine', `started (${this.policy.kind})`);

    let last = this.now();
    try {
      while (!signal.aborted && !isTerminal(this.policy.status())) {
        const cmd = await this.channel.receive(this.tickMs, signal);
        if (cmd) this.dispatch(cmd);
        const at = this.now();
        if (this.policy.tick(at - last)) this.dirty = true;
        last = at;
        this.flush();
      }
    } finally {
      offVoice();
    }
    return this.finish();
  }

  private finish(): EngineExit {
    const status = this.policy.status();
    this.channel.close();
    this.session.expected.clear();
    if (status === 'done') {
      this.flush();
      this.session.stop('done');
      infoLog('engine', 'script finished');
      return 'done';
    }
    debugLog('engine', `exited (${this.session.getState().stopReason ?? 'quit'})`);
    this.session.stop('quit');
    return 'exited';
  }

  // Hand the unit on screen to the voice source, replacing whatever was there.
  private publishExpected(): void {
    const position = this.policy.position();
    if (position === this.postedPosition) return;
    this.postedPosition = position;
    const unit = this.policy.expectedUnit();
    if (unit == null) this.session.expected.clear();
    else this.session.expected.post(unit);
  }
}
