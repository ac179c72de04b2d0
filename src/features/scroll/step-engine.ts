import type { Command } from '../../core/commands';
import { EmptyScriptError } from '../../core/errors';
import type { AdvancementPolicy, PolicyStatus, VoiceView } from '../../scroll/policy';
import type { ScriptUnit } from '../../script/segment';
import type { Frame } from '../../ui/frame';

export type StepState =
  | { kind: 'active'; index: number }
  | { kind: 'done' }
  | { kind: 'exited'; index: number };

/**
 * Discrete policy: integer cursor over the units.
 * active(i) --next--> active(i+1) | done
 * active(i) --previous--> active(i-1) (no-op at 0)
 * any --quit--> exited
 * done ignores next/previous; exited ignores everything.
 */
export class DiscretePolicy implements AdvancementPolicy {
  readonly kind = 'step';
  private readonly units: readonly ScriptUnit[];
  private state: StepState = { kind: 'active', index: 0 };

  constructor(units: readonly ScriptUnit[]) {
    if (!units.length) throw new EmptyScriptError();
    this.units = units;
  }

  get total(): number {
    return this.units.length;
  }

  getState(): StepState {
    return { ...this.state };
  }

  /** `total` once done. */
  cursor(): number {
    return this.state.kind === 'done' ? this.units.length : this.state.index;
  }

  status(): PolicyStatus {
    return this.state.kind;
  }

  position(): number {
    return this.cursor();
  }

  apply(cmd: Command): boolean {
    const state = this.state;
    if (state.kind === 'exited') return false;
    if (cmd.type === 'quit') {
      this.state = { kind: 'exited', index: this.cursor() };
      return true;
    }
    if (state.kind === 'done') return false;

    switch (cmd.type) {
      case 'next':
        this.state = state.index + 1 < this.units.length
          ? { kind: 'active', index: state.index + 1 }
          : { kind: 'done' };
        return true;
      case 'previous':
        if (state.index === 0) return false;
        this.state = { kind: 'active', index: state.index - 1 };
        return true;
      default:
        return false;
    }
  }

  tick(): boolean {
    return false;
  }

  expectedUnit(): string | null {
    return this.state.kind === 'active' ? this.units[this.state.index] : null;
  }

  frame(voice: VoiceView): Frame {
    if (this.state.kind !== 'active') return { kind: 'done', total: this.units.length };
    return {
      kind: 'step',
      unit: this.units[this.state.index],
      index: this.state.index,
      total: this.units.length,
      voiceEnabled: voice.enabled,
      voiceAvailable: voice.available,
    };
  }
}
