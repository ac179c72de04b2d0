import type { Command } from '../core/commands';
import type { Frame } from '../ui/frame';

export type PolicyKind = 'step' | 'scroll';

export type PolicyStatus = 'active' | 'done' | 'exited';

export interface VoiceView {
  enabled: boolean;
  available: boolean;
}

/**
 * Cursor owner. The engine feeds it commands and elapsed time; the policy
 * never blocks, never throws after construction.
 */
export interface AdvancementPolicy {
  readonly kind: PolicyKind;
  status(): PolicyStatus;
  /** True when the command changed visible state. */
  apply(cmd: Command): boolean;
  /** Advance time-based state; true when something moved. */
  tick(dtMs: number): boolean;
  /** Changes whenever the unit on screen changes, even to an identical string. */
  position(): number;
  /** The unit the speaker should be reading, or null when there is none. */
  expectedUnit(): string | null;
  frame(voice: VoiceView): Frame;
}

export function isTerminal(status: PolicyStatus): boolean {
  return status !== 'active';
}
