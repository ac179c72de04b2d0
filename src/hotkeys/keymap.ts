// =============================================================
// File: src/hotkeys/keymap.ts
// =============================================================
import {
  next,
  previous,
  quit,
  setSpeed,
  toggleVoice,
  type Command,
} from '../core/commands';
import type { PolicyKind } from '../scroll/policy';

/** Shape of a readline keypress. */
export interface KeyPress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

// Digit keys pick a speed directly in scroll mode; 0 stops.
const ABSOLUTE_SPEEDS: Record<string, number> = { '0': 0, '1': 1, '2': 1.5, '3': 2 };

function keyName(key: KeyPress): string {
  if (key.name) return key.name.toLowerCase();
  if (key.sequence === ' ') return 'space';
  return (key.sequence ?? '').toLowerCase();
}

export function mapKey(key: KeyPress, kind: PolicyKind): Command | null {
  const name = keyName(key);
  if (key.ctrl && (name === 'c' || name === 'd')) return quit('keyboard');
  if (key.ctrl || key.meta) return null;

  switch (name) {
    case 'q':
    case 'escape':
      return quit('keyboard');
    case 'v':
      return toggleVoice('keyboard');
    case 'space':
    case 'return':
    case 'enter':
      return next('keyboard');
  }

  if (kind === 'step') {
    if (name === 'right' || name === 'down' || name === 'pagedown') return next('keyboard');
    if (name === 'b' || name === 'left' || name === 'up' || name === 'pageup') return previous('keyboard');
    return null;
  }

  if (name === 'right') return setSpeed('keyboard', { kind: 'delta', direction: 1 });
  if (name === 'left') return setSpeed('keyboard', { kind: 'delta', direction: -1 });
  if (Object.prototype.hasOwnProperty.call(ABSOLUTE_SPEEDS, name)) {
    return setSpeed('keyboard', { kind: 'absolute', multiplier: ABSOLUTE_SPEEDS[name] });
  }
  return null;
}

export const KEY_HELP: Record<PolicyKind, string> = {
  step: 'SPACE/ENTER next · B back · V voice · Q quit',
  scroll: '→/← speed · SPACE pause · 0-3 set speed · Q quit',
};
