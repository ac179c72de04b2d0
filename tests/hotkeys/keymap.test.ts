import { mapKey } from '../../src/hotkeys/keymap';

describe('mapKey', () => {
  test('step mode: forward and back', () => {
    expect(mapKey({ name: 'space' }, 'step')).toEqual({ type: 'next', source: 'keyboard' });
    expect(mapKey({ name: 'return' }, 'step')).toEqual({ type: 'next', source: 'keyboard' });
    expect(mapKey({ name: 'right' }, 'step')).toEqual({ type: 'next', source: 'keyboard' });
    expect(mapKey({ name: 'b' }, 'step')).toEqual({ type: 'previous', source: 'keyboard' });
    expect(mapKey({ name: 'left' }, 'step')).toEqual({ type: 'previous', source: 'keyboard' });
  });

  test('scroll mode: arrows change speed, digits set it', () => {
    expect(mapKey({ name: 'right' }, 'scroll')).toEqual({
      type: 'set-speed',
      source: 'keyboard',
      change: { kind: 'delta', direction: 1 },
    });
    expect(mapKey({ name: 'left' }, 'scroll')).toEqual({
      type: 'set-speed',
      source: 'keyboard',
      change: { kind: 'delta', direction: -1 },
    });
    expect(mapKey({ name: '2', sequence: '2' }, 'scroll')).toEqual({
      type: 'set-speed',
      source: 'keyboard',
      change: { kind: 'absolute', multiplier: 1.5 },
    });
    expect(mapKey({ name: 'space' }, 'scroll')).toEqual({ type: 'next', source: 'keyboard' });
    expect(mapKey({ name: 'b' }, 'scroll')).toBeNull();
  });

  test('quit and voice keys work in both modes', () => {
    for (const kind of ['step', 'scroll'] as const) {
      expect(mapKey({ name: 'q' }, kind)).toEqual({ type: 'quit', source: 'keyboard' });
      expect(mapKey({ name: 'escape' }, kind)).toEqual({ type: 'quit', source: 'keyboard' });
      expect(mapKey({ name: 'c', ctrl: true }, kind)).toEqual({ type: 'quit', source: 'keyboard' });
      expect(mapKey({ name: 'v' }, kind)).toEqual({ type: 'toggle-voice', source: 'keyboard' });
    }
  });

  test('a bare space sequence counts as space', () => {
    expect(mapKey({ sequence: ' ' }, 'step')).toEqual({ type: 'next', source: 'keyboard' });
  });

  test('unmapped keys and other modifiers are ignored', () => {
    expect(mapKey({ name: 'x' }, 'step')).toBeNull();
    expect(mapKey({ name: '2' }, 'step')).toBeNull();
    expect(mapKey({ name: 'q', meta: true }, 'step')).toBeNull();
    expect(mapKey({ name: 'b', ctrl: true }, 'step')).toBeNull();
  });
});
