import { next, previous, quit, setSpeed } from '../../src/core/commands';
import { ContinuousPolicy } from '../../src/features/scroll/motor';
import type { AdvancementPolicy, VoiceView } from '../../src/scroll/policy';

const VOICE: VoiceView = { enabled: false, available: false };

describe('ContinuousPolicy', () => {
  let now = 0;
  const clock = () => now;
  const right = setSpeed('keyboard', { kind: 'delta', direction: 1 });
  const left = setSpeed('keyboard', { kind: 'delta', direction: -1 });

  // 10 chars, 10-wide viewport: offsets run 0..20; 10 chars/sec at 1x.
  function motor() {
    return new ContinuousPolicy('abcdefghij', {
      viewportWidth: 10,
      baseSpeed: 10,
      speedLadder: [1, 1.5, 2],
      tapWindowMs: 300,
      now: clock,
    });
  }

  beforeEach(() => {
    now = 0;
  });

  test('starts paused at the beginning', () => {
    const m = motor();
    expect(m.getState()).toEqual({ offset: 0, velocity: 0, direction: 1 });
    expect(m.tick(1000)).toBe(false);
    expect(m.frame()).toMatchObject({ kind: 'scroll', paused: true, progress: 0 });
  });

  test('renders through the policy interface, ignoring the voice view', () => {
    const policy: AdvancementPolicy = motor();
    policy.apply(next('keyboard'));
    policy.tick(1000);
    expect(policy.frame(VOICE)).toMatchObject({ kind: 'scroll', offset: 10, paused: false, progress: 0.5 });
  });

  test('space resumes at the base step and pauses again', () => {
    const m = motor();
    expect(m.apply(next('keyboard'))).toBe(true);
    expect(m.getMultiplier()).toBe(1);
    m.tick(1000);
    expect(m.getState()).toEqual({ offset: 10, velocity: 10, direction: 1 });
    expect(m.apply(next('keyboard'))).toBe(true);
    expect(m.tick(1000)).toBe(false);
    expect(m.getState().offset).toBe(10);
  });

  test('quick taps climb the ladder and stop at its top', () => {
    const m = motor();
    expect(m.apply(right)).toBe(true);
    expect(m.getMultiplier()).toBe(1);
    now = 100;
    m.apply(right);
    expect(m.getMultiplier()).toBe(1.5);
    now = 200;
    m.apply(right);
    expect(m.getMultiplier()).toBe(2);
    now = 300;
    expect(m.apply(right)).toBe(false);
    expect(m.getMultiplier()).toBe(2);
  });

  test('a slow tap starts the ladder over', () => {
    const m = motor();
    m.apply(right);
    now = 100;
    m.apply(right);
    now = 1000;
    m.apply(right);
    expect(m.getMultiplier()).toBe(1);
  });

  test('the opposite direction reverses and resets to the base step', () => {
    const m = motor();
    m.apply(right);
    now = 100;
    m.apply(right);
    now = 150;
    expect(m.apply(left)).toBe(true);
    expect(m.getState()).toEqual({ offset: 0, velocity: 10, direction: -1 });
  });

  test('hitting the end stops the motor without exiting', () => {
    const m = motor();
    m.apply(next('keyboard'));
    m.tick(5000);
    expect(m.getState()).toEqual({ offset: 20, velocity: 0, direction: 1 });
    expect(m.status()).toBe('active');
    expect(m.frame()).toMatchObject({ progress: 1, paused: true });
  });

  test('hitting the start stops the motor too', () => {
    const m = motor();
    m.apply(next('keyboard'));
    m.tick(500);
    m.apply(left);
    m.tick(100_000);
    expect(m.getState()).toEqual({ offset: 0, velocity: 0, direction: -1 });
  });

  test('digits set the speed directly and pause keeps the last one', () => {
    const m = motor();
    expect(m.apply(setSpeed('keyboard', { kind: 'absolute', multiplier: 1.5 }))).toBe(true);
    expect(m.apply(setSpeed('keyboard', { kind: 'absolute', multiplier: 0 }))).toBe(true);
    expect(m.getMultiplier()).toBe(0);
    m.apply(next('keyboard'));
    expect(m.getMultiplier()).toBe(1.5);
  });

  test('a narrower viewport re-clamps the offset', () => {
    const m = motor();
    m.apply(next('keyboard'));
    m.tick(5000);
    m.setViewportWidth(5);
    expect(m.getState().offset).toBe(15);
    expect(m.maxOffset).toBe(15);
  });

  test('only quit exits; previous is ignored', () => {
    const m = motor();
    expect(m.apply(previous('keyboard'))).toBe(false);
    expect(m.apply(quit('keyboard'))).toBe(true);
    expect(m.status()).toBe('exited');
    expect(m.apply(next('keyboard'))).toBe(false);
    expect(m.position()).toBe(-1);
    expect(m.expectedUnit()).toBeNull();
  });

  test('a broken ladder falls back to 1x', () => {
    const m = new ContinuousPolicy('abc', { viewportWidth: 4, baseSpeed: 10, speedLadder: [0, -2], tapWindowMs: 300, now: clock });
    m.apply(right);
    expect(m.getMultiplier()).toBe(1);
  });
});
