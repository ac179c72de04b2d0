import type { ScrollFrame, StepFrame } from '../../src/ui/frame';
import {
  CLEAR_SCREEN,
  TerminalRenderer,
  center,
  formatMultiplier,
  layoutDone,
  layoutFrame,
  layoutScroll,
  layoutStep,
  marqueeWindow,
  progressBar,
  speedIndicator,
  voiceStatus,
  wrapWords,
} from '../../src/ui/render';

const GREY = '\x1b[90m';
const BOLD_WHITE = '\x1b[1;97m';
const RESET = '\x1b[0m';

describe('render helpers', () => {
  test('wrapWords packs greedily', () => {
    expect(wrapWords('the quick brown fox', 10)).toEqual(['the quick', 'brown fox']);
    expect(wrapWords('  ', 10)).toEqual([]);
  });

  test('center pads on the left only', () => {
    expect(center('ab', 6)).toBe('  ab');
    expect(center('too wide', 4)).toBe('too wide');
  });

  test('marqueeWindow slides over the padded text', () => {
    expect(marqueeWindow('hello', 0, 3)).toBe('   ');
    expect(marqueeWindow('hello', 3, 3)).toBe('hel');
    expect(marqueeWindow('hello', 5, 3)).toBe('llo');
    expect(marqueeWindow('hello', 100, 3)).toBe('   ');
  });

  test('progressBar fills proportionally and clamps', () => {
    expect(progressBar(0.5, 10)).toBe('█████░░░░░');
    expect(progressBar(2, 3)).toBe('███');
    expect(progressBar(Number.NaN, 4)).toBe('░░░░');
  });

  test('speed and voice indicators', () => {
    expect(formatMultiplier(1)).toBe('1x');
    expect(formatMultiplier(1.5)).toBe('1.5x');
    expect(speedIndicator({ paused: true, multiplier: 0, direction: 1 })).toBe('⏸ PAUSED');
    expect(speedIndicator({ paused: false, multiplier: 1.5, direction: -1 })).toBe('←← 1.5x');
    expect(voiceStatus({ voiceEnabled: true, voiceAvailable: true })).toBe('🎤 listening');
    expect(voiceStatus({ voiceEnabled: false, voiceAvailable: true })).toBe('🔇 voice paused');
    expect(voiceStatus({ voiceEnabled: false, voiceAvailable: false })).toBe('⌨ manual');
  });
});

describe('layouts', () => {
  test('step layout: header, centered unit, footer', () => {
    const frame: StepFrame = {
      kind: 'step',
      unit: 'Hello there.',
      index: 1,
      total: 3,
      voiceEnabled: false,
      voiceAvailable: false,
    };
    const lines = layoutStep(frame, { columns: 20, rows: 10 });
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe('─'.repeat(20));
    expect(lines[1]).toBe('       [2/3]');
    expect(lines[4]).toBe('    Hello there.');
    expect(lines[8]).toBe(`${GREY}⌨ manual · SPACE/ENTER next · B back · V voice · Q quit${RESET}`);
  });

  test('scroll layout: marquee mid-screen, bar and keys at the bottom', () => {
    const frame: ScrollFrame = {
      kind: 'scroll',
      text: 'abc',
      offset: 30,
      viewportWidth: 30,
      progress: 0.5,
      multiplier: 1,
      direction: 1,
      paused: false,
    };
    const lines = layoutScroll(frame, { columns: 30, rows: 8 });
    expect(lines).toHaveLength(7);
    expect(lines[2]).toBe(`${BOLD_WHITE}abc${' '.repeat(27)}${RESET}`);
    expect(lines[5]).toBe(`${GREY}      [█████░░░░░] →→ 1x${RESET}`);
    expect(lines[6]).toBe(`${GREY}→/← speed · SPACE pause · 0-3 set speed · Q quit${RESET}`);
  });

  test('done layout', () => {
    const lines = layoutDone({ kind: 'done', total: 3 }, { columns: 20, rows: 6 });
    expect(lines).toEqual(['', '', '      Done! 🎬', `${GREY}       3 of 3${RESET}`]);
  });

  test('the renderer clears and redraws the whole screen', () => {
    const write = jest.fn((_chunk: string) => true);
    const renderer = new TerminalRenderer({ write, columns: 20, rows: 6 });
    renderer.render({ kind: 'done', total: 1 });
    const expected = layoutFrame({ kind: 'done', total: 1 }, { columns: 20, rows: 6 });
    expect(write).toHaveBeenCalledWith(CLEAR_SCREEN + expected.join('\n'));
  });
});
