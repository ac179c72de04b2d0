// ANSI terminal presentation. Pure layout helpers up top, the sink below.
import { KEY_HELP } from '../hotkeys/keymap';
import type { DoneFrame, Frame, PresentationSink, ScrollFrame, StepFrame } from './frame';
import { terminalSize, type TerminalOutput, type TerminalSize } from './terminal';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const BOLD_WHITE = '\x1b[1;97m';
const GREY = '\x1b[90m';
const RESET = '\x1b[0m';

const MAX_TEXT_WIDTH = 80;

export function wrapWords(text: string, width: number): string[] {
  const limit = Math.max(1, Math.floor(width));
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= limit) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function center(line: string, width: number): string {
  const pad = Math.max(0, Math.floor((width - line.length) / 2));
  return ' '.repeat(pad) + line;
}

/** Visible slice of the marquee: the text padded by one viewport each side. */
export function marqueeWindow(text: string, offset: number, width: number): string {
  const w = Math.max(1, Math.floor(width));
  const padded = ' '.repeat(w) + text + ' '.repeat(w);
  const start = Math.max(0, Math.min(padded.length - w, Math.floor(offset)));
  return padded.slice(start, start + w);
}

export function progressBar(progress: number, width: number): string {
  const w = Math.max(1, Math.floor(width));
  const p = Math.max(0, Math.min(1, Number.isFinite(progress) ? progress : 0));
  const filled = Math.floor(w * p);
  return '█'.repeat(filled) + '░'.repeat(w - filled);
}

export function formatMultiplier(multiplier: number): string {
  return `${Number(multiplier.toFixed(1))}x`;
}

export function speedIndicator(frame: Pick<ScrollFrame, 'paused' | 'multiplier' | 'direction'>): string {
  if (frame.paused) return '⏸ PAUSED';
  const arrow = frame.direction > 0 ? '→→' : '←←';
  return `${arrow} ${formatMultiplier(frame.multiplier)}`;
}

export function voiceStatus(frame: Pick<StepFrame, 'voiceEnabled' | 'voiceAvailable'>): string {
  if (!frame.voiceAvailable) return '⌨ manual';
  return frame.voiceEnabled ? '🎤 listening' : '🔇 voice paused';
}

export function layoutStep(frame: StepFrame, size: TerminalSize): string[] {
  const { columns: w, rows: h } = size;
  const rule = '─'.repeat(w);
  const body = wrapWords(frame.unit, Math.min(w - 4, MAX_TEXT_WIDTH));
  const lines = [rule, center(`[${frame.index + 1}/${frame.total}]`, w), rule, ''];
  const topPad = Math.max(0, Math.floor((h - body.length) / 2) - lines.length);
  for (let i = 0; i < topPad; i++) lines.push('');
  for (const line of body) lines.push(center(line, w));
  lines.push('', '', '');
  lines.push(GREY + center(`${voiceStatus(frame)} · ${KEY_HELP.step}`, w) + RESET);
  return lines;
}

export function layoutScroll(frame: ScrollFrame, size: TerminalSize): string[] {
  const { columns: w, rows: h } = size;
  const lines: string[] = [];
  const topPad = Math.max(0, Math.floor((h - 4) / 2));
  for (let i = 0; i < topPad; i++) lines.push('');
  lines.push(BOLD_WHITE + marqueeWindow(frame.text, frame.offset, w) + RESET);
  const bottomPad = Math.max(0, h - topPad - 4);
  for (let i = 0; i < bottomPad; i++) lines.push('');
  const bar = progressBar(frame.progress, Math.max(10, w - 20));
  lines.push(GREY + center(`[${bar}] ${speedIndicator(frame)}`, w) + RESET);
  lines.push(GREY + center(KEY_HELP.scroll, w) + RESET);
  return lines;
}

export function layoutDone(frame: DoneFrame, size: TerminalSize): string[] {
  const lines: string[] = [];
  const topPad = Math.max(0, Math.floor(size.rows / 2) - 1);
  for (let i = 0; i < topPad; i++) lines.push('');
  lines.push(center('Done! 🎬', size.columns));
  lines.push(GREY + center(`${frame.total} of ${frame.total}`, size.columns) + RESET);
  return lines;
}

export function layoutFrame(frame: Frame, size: TerminalSize): string[] {
  switch (frame.kind) {
    case 'step':
      return layoutStep(frame, size);
    case 'scroll':
      return layoutScroll(frame, size);
    case 'done':
      return layoutDone(frame, size);
  }
}

export class TerminalRenderer implements PresentationSink {
  private readonly output: TerminalOutput;

  constructor(output: TerminalOutput) {
    this.output = output;
  }

  render(frame: Frame): void {
    const lines = layoutFrame(frame, terminalSize(this.output));
    this.output.write(CLEAR_SCREEN + lines.join('\n'));
  }
}
