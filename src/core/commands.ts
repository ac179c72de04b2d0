export type CommandSource = 'keyboard' | 'voice';

export type SpeedChange =
  | { kind: 'delta'; direction: 1 | -1 }
  | { kind: 'absolute'; multiplier: number };

export type Command =
  | { type: 'next'; source: CommandSource }
  | { type: 'previous'; source: CommandSource }
  | { type: 'quit'; source: CommandSource }
  | { type: 'toggle-voice'; source: CommandSource }
  | { type: 'set-speed'; source: CommandSource; change: SpeedChange };

export const next = (source: CommandSource): Command => ({ type: 'next', source });
export const previous = (source: CommandSource): Command => ({ type: 'previous', source });
export const quit = (source: CommandSource): Command => ({ type: 'quit', source });
export const toggleVoice = (source: CommandSource): Command => ({ type: 'toggle-voice', source });

export function setSpeed(source: CommandSource, change: SpeedChange): Command {
  return { type: 'set-speed', source, change };
}

export function describeCommand(cmd: Command): string {
  if (cmd.type !== 'set-speed') return `${cmd.type}<${cmd.source}>`;
  const c = cmd.change;
  const detail = c.kind === 'delta' ? (c.direction > 0 ? '+' : '-') : `=${c.multiplier}`;
  return `set-speed${detail}<${cmd.source}>`;
}
