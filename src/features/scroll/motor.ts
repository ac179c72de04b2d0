import type { Command, SpeedChange } from '../../core/commands';
import { systemClock, type Clock } from '../../core/timing';
import type { AdvancementPolicy, PolicyStatus } from '../../scroll/policy';
import type { Frame } from '../../ui/frame';

export interface ScrollState {
  offset: number;
  /** characters per second; 0 = paused */
  velocity: number;
  direction: 1 | -1;
}

export interface MotorOptions {
  viewportWidth: number;
  /** chars/sec at 1× */
  baseSpeed: number;
  speedLadder: readonly number[];
  tapWindowMs: number;
  now?: Clock;
}

const FALLBACK_LADDER: readonly number[] = [1];

/**
 * Continuous policy: marquee offset moved by velocity × direction each tick.
 * Offset is clamped to [0, textLength + viewportWidth]; hitting a bound stops
 * the motor. Only quit ends it.
 */
export class ContinuousPolicy implements AdvancementPolicy {
  readonly kind = 'scroll';
  readonly text: string;
  private viewportWidth: number;
  private readonly baseSpeed: number;
  private readonly ladder: readonly number[];
  private readonly tapWindowMs: number;
  private readonly now: Clock;

  private offset = 0;
  private multiplier = 0;
  private lastMultiplier = 0;
  private direction: 1 | -1 = 1;
  private tapCount = 0;
  private lastTapAt = Number.NEGATIVE_INFINITY;
  private lastTapDirection: 1 | -1 = 1;
  private exited = false;

  constructor(text: string, opts: MotorOptions) {
    this.text = text;
    this.viewportWidth = Math.max(1, Math.floor(opts.viewportWidth));
    this.baseSpeed = Math.max(0, opts.baseSpeed);
    const ladder = opts.speedLadder.filter((step) => Number.isFinite(step) && step > 0);
    this.ladder = ladder.length ? ladder : FALLBACK_LADDER;
    this.tapWindowMs = Math.max(0, opts.tapWindowMs);
    this.now = opts.now ?? systemClock;
  }

  get maxOffset(): number {
    return this.text.length + this.viewportWidth;
  }

  getState(): ScrollState {
    return { offset: this.offset, velocity: this.baseSpeed * this.multiplier, direction: this.direction };
  }

  getMultiplier(): number {
    return this.multiplier;
  }

  status(): PolicyStatus {
    return this.exited ? 'exited' : 'active';
  }

  position(): number {
    return -1;
  }

  expectedUnit(): string | null {
    return null;
  }

  setViewportWidth(width: number): void {
    this.viewportWidth = Math.max(1, Math.floor(width));
    this.clamp();
  }

  apply(cmd: Command): boolean {
    if (this.exited) return false;
    switch (cmd.type) {
      case 'quit':
        this.exited = true;
        this.multiplier = 0;
        return true;
      case 'next':
        return this.togglePause();
      case 'set-speed':
        return this.changeSpeed(cmd.change);
      default:
        return false;
    }
  }

  tick(dtMs: number): boolean {
    if (this.exited || this.multiplier === 0 || !(dtMs > 0)) return false;
    this.offset += this.baseSpeed * this.multiplier * this.direction * (dtMs / 1000);
    this.clamp();
    return true;
  }

  frame(): Frame {
    return {
      kind: 'scroll',
      text: this.text,
      offset: this.offset,
      viewportWidth: this.viewportWidth,
      progress: Math.min(1, this.offset / this.maxOffset),
      multiplier: this.multiplier,
      direction: this.direction,
      paused: this.multiplier === 0,
    };
  }

  private clamp(): void {
    if (this.offset < 0) {
      this.offset = 0;
      this.multiplier = 0;
    } else if (this.offset > this.maxOffset) {
      this.offset = this.maxOffset;
      this.multiplier = 0;
    }
  }

  private setMultiplier(value: number): boolean {
    const next = Number.isFinite(value) ? Math.max(0, value) : 0;
    if (next > 0) this.lastMultiplier = next;
    if (next === this.multiplier) return false;
    this.multiplier = next;
    return true;
  }

  private togglePause(): boolean {
    if (this.multiplier > 0) return this.setMultiplier(0);
    return this.setMultiplier(this.lastMultiplier || this.ladder[0]);
  }

  // Tap escalation: same direction inside the window climbs the ladder,
  // anything else starts over at its base.
  private changeSpeed(change: SpeedChange): boolean {
    if (change.kind === 'absolute') return this.setMultiplier(change.multiplier);

    const at = this.now();
    const sameRun = change.direction === this.lastTapDirection && at - this.lastTapAt < this.tapWindowMs;
    this.tapCount = sameRun ? this.tapCount + 1 : 1;
    this.lastTapAt = at;
    this.lastTapDirection = change.direction;

    const turned = this.direction !== change.direction;
    this.direction = change.direction;
    const step = this.ladder[Math.min(this.tapCount, this.ladder.length) - 1];
    return this.setMultiplier(step) || turned;
  }
}
