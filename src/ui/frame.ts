// What the presentation side gets to see. Sinks only consume frames; they
// never produce commands.
import { shouldLogTag, warnLog } from '../env/logging';

export interface StepFrame {
  kind: 'step';
  unit: string;
  /** 0-based */
  index: number;
  total: number;
  voiceEnabled: boolean;
  voiceAvailable: boolean;
}

export interface ScrollFrame {
  kind: 'scroll';
  text: string;
  offset: number;
  viewportWidth: number;
  /** 0..1 */
  progress: number;
  multiplier: number;
  direction: 1 | -1;
  paused: boolean;
}

export interface DoneFrame {
  kind: 'done';
  total: number;
}

export type Frame = StepFrame | ScrollFrame | DoneFrame;

export interface PresentationSink {
  render(frame: Frame): void;
}

/** One sink that forwards every frame to all of `sinks`, in order. */
export function fanOut(...sinks: PresentationSink[]): PresentationSink {
  return {
    render(frame: Frame) {
      for (const sink of sinks) {
        try {
          sink.render(frame);
        } catch (err) {
          if (shouldLogTag('sink:render', 1, 1000)) warnLog('sink', 'render error', err);
        }
      }
    },
  };
}
