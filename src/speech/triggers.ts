import { isMatch, wordCountAtLeast } from './matcher';

/**
 * What makes an utterance count as "said":
 * - speech: any captured utterance (no transcription)
 * - words:  at least `minWords` words, whatever they are
 * - match:  enough overlap with the unit on screen
 */
export type VoiceTrigger = 'speech' | 'words' | 'match';

export const VOICE_TRIGGERS: readonly VoiceTrigger[] = ['speech', 'words', 'match'];

export interface TriggerConfig {
  minWords: number;
  matchThreshold: number;
}

export function needsTranscript(trigger: VoiceTrigger): boolean {
  return trigger !== 'speech';
}

export function shouldAdvance(
  trigger: VoiceTrigger,
  transcript: string | null,
  expectedUnit: string | null,
  cfg: TriggerConfig,
): boolean {
  if (expectedUnit == null) return false;
  switch (trigger) {
    case 'speech':
      return true;
    case 'words':
      return transcript != null && wordCountAtLeast(transcript, cfg.minWords);
    case 'match':
      return transcript != null && isMatch(transcript, expectedUnit, cfg.matchThreshold);
    default:
      return false;
  }
}
