// src/boot/args.ts
// Command-line parsing. Flags only override what the config file says;
// clamping happens later in normalizeConfig.
import { parseArgs } from 'node:util';
import { ConfigError, describeError } from '../core/errors';
import type { ConfigInput } from '../settings/schema';
import { VOICE_TRIGGERS } from '../speech/triggers';

export const HELP_TEXT = `Usage: voice-prompter [options] <script.txt>

Shows a script one unit at a time (step) or as a scrolling marquee (scroll).
In step mode, speaking a unit advances to the next one.

Modes:
  --mode <step|scroll>        presentation mode (default: step)
  --segment <sentence|paragraph>
                              how step mode splits the script (default: sentence)
  -m, --manual                keyboard only, no microphone
  --max-length <n>            split sentences longer than n chars at commas (default: 150)
  --speed <n>                 scroll speed in chars/sec at 1x (default: 15)

Voice:
  --trigger <speech|words|match>
                              what counts as reading the unit (default: words)
  --min-words <n>             words needed by the "words" trigger (default: 3)
  --match-threshold <0-1>     token overlap needed by the "match" trigger (default: 0.4)
  --pause-threshold <sec>     silence that ends an utterance (default: 1.5)
  --on-backend-error <retry|advance>
                              what a failed transcription does (default: retry)
  --lang <locale>             recognition language (default: en-US)
  --capture-cmd <cmd>         record one utterance to {out}
  --transcribe-cmd <cmd>      print the transcript of {in} in {lang}

Display mirror:
  --display-port <port>       serve frames to other screens over WebSocket
  --display-token <token>     require this token in the display hello

General:
  --config <file.json>        read settings from a JSON file
  -v, --verbose               more logging on stderr (repeat for trace)
  -h, --help                  show this help
  --version                   print the version

Keys (step):   SPACE/ENTER next · B back · V voice · Q quit
Keys (scroll): →/← speed · SPACE pause · 0-3 set speed · Q quit
`;

export type CliRequest =
  | { kind: 'help' }
  | { kind: 'version' }
  | {
      kind: 'run';
      scriptPath: string;
      configPath: string | null;
      overrides: ConfigInput;
      verbose: number;
    };

const OPTIONS = {
  mode: { type: 'string' },
  segment: { type: 'string' },
  manual: { type: 'boolean', short: 'm' },
  'max-length': { type: 'string' },
  speed: { type: 'string' },
  trigger: { type: 'string' },
  'min-words': { type: 'string' },
  'match-threshold': { type: 'string' },
  'pause-threshold': { type: 'string' },
  'on-backend-error': { type: 'string' },
  lang: { type: 'string' },
  'capture-cmd': { type: 'string' },
  'transcribe-cmd': { type: 'string' },
  'display-port': { type: 'string' },
  'display-token': { type: 'string' },
  config: { type: 'string' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean' },
} as const;

function choice<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined) return undefined;
  const found = allowed.find((option) => option === value.toLowerCase());
  if (!found) throw new ConfigError(`--${flag} must be one of ${allowed.join(', ')} (got "${value}")`);
  return found;
}

function numeric(
  flag: string,
  value: string | undefined,
  check: (n: number) => boolean = (n) => n > 0,
): number | undefined {
  if (value === undefined) return undefined;
  const n = value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n) || !check(n)) throw new ConfigError(`--${flag}: invalid value "${value}"`);
  return n;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err) {
    throw new ConfigError(describeError(err), { cause: err });
  }
}

export function parseCliArgs(argv: readonly string[]): CliRequest {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (positionals.length === 0) throw new ConfigError('No script file given (see --help)');
  if (positionals.length > 1) throw new ConfigError(`Expected one script file, got ${positionals.length}`);

  const overrides: ConfigInput = {};
  const set = <K extends keyof ConfigInput>(key: K, value: ConfigInput[K]) => {
    if (value !== undefined) overrides[key] = value;
  };
  set('mode', choice('mode', values.mode, ['step', 'scroll']));
  set('segment', choice('segment', values.segment, ['sentence', 'paragraph']));
  if (values.manual) overrides.manual = true;
  set('maxUnitLength', numeric('max-length', values['max-length'], (n) => Number.isInteger(n) && n > 0));
  set('baseSpeed', numeric('speed', values.speed));
  set('trigger', choice('trigger', values.trigger, VOICE_TRIGGERS));
  set('minWords', numeric('min-words', values['min-words'], (n) => Number.isInteger(n) && n > 0));
  set('matchThreshold', numeric('match-threshold', values['match-threshold'], (n) => n >= 0 && n <= 1));
  set('pauseThresholdSec', numeric('pause-threshold', values['pause-threshold']));
  set('onBackendError', choice('on-backend-error', values['on-backend-error'], ['retry', 'advance']));
  set('locale', values.lang);
  set('captureCommand', values['capture-cmd']);
  set('transcribeCommand', values['transcribe-cmd']);
  set(
    'displayPort',
    numeric('display-port', values['display-port'], (n) => Number.isInteger(n) && n >= 0 && n <= 65535),
  );
  set('displayToken', values['display-token']);

  return {
    kind: 'run',
    scriptPath: positionals[0],
    configPath: values.config ?? null,
    overrides,
    verbose: values.verbose?.length ?? 0,
  };
}
