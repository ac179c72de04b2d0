// src/boot/boot.ts
// Wires config, script, policy, input sources and sinks into one session.
// The engine and voice loop run side by side; whichever way the engine ends,
// the session is stopped, the keyboard detached and the voice task awaited
// before the terminal is handed back.
import { version as PACKAGE_VERSION } from '../../package.json';
import { CommandChannel } from '../core/channel';
import { TerminalStateError, describeError, isFatal } from '../core/errors';
import { infoLog, setLogLevel, warnLog } from '../env/logging';
import { ContinuousPolicy } from '../features/scroll/motor';
import { DiscretePolicy } from '../features/scroll/step-engine';
import { KeyboardSource } from '../hotkeys/keyboard-source';
import { createDisplayRelay, type DisplayRelay } from '../net/display-ws-server';
import { loadScript } from '../script/load';
import { segment } from '../script/segment';
import { AdvancementEngine, type EngineExit } from '../scroll/engine';
import type { AdvancementPolicy } from '../scroll/policy';
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  normalizeConfig,
  type ConfigInput,
  type PrompterConfig,
} from '../settings/schema';
import type { SpeechBackend } from '../speech/backend';
import { createCommandSpeechEngine } from '../speech/engines/command';
import { needsTranscript } from '../speech/triggers';
import { VoiceSource } from '../speech/voice-source';
import { PrompterSession } from '../state/session';
import { fanOut, type PresentationSink } from '../ui/frame';
import { TerminalRenderer } from '../ui/render';
import { terminalSize, withTerminal, type RawModeInput, type TerminalOutput } from '../ui/terminal';
import { HELP_TEXT, parseCliArgs } from './args';

export const EXIT_OK = 0;
export const EXIT_CONFIG = 1;
export const EXIT_FAILURE = 2;
export const EXIT_SIGNAL = 130;

export interface ResizableOutput extends TerminalOutput {
  on?(event: 'resize', listener: () => void): unknown;
  off?(event: 'resize', listener: () => void): unknown;
}

export interface BootIO {
  stdin: NodeJS.ReadableStream & RawModeInput;
  stdout: ResizableOutput;
  stderr: { write(chunk: string): boolean };
  /** Speech backend override; the command engine is built from config otherwise. */
  backend?: SpeechBackend;
  /** Stop on SIGINT/SIGTERM. Off for embedded runs and tests. */
  handleSignals?: boolean;
}

export function processIO(): BootIO {
  return { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr, handleSignals: true };
}

/** Defaults, then the config file, then flags. */
export async function resolveConfig(configPath: string | null, overrides: ConfigInput): Promise<PrompterConfig> {
  const fromFile = configPath ? normalizeConfig(await loadConfigFile(configPath)) : DEFAULT_CONFIG;
  return normalizeConfig(overrides, fromFile);
}

/** Voice only runs in step mode, and a transcript trigger needs a transcriber. */
export function resolveVoice(config: PrompterConfig, canTranscribe: boolean): PrompterConfig {
  if (config.manual || config.mode !== 'step') return { ...config, manual: true };
  if (needsTranscript(config.trigger) && !canTranscribe) {
    warnLog('voice', `trigger "${config.trigger}" needs --transcribe-cmd; advancing on any speech instead`);
    return { ...config, trigger: 'speech' };
  }
  return config;
}

export function buildPolicy(text: string, config: PrompterConfig, viewportWidth: number): AdvancementPolicy {
  if (config.mode === 'scroll') {
    const [flat] = segment(text, 'flat');
    return new ContinuousPolicy(flat, {
      viewportWidth,
      baseSpeed: config.baseSpeed,
      speedLadder: config.speedLadder,
      tapWindowMs: config.tapWindowMs,
    });
  }
  return new DiscretePolicy(segment(text, config.segment, { maxLength: config.maxUnitLength }));
}

async function startRelay(config: PrompterConfig): Promise<DisplayRelay | null> {
  if (config.displayPort == null) return null;
  const relay = createDisplayRelay({ port: config.displayPort, token: config.displayToken });
  try {
    const port = await relay.listen();
    infoLog('display-relay', `displays can connect on port ${port}`);
    return relay;
  } catch (err) {
    warnLog('display-relay', `not started: ${describeError(err)}`);
    await relay.close();
    return null;
  }
}

function onSignals(session: PrompterSession): () => void {
  const handler = () => session.stop('signal');
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

async function runSession(config: PrompterConfig, text: string, io: BootIO): Promise<{ exit: EngineExit; session: PrompterSession }> {
  const backend = io.backend ?? createCommandSpeechEngine({
    captureCommand: config.captureCommand ?? undefined,
    transcribeCommand: config.transcribeCommand,
  });
  const effective = resolveVoice(config, backend.canTranscribe);
  const policy = buildPolicy(text, effective, terminalSize(io.stdout).columns);

  const session = new PrompterSession({ voice: !effective.manual });
  const channel = new CommandChannel();
  const relay = await startRelay(effective);
  const sinks: PresentationSink[] = [new TerminalRenderer(io.stdout)];
  if (relay) sinks.push(relay);
  const engine = new AdvancementEngine(policy, channel, session, fanOut(...sinks), { tickMs: effective.tickMs });
  const keyboard = new KeyboardSource(io.stdin, channel, session, policy.kind);
  const voice = effective.manual
    ? null
    : new VoiceSource(backend, channel, session, {
        trigger: effective.trigger,
        minWords: effective.minWords,
        matchThreshold: effective.matchThreshold,
        captureTimeoutMs: effective.captureTimeoutSec * 1000,
        maxPhraseMs: effective.maxPhraseSec * 1000,
        pauseThresholdMs: effective.pauseThresholdSec * 1000,
        idlePollMs: effective.idlePollMs,
        backoffMs: effective.backendBackoffMs,
        onBackendError: effective.onBackendError,
        locale: effective.locale,
      });

  const onResize = () => {
    if (policy instanceof ContinuousPolicy) policy.setViewportWidth(terminalSize(io.stdout).columns);
    engine.invalidate();
  };
  const offSignals = io.handleSignals ? onSignals(session) : () => undefined;

  try {
    const exit = await withTerminal(io.stdin, io.stdout, async () => {
      io.stdout.on?.('resize', onResize);
      keyboard.start();
      const voiceTask = voice
        ? voice.run().catch((err: unknown) => {
            warnLog('voice', `stopped: ${describeError(err)}`);
            session.markVoiceUnavailable();
          })
        : Promise.resolve();
      try {
        return await engine.run();
      } catch (err) {
        session.stop('error');
        throw err;
      } finally {
        session.stop('quit');
        keyboard.stop();
        io.stdout.off?.('resize', onResize);
        await voiceTask;
      }
    });
    return { exit, session };
  } finally {
    offSignals();
    if (relay) await relay.close();
  }
}

/** Runs the prompter for `argv` (without node and script path); resolves to the exit code. */
export async function main(argv: readonly string[], io: BootIO = processIO()): Promise<number> {
  try {
    const request = parseCliArgs(argv);
    if (request.kind === 'help') {
      io.stdout.write(HELP_TEXT);
      return EXIT_OK;
    }
    if (request.kind === 'version') {
      io.stdout.write(`${PACKAGE_VERSION}\n`);
      return EXIT_OK;
    }
    if (request.verbose > 0) setLogLevel(1 + request.verbose);

    const config = await resolveConfig(request.configPath, request.overrides);
    const text = await loadScript(request.scriptPath);
    const { exit, session } = await runSession(config, text, io);
    if (exit === 'done') io.stdout.write('Done! 🎬\n');
    return session.getState().stopReason === 'signal' ? EXIT_SIGNAL : EXIT_OK;
  } catch (err) {
    if (isFatal(err)) {
      io.stderr.write(`voice-prompter: ${describeError(err)}\n`);
      return EXIT_CONFIG;
    }
    if (err instanceof TerminalStateError) {
      io.stderr.write(`voice-prompter: ${err.message}; run \`stty sane\` to repair the terminal\n`);
      return EXIT_FAILURE;
    }
    io.stderr.write(`voice-prompter: unexpected failure: ${describeError(err)}\n`);
    return EXIT_FAILURE;
  }
}
