import { BackendError } from '../../src/core/errors';
import {
  CommandSpeechEngine,
  classifyCapture,
  classifyTranscribe,
  fillTemplate,
  runCommand,
  shellQuote,
  type ProcessResult,
} from '../../src/speech/engines/command';

function result(over: Partial<ProcessResult> = {}): ProcessResult {
  return { code: 0, signal: null, timedOut: false, aborted: false, stdout: '', stderr: '', ...over };
}

describe('command speech engine', () => {
  test('placeholders are shell-quoted; unknown ones stay', () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(fillTemplate('stt {in} --lang {lang} {other}', { in: '/tmp/a b.wav', lang: 'en-US' })).toBe(
      "stt '/tmp/a b.wav' --lang 'en-US' {other}",
    );
  });

  test('capture outcomes', () => {
    expect(classifyCapture(result(), 1000)).toBe('clip');
    expect(classifyCapture(result(), 44)).toBe('timeout');
    expect(classifyCapture(result({ code: null, timedOut: true }), 0)).toBe('timeout');
    expect(classifyCapture(result({ code: 127 }), 0)).toBe('device');
    expect(classifyCapture(result({ code: null, spawnError: new Error('spawn sh ENOENT') }), 0)).toBe('device');
    expect(classifyCapture(result({ code: 2 }), 1000)).toBe('device');
  });

  test('transcribe outcomes', () => {
    expect(classifyTranscribe(result({ stdout: ' hello\n world \n' }))).toEqual({ kind: 'text', text: 'hello world' });
    expect(classifyTranscribe(result({ stdout: '\n' }))).toEqual({ kind: 'unrecognized' });
    expect(classifyTranscribe(result({ code: 1, stderr: '\nboom\nmore' }))).toEqual({
      kind: 'backend',
      message: 'transcriber exited 1: boom',
    });
    expect(classifyTranscribe(result({ code: null, timedOut: true }))).toEqual({
      kind: 'backend',
      message: 'transcriber timed out',
    });
  });

  test('without a transcribe command only speech detection is possible', async () => {
    const engine = new CommandSpeechEngine({ transcribeCommand: '  ' });
    expect(engine.canTranscribe).toBe(false);
    await expect(engine.transcribe({ id: 'x', path: '/tmp/x.wav', capturedAt: 0 }, 'en-US')).rejects.toThrow(
      BackendError,
    );
  });

  describe('runCommand', () => {
    test('collects output and the exit code', async () => {
      const res = await runCommand("printf 'hi there'; echo oops >&2; exit 3", { timeoutMs: 5000 });
      expect(res).toMatchObject({ code: 3, timedOut: false, aborted: false, stdout: 'hi there', stderr: 'oops\n' });
    });

    test('a timeout stops every process of a pipeline', async () => {
      const started = Date.now();
      const res = await runCommand('sleep 4 | cat', { timeoutMs: 200 });
      expect(Date.now() - started).toBeLessThan(1500);
      expect(res.timedOut).toBe(true);
      expect(res.code).not.toBe(0);
    }, 10_000);

    test('an abort stops every process of a pipeline', async () => {
      const controller = new AbortController();
      const started = Date.now();
      setTimeout(() => controller.abort(), 100);
      const res = await runCommand('sleep 4 | cat', { timeoutMs: 10_000, signal: controller.signal });
      expect(Date.now() - started).toBeLessThan(1500);
      expect(res).toMatchObject({ aborted: true, timedOut: false });
    }, 10_000);
  });
});
