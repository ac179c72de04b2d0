import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { HELP_TEXT } from '../../src/boot/args';
import { main, resolveVoice, type BootIO } from '../../src/boot/boot';
import { setLogLevel } from '../../src/env/logging';
import { DEFAULT_CONFIG } from '../../src/settings/schema';
import type { AudioClip, SpeechBackend } from '../../src/speech/backend';

function fakeIO(keys = '', backend?: SpeechBackend) {
  const stdin = new PassThrough();
  if (keys) stdin.write(keys);
  const stdout = { write: jest.fn((_chunk: string) => true), columns: 40, rows: 12 };
  const stderr = { write: jest.fn((_chunk: string) => true) };
  const io: BootIO = { stdin, stdout, stderr, backend };
  return { io, stdout, stderr };
}

function silentBackend(): SpeechBackend {
  return {
    name: 'silent',
    canTranscribe: false,
    capture: (opts) =>
      new Promise<AudioClip>((_resolve, reject) => {
        opts.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
    transcribe: async () => '',
    release: async () => undefined,
  };
}

describe('main', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prompter-boot-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => setLogLevel(0));
  afterEach(() => setLogLevel(null));

  async function script(name: string, text: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, text, 'utf8');
    return path;
  }

  test('--help prints usage and exits 0', async () => {
    const { io, stdout } = fakeIO();
    await expect(main(['--help'], io)).resolves.toBe(0);
    expect(stdout.write).toHaveBeenCalledWith(HELP_TEXT);
  });

  test('no script is a config error with exit 1', async () => {
    const { io, stderr } = fakeIO();
    await expect(main([], io)).resolves.toBe(1);
    expect(stderr.write).toHaveBeenCalledWith('voice-prompter: No script file given (see --help)\n');
  });

  test('a missing script file exits 1 naming the path', async () => {
    const { io, stderr } = fakeIO();
    const path = join(dir, 'absent.txt');
    await expect(main([path], io)).resolves.toBe(1);
    expect(stderr.write).toHaveBeenCalledWith(`voice-prompter: ${path} not found\n`);
  });

  test('an empty script exits 1 before the terminal is touched', async () => {
    const { io, stdout, stderr } = fakeIO();
    const path = await script('empty.txt', '  \n\n ');
    await expect(main(['-m', path], io)).resolves.toBe(1);
    expect(stderr.write).toHaveBeenCalledWith('voice-prompter: No text found in script\n');
    expect(stdout.write).not.toHaveBeenCalled();
  });

  test('keyboard-only run to the end', async () => {
    const path = await script('two.txt', 'One. Two.');
    const { io, stdout } = fakeIO('  ');
    await expect(main(['--manual', path], io)).resolves.toBe(0);
    expect(stdout.write).toHaveBeenLastCalledWith('Done! 🎬\n');
  });

  test('quit ends early without the closing line', async () => {
    const path = await script('three.txt', 'One. Two. Three.');
    const { io, stdout } = fakeIO(' q');
    await expect(main(['-m', path], io)).resolves.toBe(0);
    expect(stdout.write).not.toHaveBeenCalledWith('Done! 🎬\n');
  });

  test('scroll mode quits on q', async () => {
    const path = await script('marquee.txt', 'A line that scrolls by.');
    const { io } = fakeIO('1q');
    await expect(main(['--mode', 'scroll', path], io)).resolves.toBe(0);
  });

  test('voice stays out of the way while the keyboard drives', async () => {
    const path = await script('voice.txt', 'One. Two.');
    const backend = silentBackend();
    const { io, stdout } = fakeIO('  ', backend);
    await expect(main([path], io)).resolves.toBe(0);
    expect(stdout.write).toHaveBeenLastCalledWith('Done! 🎬\n');
  });
});

describe('resolveVoice', () => {
  beforeEach(() => setLogLevel(0));
  afterEach(() => setLogLevel(null));

  test('scroll mode never listens', () => {
    expect(resolveVoice({ ...DEFAULT_CONFIG, mode: 'scroll' }, true).manual).toBe(true);
  });

  test('transcript triggers fall back to speech without a transcriber', () => {
    expect(resolveVoice({ ...DEFAULT_CONFIG, trigger: 'words' }, false).trigger).toBe('speech');
    expect(resolveVoice({ ...DEFAULT_CONFIG, trigger: 'match' }, true).trigger).toBe('match');
  });
});
