import { EventEmitter } from 'node:events';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CaptureUnavailableError } from '../shared/errors.js';
import { AudioCapture, buildRecordArgs, DEFAULT_RECORD_COMMAND, type RecorderProcess, type Transcriber } from './capture.js';

class FakeRecorder extends EventEmitter implements RecorderProcess {
  signals: Array<NodeJS.Signals | undefined> = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit('exit', null));
    return true;
  }
}

describe('buildRecordArgs', () => {
  it('substitutes the output path', () => {
    expect(buildRecordArgs(DEFAULT_RECORD_COMMAND, '/tmp/a.wav')).toEqual([
      'sox',
      ['-d', '-q', '-c', '1', '-r', '16000', '/tmp/a.wav'],
    ]);
  });

  it('appends the path when there is no placeholder', () => {
    expect(buildRecordArgs(['rec', '-q'], '/tmp/b.wav')).toEqual(['rec', ['-q', '/tmp/b.wav']]);
  });

  it('rejects an empty command', () => {
    expect(() => buildRecordArgs([], '/tmp/c.wav')).toThrow(CaptureUnavailableError);
  });
});

describe('AudioCapture', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'palmtalk-capture-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  function createCapture(transcriber: Transcriber, spawn = vi.fn((_command: string, _args: string[]) => new FakeRecorder())) {
    return { capture: new AudioCapture({ dataDir, transcriber, spawn }), spawn };
  }

  it('records until aborted and returns the trimmed transcript', async () => {
    const transcribe = vi.fn(async (_path: string) => '  open safari ');
    const { capture, spawn } = createCapture({ transcribe });
    const controller = new AbortController();

    const heard = capture.captureUntilStopped(controller.signal);
    await vi.waitFor(() => expect(spawn).toHaveBeenCalledTimes(1));
    controller.abort();

    expect(await heard).toBe('open safari');
    const [command, args] = spawn.mock.calls[0];
    const path = args[args.length - 1];
    expect(command).toBe('sox');
    expect(path.startsWith(join(dataDir, 'recordings'))).toBe(true);
    expect(path.endsWith('.wav')).toBe(true);
    expect(transcribe).toHaveBeenCalledWith(path);
    expect(await readdir(join(dataDir, 'recordings'))).toEqual([]);
  });

  it('returns null without recording when already aborted', async () => {
    const { capture, spawn } = createCapture({ transcribe: vi.fn(async () => 'unused') });
    const controller = new AbortController();
    controller.abort();

    expect(await capture.captureUntilStopped(controller.signal)).toBeNull();
    expect(spawn).not.toHaveBeenCalled();
  });

  it('returns null for an empty transcript', async () => {
    const { capture } = createCapture({ transcribe: vi.fn(async () => '   ') });
    const controller = new AbortController();

    const heard = capture.captureUntilStopped(controller.signal);
    setTimeout(() => controller.abort(), 5);

    expect(await heard).toBeNull();
  });

  it('returns null when transcription fails', async () => {
    const { capture } = createCapture({
      transcribe: vi.fn(async () => {
        throw new Error('rate limited');
      }),
    });
    const controller = new AbortController();

    const heard = capture.captureUntilStopped(controller.signal);
    setTimeout(() => controller.abort(), 5);

    expect(await heard).toBeNull();
  });

  it('throws when the recorder cannot start', async () => {
    const spawn = vi.fn((_command: string, _args: string[]) => {
      const recorder = new FakeRecorder();
      setImmediate(() => recorder.emit('error', new Error('spawn sox ENOENT')));
      return recorder;
    });
    const { capture } = createCapture({ transcribe: vi.fn(async () => 'unused') }, spawn);

    await expect(capture.captureUntilStopped(new AbortController().signal)).rejects.toBeInstanceOf(
      CaptureUnavailableError,
    );
  });

  it('throws when the recorder exits on its own with an error', async () => {
    const spawn = vi.fn((_command: string, _args: string[]) => {
      const recorder = new FakeRecorder();
      setImmediate(() => recorder.emit('exit', 2));
      return recorder;
    });
    const { capture } = createCapture({ transcribe: vi.fn(async () => 'unused') }, spawn);

    await expect(capture.captureUntilStopped(new AbortController().signal)).rejects.toThrow(
      'Recorder sox exited with code 2',
    );
  });

  it('throws when the recordings directory cannot be created', async () => {
    const blocked = join(dataDir, 'blocked');
    await writeFile(blocked, '');
    const spawn = vi.fn((_command: string, _args: string[]) => new FakeRecorder());
    const capture = new AudioCapture({ dataDir: blocked, transcriber: { transcribe: vi.fn(async () => 'unused') }, spawn });

    await expect(capture.captureUntilStopped(new AbortController().signal)).rejects.toThrow(
      `Recordings directory unavailable: ${join(blocked, 'recordings')}`,
    );
    expect(spawn).not.toHaveBeenCalled();
  });
});
