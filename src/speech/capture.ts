/**
 * Audio Capture
 * Records from the default input device until the signal fires, then
 * transcribes the recording.
 */

import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import OpenAI from 'openai';
import { CaptureUnavailableError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { ensureDirPath, resolveDataPath } from '../shared/paths.js';

export const DEFAULT_RECORD_COMMAND: readonly string[] = ['sox', '-d', '-q', '-c', '1', '-r', '16000', '{file}'];
const FILE_PLACEHOLDER = '{file}';

export interface Transcriber {
  transcribe(filePath: string): Promise<string>;
}

export interface RecorderProcess {
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: (code: number | null) => void): unknown;
}

export type RecorderSpawn = (command: string, args: string[]) => RecorderProcess;

const defaultSpawn: RecorderSpawn = (command, args) => spawn(command, args, { stdio: 'ignore' });

export interface CaptureOptions {
  dataDir: string;
  transcriber: Transcriber;
  /** Recorder argv; `{file}` is replaced by the output path */
  recordCommand?: readonly string[];
  spawn?: RecorderSpawn;
}

/**
 * Transcriber backed by the OpenAI audio API. The client is created on first
 * use so a missing key only fails transcription, not startup.
 */
export function createOpenAITranscriber(apiKey: string | undefined, model: string): Transcriber {
  let client: OpenAI | null = null;
  return {
    async transcribe(filePath) {
      if (!client) client = new OpenAI({ apiKey });
      const result = await client.audio.transcriptions.create({
        file: createReadStream(filePath),
        model,
      });
      return result.text;
    },
  };
}

/** Substitute the output path into a recorder command line. */
export function buildRecordArgs(command: readonly string[], filePath: string): [string, string[]] {
  const [program, ...rest] = command;
  if (!program) throw new CaptureUnavailableError('No recorder command configured');
  const hasPlaceholder = rest.includes(FILE_PLACEHOLDER);
  const args = rest.map(arg => (arg === FILE_PLACEHOLDER ? filePath : arg));
  return [program, hasPlaceholder ? args : [...args, filePath]];
}

export class AudioCapture {
  private readonly recordCommand: readonly string[];
  private readonly spawnFn: RecorderSpawn;

  constructor(private readonly options: CaptureOptions) {
    this.recordCommand = options.recordCommand ?? DEFAULT_RECORD_COMMAND;
    this.spawnFn = options.spawn ?? defaultSpawn;
  }

  /**
   * Returns the transcript, or null when nothing usable was heard.
   * Throws CaptureUnavailableError when the recorder cannot run.
   */
  async captureUntilStopped(signal: AbortSignal): Promise<string | null> {
    if (signal.aborted) return null;

    const dir = resolveDataPath(this.options.dataDir, 'recordings');
    try {
      ensureDirPath(dir);
    } catch (error) {
      throw new CaptureUnavailableError(`Recordings directory unavailable: ${dir}`, error);
    }
    const filePath = resolveDataPath(dir, `capture_${randomUUID()}.wav`);

    try {
      await this.record(filePath, signal);
      const text = (await this.options.transcriber.transcribe(filePath)).trim();
      if (!text) {
        logger.debug('Speech', 'Empty transcript');
        return null;
      }
      logger.info('Speech', `Heard: "${text}"`);
      return text;
    } catch (error) {
      if (error instanceof CaptureUnavailableError) throw error;
      logger.warn('Speech', `Transcription failed: ${errorMessage(error)}`);
      return null;
    } finally {
      await rm(filePath, { force: true });
    }
  }

  private record(filePath: string, signal: AbortSignal): Promise<void> {
    const [program, args] = buildRecordArgs(this.recordCommand, filePath);

    return new Promise<void>((resolve, reject) => {
      let child: RecorderProcess;
      try {
        child = this.spawnFn(program, args);
      } catch (error) {
        reject(new CaptureUnavailableError(`Could not start recorder ${program}`, error));
        return;
      }

      const onAbort = () => {
        child.kill('SIGINT');
      };

      child.on('error', (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(new CaptureUnavailableError(`Could not start recorder ${program}`, error));
      });

      child.on('exit', (code) => {
        signal.removeEventListener('abort', onAbort);
        if (!signal.aborted && code !== 0) {
          reject(new CaptureUnavailableError(`Recorder ${program} exited with code ${code}`));
          return;
        }
        resolve();
      });

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
