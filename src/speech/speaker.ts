/**
 * Text-to-speech through an external engine.
 * One utterance at a time; a new one kills the previous process.
 */

import { spawn } from 'node:child_process';
import type { SpeechOutput } from '../core/notifications.js';
import { logger } from '../shared/logger.js';

export interface SpeakerOptions {
  /** Program plus leading arguments; the text is passed last */
  command: readonly string[];
  voice?: string;
}

/** The part of a child process the speaker relies on. */
export interface SpeechProcess {
  readonly exitCode: number | null;
  readonly killed: boolean;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: () => void): unknown;
}

export type SpawnFn = (command: string, args: string[]) => SpeechProcess;

const defaultSpawn: SpawnFn = (command, args) => spawn(command, args, { stdio: 'ignore' });

export function defaultTtsCommand(platform: NodeJS.Platform = process.platform): string[] {
  return platform === 'darwin' ? ['say'] : ['espeak'];
}

/**
 * Make text safe to read aloud: no emoji, link targets, code or symbols.
 */
export function cleanSpeechText(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\p{Extended_Pictographic}/gu, ' ')
    .replace(/[^A-Za-z0-9 .,!?-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class Speaker implements SpeechOutput {
  private current: SpeechProcess | null = null;

  constructor(
    private readonly options: SpeakerOptions,
    private readonly spawnFn: SpawnFn = defaultSpawn,
  ) {}

  get speaking(): boolean {
    return this.current !== null;
  }

  speak(text: string): void {
    this.stop();

    const cleaned = cleanSpeechText(text);
    if (!cleaned) return;

    const [program, ...leading] = this.options.command;
    if (!program) {
      logger.warn('Speech', 'No TTS command configured');
      return;
    }
    const voiceArgs = this.options.voice ? ['-v', this.options.voice] : [];

    let child: SpeechProcess;
    try {
      child = this.spawnFn(program, [...leading, ...voiceArgs, cleaned]);
    } catch (error) {
      logger.warn('Speech', `Failed to start ${program}`, error);
      return;
    }

    this.current = child;
    logger.debug('Speech', 'Speaking', { text: cleaned });

    const release = () => {
      if (this.current === child) this.current = null;
    };
    child.on('error', (error) => {
      logger.warn('Speech', `TTS process error (${program})`, error);
      release();
    });
    child.on('exit', release);
  }

  stop(): void {
    const child = this.current;
    if (!child) return;
    this.current = null;
    if (child.exitCode === null && !child.killed) {
      child.kill('SIGTERM');
    }
  }
}
