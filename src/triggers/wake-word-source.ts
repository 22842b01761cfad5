import type { SpeechOutput } from '../core/notifications.js';
import type { Command } from '../core/types.js';
import { logger } from '../shared/logger.js';
import type { AudioCapture } from '../speech/capture.js';
import { listenForWakeWord } from '../speech/wake-word.js';
import type { CommandSource } from './source.js';

export interface WakeWordSourceOptions {
  capture: Pick<AudioCapture, 'captureUntilStopped'>;
  speech: SpeechOutput;
  wakeWords: readonly string[];
  windowMs: number;
}

/**
 * Listens in fixed windows; an utterance that opens with a wake word becomes
 * a command. Hearing the wake word cuts off current speech.
 */
export class WakeWordSource implements CommandSource {
  readonly kind = 'wake-word';
  private readonly controller = new AbortController();

  constructor(private readonly options: WakeWordSourceOptions) {}

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  async produce(): Promise<Command | null> {
    const remainder = await listenForWakeWord(this.options.capture, {
      wakeWords: this.options.wakeWords,
      windowMs: this.options.windowMs,
      signal: this.controller.signal,
    });
    if (remainder === null || this.closed) return null;

    this.options.speech.stop();
    logger.trigger('wake word', this.kind, { remainder });
    return { text: remainder, source: this.kind };
  }

  close(): void {
    this.controller.abort();
  }
}
