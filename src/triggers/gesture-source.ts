/**
 * Gesture Source
 * Open palm starts listening, a fist ends it and yields the transcript,
 * victory resets the conversation.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { SpeechOutput } from '../core/notifications.js';
import type { Command } from '../core/types.js';
import { CaptureUnavailableError, isAbortError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { AudioCapture } from '../speech/capture.js';
import { classifyGesture, parseFrame, type Gesture } from './gestures.js';
import type { CommandSource } from './source.js';
import type { TriggerEvent, TriggerStateMachine } from './state-machine.js';

export const LISTENING_CUE = 'Listening';
const DEFAULT_CUE_DELAY_MS = 500;

export interface GestureSourceOptions {
  frames: AsyncIterable<string>;
  machine: TriggerStateMachine;
  capture: Pick<AudioCapture, 'captureUntilStopped'>;
  speech: SpeechOutput;
  onReset: () => void;
  /** Wait after the cue so the microphone does not record it */
  listenCueDelayMs?: number;
  now?: () => number;
}

interface ActiveCapture {
  controller: AbortController;
  transcript: Promise<string | null>;
}

export class GestureSource implements CommandSource {
  readonly kind = 'gesture';
  private readonly iterator: AsyncIterator<string>;
  private readonly now: () => number;
  private active: ActiveCapture | null = null;
  private failure: CaptureUnavailableError | null = null;
  private isClosed = false;

  constructor(private readonly options: GestureSourceOptions) {
    this.iterator = options.frames[Symbol.asyncIterator]();
    this.now = options.now ?? Date.now;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Reads frames until a stop gesture ends a capture. Resolves null when the
   * frame stream ends or the capture produced no text.
   */
  async produce(): Promise<Command | null> {
    while (!this.isClosed) {
      this.throwIfCaptureFailed();

      const next = await this.iterator.next();
      if (next.done) {
        logger.info('Trigger', 'Landmark stream ended');
        this.close();
        return null;
      }

      const hands = parseFrame(next.value);
      if (!hands) {
        logger.debug('Trigger', 'Skipping malformed frame');
        continue;
      }

      const event = this.observe(hands.map(classifyGesture));
      switch (event) {
        case 'start':
          this.startCapture();
          break;
        case 'stop':
          return this.finishCapture();
        case 'reset':
          logger.trigger('reset', this.kind);
          this.options.onReset();
          break;
        case null:
          break;
      }
    }
    return null;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.active?.controller.abort();
    this.active = null;
    void this.iterator.return?.().catch((error: unknown) => {
      logger.debug('Trigger', 'Frame stream did not close cleanly', error);
    });
  }

  /** First hand whose gesture is accepted wins the frame. */
  private observe(gestures: ReadonlyArray<Gesture | null>): TriggerEvent | null {
    for (const gesture of gestures) {
      const event = this.options.machine.observe(gesture, this.now());
      if (event) return event;
    }
    return null;
  }

  private startCapture(): void {
    logger.trigger('start listening', this.kind);
    this.options.speech.speak(LISTENING_CUE);

    const controller = new AbortController();
    const delay = this.options.listenCueDelayMs ?? DEFAULT_CUE_DELAY_MS;

    const transcript = (async () => {
      await sleep(delay, undefined, { signal: controller.signal });
      return this.options.capture.captureUntilStopped(controller.signal);
    })().catch((error: unknown) => {
      if (error instanceof CaptureUnavailableError) {
        this.failure = error;
        return null;
      }
      if (isAbortError(error)) return null;
      logger.warn('Trigger', 'Capture failed', error);
      return null;
    });

    this.active = { controller, transcript };
  }

  private async finishCapture(): Promise<Command | null> {
    logger.trigger('stop listening', this.kind);
    const active = this.active;
    this.active = null;
    if (!active) return null;

    active.controller.abort();
    const text = await active.transcript;
    this.throwIfCaptureFailed();
    if (!text) return null;
    return { text, source: this.kind };
  }

  private throwIfCaptureFailed(): void {
    const failure = this.failure;
    if (!failure) return;
    this.failure = null;
    throw failure;
  }
}
