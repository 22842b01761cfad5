/**
 * Mic Toggle
 * Push-to-talk for the panel: one control cycles
 * idle -> listening -> transcribing -> idle.
 */

import type { SpeechOutput } from '../core/notifications.js';
import { CaptureUnavailableError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { AudioCapture } from '../speech/capture.js';
import { LISTENING_CUE } from './gesture-source.js';
import type { TriggerState } from './state-machine.js';

export interface MicToggleOptions {
  capture: Pick<AudioCapture, 'captureUntilStopped'>;
  speech: SpeechOutput;
  /** Receives each non-empty transcript */
  onTranscript: (text: string) => void;
  onStateChange?: (state: TriggerState) => void;
}

export class MicToggle {
  private current: TriggerState = 'idle';
  private controller: AbortController | null = null;
  private transcript: Promise<string | null> | null = null;

  constructor(private readonly options: MicToggleOptions) {}

  get state(): TriggerState {
    return this.current;
  }

  /**
   * Advance the cycle. A toggle while transcribing is ignored.
   * Returns the state after the toggle.
   */
  toggle(): TriggerState {
    switch (this.current) {
      case 'idle':
        this.startListening();
        break;
      case 'listening':
        this.stopListening();
        break;
      case 'transcribing':
        logger.debug('Trigger', 'Mic toggle ignored while transcribing');
        break;
    }
    return this.current;
  }

  /** Resolves when the current cycle (if any) is back to idle. */
  async settled(): Promise<void> {
    await this.transcript;
  }

  private startListening(): void {
    this.options.speech.speak(LISTENING_CUE);
    const controller = new AbortController();
    this.controller = controller;
    this.setState('listening');

    this.transcript = this.options.capture
      .captureUntilStopped(controller.signal)
      .catch((error: unknown) => {
        if (error instanceof CaptureUnavailableError) {
          logger.error('Trigger', `Microphone unavailable: ${error.message}`);
        } else {
          logger.warn('Trigger', `Capture failed: ${errorMessage(error)}`);
        }
        return null;
      })
      .then((text) => {
        this.controller = null;
        this.transcript = null;
        this.setState('idle');
        if (text) this.options.onTranscript(text);
        return text;
      });
  }

  private stopListening(): void {
    this.setState('transcribing');
    this.controller?.abort();
  }

  private setState(state: TriggerState): void {
    if (this.current === state) return;
    this.current = state;
    logger.trigger(`mic ${state}`, 'typed');
    this.options.onStateChange?.(state);
  }
}
