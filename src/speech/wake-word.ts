/**
 * Wake-word detection over short capture windows.
 */

import type { AudioCapture } from './capture.js';

/** Lowercase, punctuation (apostrophes excepted) to spaces, whitespace collapsed. */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}'\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Returns the text after the first wake word that starts the utterance, or
 * null when none does. A bare wake word yields ''.
 */
export function matchWakeWord(text: string, wakeWords: readonly string[]): string | null {
  const normalized = normalizeUtterance(text);
  for (const word of wakeWords) {
    const wake = normalizeUtterance(word);
    if (!wake) continue;
    if (normalized === wake) return '';
    if (normalized.startsWith(`${wake} `)) {
      return normalized.slice(wake.length + 1);
    }
  }
  return null;
}

export interface WakeWordListenOptions {
  wakeWords: readonly string[];
  windowMs: number;
  /** Ends listening early, e.g. on shutdown */
  signal?: AbortSignal;
}

/**
 * Capture one window and check it for a wake word.
 * Resolves with the remainder of the utterance, or null on a miss.
 */
export async function listenForWakeWord(capture: Pick<AudioCapture, 'captureUntilStopped'>, options: WakeWordListenOptions): Promise<string | null> {
  const window = AbortSignal.timeout(options.windowMs);
  const signal = options.signal ? AbortSignal.any([window, options.signal]) : window;
  const text = await capture.captureUntilStopped(signal);
  if (!text) return null;
  return matchWakeWord(text, options.wakeWords);
}
