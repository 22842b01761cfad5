/**
 * Trigger State Machine
 *
 *   idle --open-palm--> listening --fist--> idle
 *   idle --victory--> idle (reset)
 *
 * Every accepted transition starts a cooldown; detections inside it are
 * dropped. There is no multi-frame smoothing: a single qualifying frame is
 * enough once the cooldown has elapsed.
 */

import { logger } from '../shared/logger.js';
import type { Gesture } from './gestures.js';

export type TriggerState = 'idle' | 'listening' | 'transcribing';

/** The gesture machine never transcribes; capture ends on leaving listening. */
export type GestureState = Exclude<TriggerState, 'transcribing'>;

export type TriggerEvent = 'start' | 'stop' | 'reset';

export const DEFAULT_COOLDOWN_MS = 2000;

export class TriggerStateMachine {
  private current: GestureState = 'idle';
  private lastTransitionAt: number | null = null;

  constructor(private readonly cooldownMs: number = DEFAULT_COOLDOWN_MS) {}

  get state(): GestureState {
    return this.current;
  }

  /** Time left before the next transition can be accepted. */
  cooldownRemaining(now: number): number {
    if (this.lastTransitionAt === null) return 0;
    return Math.max(0, this.cooldownMs - (now - this.lastTransitionAt));
  }

  /**
   * Feed one classified frame. Returns the event for an accepted transition,
   * otherwise null.
   */
  observe(gesture: Gesture | null, now: number): TriggerEvent | null {
    if (gesture === null) return null;

    const event = this.eventFor(gesture);
    if (!event) return null;

    if (!this.cooldownElapsed(now)) {
      logger.debug('Trigger', `Ignoring ${gesture} during cooldown`);
      return null;
    }

    this.lastTransitionAt = now;
    this.current = event === 'start' ? 'listening' : 'idle';
    return event;
  }

  private eventFor(gesture: Gesture): TriggerEvent | null {
    switch (this.current) {
      case 'idle':
        if (gesture === 'open-palm') return 'start';
        if (gesture === 'victory') return 'reset';
        return null;
      case 'listening':
        return gesture === 'fist' ? 'stop' : null;
    }
  }

  private cooldownElapsed(now: number): boolean {
    if (this.lastTransitionAt === null) return true;
    return now - this.lastTransitionAt > this.cooldownMs;
  }
}
