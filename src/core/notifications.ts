/**
 * Notification Sink
 * Turns task lifecycle events into speech and status updates.
 *
 * Speech is last-write-wins: every spoken notification preempts whatever is
 * playing. Status updates are published on a channel that presentation layers
 * subscribe to; they receive messages, the scheduler never calls into them.
 */

import { EventEmitter } from 'node:events';
import { logger } from '../shared/logger.js';

export interface SpeechOutput {
  /** Fire-and-forget; stops current speech first */
  speak(text: string): void;
  stop(): void;
}

export type StatusKind =
  | 'status'
  | 'progress'
  | 'tool'
  | 'completed'
  | 'cancelled'
  | 'failed'
  | 'trigger';

export interface StatusMessage {
  kind: StatusKind;
  text: string;
  taskId?: string;
  ts: number;
}

export type StatusListener = (message: StatusMessage) => void;

export class StatusChannel {
  private readonly emitter = new EventEmitter();
  private lastMessage: StatusMessage | null = null;

  publish(kind: StatusKind, text: string, taskId?: string): void {
    const message: StatusMessage = { kind, text, taskId, ts: Date.now() };
    this.lastMessage = message;
    this.emitter.emit('status', message);
  }

  subscribe(listener: StatusListener): () => void {
    const wrapped = (message: StatusMessage) => {
      try {
        listener(message);
      } catch (error) {
        logger.error('Speech', 'Status subscriber threw', error);
      }
    };
    this.emitter.on('status', wrapped);
    return () => {
      this.emitter.off('status', wrapped);
    };
  }

  get last(): StatusMessage | null {
    return this.lastMessage;
  }
}

export interface NotificationPhrases {
  cancelled: string;
  failed: string;
}

export const DEFAULT_PHRASES: NotificationPhrases = {
  cancelled: 'Interrupted',
  failed: 'Sorry, something went wrong.',
};

export class NotificationSink {
  constructor(
    private readonly speech: SpeechOutput,
    readonly channel: StatusChannel = new StatusChannel(),
    private readonly phrases: NotificationPhrases = DEFAULT_PHRASES,
  ) {}

  speak(text: string): void {
    this.speech.speak(text);
  }

  stop(): void {
    this.speech.stop();
  }

  status(text: string): void {
    this.channel.publish('status', text);
  }

  trigger(text: string): void {
    this.channel.publish('trigger', text);
  }

  progress(text: string, taskId?: string): void {
    this.channel.publish('progress', text, taskId);
    this.speech.speak(text);
  }

  toolOutput(toolUseId: string, taskId?: string): void {
    this.channel.publish('tool', `Tool: ${toolUseId}`, taskId);
  }

  completed(taskId?: string): void {
    this.channel.publish('completed', 'Ready', taskId);
  }

  /** Always published; `spoken: false` leaves current speech alone. */
  cancelled(taskId?: string, options: { spoken?: boolean } = {}): void {
    this.channel.publish('cancelled', this.phrases.cancelled, taskId);
    if (options.spoken ?? true) this.speech.speak(this.phrases.cancelled);
  }

  failed(reason: string, taskId?: string): void {
    logger.warn('Agent', 'Remote exchange failed', { reason, taskId });
    this.channel.publish('failed', reason, taskId);
    this.speech.speak(this.phrases.failed);
  }
}
