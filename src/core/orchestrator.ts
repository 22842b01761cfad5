/**
 * Core Orchestrator
 * One per assistant instance. Owns the history, the scheduler and the
 * notification sink; trigger sources hand it commands and never wait on the
 * remote exchange.
 */

import type { ExchangeOptions, RemoteExchange } from '../agent/loop.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { FastPathDispatcher } from './fast-path.js';
import { normalizeCommandText } from './fast-path.js';
import { ConversationHistory } from './history.js';
import type { NotificationSink } from './notifications.js';
import { TurnScheduler, type TaskHandle } from './scheduler.js';
import type { Command, FastPathOutcome, TaskState } from './types.js';

export type FastPathMode = 'short-circuit' | 'annotate';

export const PHRASES = {
  processing: 'Processing',
  done: 'Done',
  reset: 'History reset',
} as const;

const STOP_PHRASES = ['stop', 'cancel', 'never mind', 'nevermind'];
const RESET_PHRASES = ['reset', 'clear history', 'start over'];

/** Exchange settings fixed for the lifetime of the orchestrator. */
export type ExchangeSettings = Pick<
  ExchangeOptions,
  'model' | 'systemPromptSuffix' | 'credentials' | 'imageRetentionLimit' | 'tools' | 'send'
>;

export interface OrchestratorOptions {
  sink: NotificationSink;
  fastPath: FastPathDispatcher;
  fastPathMode: FastPathMode;
  exchange: ExchangeSettings;
  runExchange: RemoteExchange;
  history?: ConversationHistory;
}

export type IntakeResult =
  | { kind: 'ignored' }
  | { kind: 'stopped' }
  | { kind: 'reset' }
  | { kind: 'fast-path'; outcome: FastPathOutcome }
  | { kind: 'submitted'; handle: TaskHandle };

export interface OrchestratorStatus {
  task: { id: string; state: TaskState } | null;
  turns: number;
}

/**
 * Strip the echoed "listening" cue and leading punctuation. Case is kept;
 * the remote agent sees the text as spoken.
 */
export function cleanCommandText(text: string): string {
  return text
    .trim()
    .replace(/^listening\b/i, '')
    .replace(/^[.,!?\-\s]+/, '')
    .trim();
}

export type ControlPhrase = 'stop' | 'reset';

export function matchControlPhrase(text: string): ControlPhrase | null {
  const phrase = normalizeCommandText(text).replace(/[.,!?]+$/, '').trim();
  if (STOP_PHRASES.includes(phrase)) return 'stop';
  if (RESET_PHRASES.includes(phrase)) return 'reset';
  return null;
}

export class Orchestrator {
  readonly history: ConversationHistory;
  readonly scheduler: TurnScheduler;
  private readonly sink: NotificationSink;
  private intake: Promise<void> = Promise.resolve();
  /** Handles whose cancellation should not be announced out loud */
  private readonly quietCancels = new WeakSet<TaskHandle>();

  constructor(private readonly options: OrchestratorOptions) {
    this.sink = options.sink;
    this.history = options.history ?? new ConversationHistory();
    this.scheduler = new TurnScheduler({
      started: (handle) => this.sink.status(`Working (${handle.id.slice(0, 8)})`),
      completed: (handle) => this.sink.completed(handle.id),
      cancelled: (handle) => this.sink.cancelled(handle.id, { spoken: !this.quietCancels.has(handle) }),
      failed: (handle, error) => this.sink.failed(errorMessage(error), handle.id),
    });
  }

  /**
   * Commands are processed one at a time in arrival order. Resolves once the
   * command has been dispatched, not when its exchange finishes.
   */
  handleCommand(command: Command): Promise<IntakeResult> {
    const result = this.intake.then(() => this.process(command));
    this.intake = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Cancel the current task, clear history. Late results are discarded. */
  reset(): void {
    logger.info('History', 'Reset requested');
    this.sink.speak(PHRASES.reset);
    this.cancelCurrent(true);
    this.history.reset();
    this.sink.status(PHRASES.reset);
  }

  /** Cancel the current task and silence speech. */
  stop(): void {
    this.sink.stop();
    this.cancelCurrent(false);
  }

  status(): OrchestratorStatus {
    const handle = this.scheduler.currentHandle;
    return {
      task: handle ? { id: handle.id, state: handle.state } : null,
      turns: this.history.length,
    };
  }

  /** Stop everything and wait for the scheduler to drain. */
  async shutdown(): Promise<void> {
    this.cancelCurrent(true);
    this.sink.stop();
    await this.scheduler.whenIdle();
  }

  private async process(command: Command): Promise<IntakeResult> {
    const text = cleanCommandText(command.text);
    if (!text) {
      logger.debug('Trigger', 'Empty command ignored', { source: command.source });
      return { kind: 'ignored' };
    }

    logger.trigger('command', command.source, { text });
    this.sink.trigger(text);

    switch (matchControlPhrase(text)) {
      case 'stop':
        this.stop();
        return { kind: 'stopped' };
      case 'reset':
        this.reset();
        return { kind: 'reset' };
      case null:
        break;
    }

    this.sink.speak(PHRASES.processing);

    const outcome = await this.options.fastPath.dispatch(text);
    if (outcome && this.options.fastPathMode === 'short-circuit') {
      this.sink.speak(PHRASES.done);
      this.sink.status(`${outcome.intent === 'open' ? 'Opened' : 'Closed'} ${outcome.app}`);
      return { kind: 'fast-path', outcome };
    }
    if (!outcome) {
      logger.debug('FastPath', 'No local action; using remote agent');
    }

    return { kind: 'submitted', handle: this.submit(text, outcome?.note) };
  }

  private submit(text: string, note: string | undefined): TaskHandle {
    this.history.appendUser(text, note);
    const epoch = this.history.epoch;
    const snapshot = this.history.snapshot();

    // The superseded task's cancellation is implied by the new command.
    const previous = this.scheduler.currentHandle;
    if (previous) this.quietCancels.add(previous);

    return this.scheduler.submit(async (signal, handle) => {
      await this.options.runExchange({
        ...this.options.exchange,
        history: snapshot,
        signal,
        commit: (turn) => this.history.commit(epoch, turn),
        onProgress: (block) => {
          if (handle.cancelRequested) return;
          if (block.type === 'text' && block.text.trim()) {
            this.sink.progress(block.text, handle.id);
          } else if (block.type === 'tool_use') {
            logger.debug('Agent', `Tool requested: ${block.name}`, { id: block.id });
          }
        },
        onToolOutput: (result, toolUseId) => {
          if (handle.cancelRequested) return;
          if (result.error) logger.debug('Agent', `Tool ${toolUseId} returned an error`, { error: result.error });
          this.sink.toolOutput(toolUseId, handle.id);
        },
      });
    });
  }

  private cancelCurrent(quiet: boolean): void {
    const handle = this.scheduler.currentHandle;
    if (!handle) return;
    if (quiet) this.quietCancels.add(handle);
    this.scheduler.cancel(handle);
  }
}
