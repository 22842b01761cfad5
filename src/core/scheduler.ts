/**
 * Turn Scheduler
 *
 * Single-flight, cancellable executor for remote exchanges. At most one task
 * is running per scheduler, and the newest submission always wins: submitting
 * cancels the current handle (fire-and-forget) before the new one becomes
 * current.
 *
 * Callers never start or stop work directly. `submit` and `cancel` post to a
 * mailbox that the scheduler drains on its own turn of the event loop, so the
 * bookkeeping below is only ever touched from one place.
 */

import { randomUUID } from 'node:crypto';
import { isAbortError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { isTerminal, type TaskOutcome, type TaskState } from './types.js';

/**
 * Work run for one handle. The signal is the cancellation token; the task
 * observes it at its suspension points (awaited remote calls).
 */
export type ExchangeTask = (signal: AbortSignal, handle: TaskHandle) => Promise<void>;

export interface TaskLifecycleListener {
  started?(handle: TaskHandle): void;
  completed?(handle: TaskHandle): void;
  cancelled?(handle: TaskHandle): void;
  failed?(handle: TaskHandle, error: Error): void;
}

export class TaskHandle {
  readonly id: string;
  readonly done: Promise<TaskOutcome>;

  private currentState: TaskState = 'pending';
  private readonly controller = new AbortController();
  private readonly settle: (outcome: TaskOutcome) => void;

  constructor(readonly task: ExchangeTask, id: string = randomUUID()) {
    this.id = id;
    let settle: (outcome: TaskOutcome) => void = () => {};
    this.done = new Promise<TaskOutcome>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  get state(): TaskState {
    return this.currentState;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelRequested(): boolean {
    return this.controller.signal.aborted;
  }

  isTerminal(): boolean {
    return isTerminal(this.currentState);
  }

  /** @internal */
  requestCancel(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
  }

  /** @internal */
  markRunning(): void {
    this.currentState = 'running';
  }

  /** @internal */
  finish(outcome: TaskOutcome): void {
    if (this.isTerminal()) return;
    this.currentState = outcome.state;
    this.settle(outcome);
  }
}

type MailboxMessage =
  | { type: 'start'; handle: TaskHandle }
  | { type: 'cancel'; handle: TaskHandle };

export class TurnScheduler {
  private current: TaskHandle | null = null;
  private running: TaskHandle | null = null;
  private pending: TaskHandle[] = [];
  private mailbox: MailboxMessage[] = [];
  private draining = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly listener: TaskLifecycleListener = {}) {}

  /** Most recently submitted handle that has not reached a terminal state. */
  get currentHandle(): TaskHandle | null {
    if (this.current && !this.current.isTerminal()) return this.current;
    return null;
  }

  /**
   * Returns immediately with a pending handle. Any non-terminal current handle
   * is cancelled first; the caller does not wait for that to land.
   */
  submit(task: ExchangeTask): TaskHandle {
    const previous = this.currentHandle;
    if (previous) {
      logger.task('superseded', previous.id);
      this.cancel(previous);
    }

    const handle = new TaskHandle(task);
    this.current = handle;
    logger.task('submitted', handle.id);
    this.post({ type: 'start', handle });
    return handle;
  }

  /**
   * Cooperative cancellation. The token is tripped right away so the running
   * task sees it at its next suspension point; the state change itself is
   * processed by the mailbox. No effect on terminal handles.
   */
  cancel(handle: TaskHandle): void {
    if (handle.isTerminal()) return;
    handle.requestCancel();
    this.post({ type: 'cancel', handle });
  }

  /** Resolves once nothing is pending or running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.running === null && this.pending.length === 0 && this.mailbox.length === 0;
  }

  private post(message: MailboxMessage): void {
    this.mailbox.push(message);
    if (this.draining) return;
    this.draining = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    while (this.mailbox.length > 0) {
      const message = this.mailbox.shift();
      if (!message) break;
      switch (message.type) {
        case 'start':
          this.pending.push(message.handle);
          break;
        case 'cancel':
          this.handleCancel(message.handle);
          break;
      }
    }
    this.draining = false;
    this.pump();
  }

  private handleCancel(handle: TaskHandle): void {
    if (handle.state === 'pending') {
      // Never started: terminal right away, nothing to unwind.
      this.pending = this.pending.filter(h => h !== handle);
      this.finish(handle, { state: 'cancelled' });
    }
    // Running handles finish when the task observes the tripped signal.
  }

  private pump(): void {
    if (this.running) return;

    // Only the newest pending handle can still be live; older ones were
    // cancelled on submit and are dropped here.
    while (this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) break;
      if (next.state !== 'pending') continue;
      if (next.cancelRequested) {
        this.finish(next, { state: 'cancelled' });
        continue;
      }
      this.start(next);
      return;
    }

    this.notifyIdle();
  }

  private start(handle: TaskHandle): void {
    this.running = handle;
    handle.markRunning();
    logger.task('running', handle.id);
    this.emit(() => this.listener.started?.(handle));

    let execution: Promise<void>;
    try {
      execution = handle.task(handle.signal, handle);
    } catch (error) {
      execution = Promise.reject(error);
    }

    void execution.then(
      () => {
        this.finish(handle, handle.cancelRequested ? { state: 'cancelled' } : { state: 'completed' });
      },
      (error: unknown) => {
        if (handle.cancelRequested || isAbortError(error)) {
          this.finish(handle, { state: 'cancelled' });
          return;
        }
        const err = error instanceof Error ? error : new Error(String(error));
        this.finish(handle, { state: 'failed', error: err });
      },
    ).finally(() => {
      if (this.running === handle) this.running = null;
      this.pump();
    });
  }

  private finish(handle: TaskHandle, outcome: TaskOutcome): void {
    if (handle.isTerminal()) return;
    handle.finish(outcome);
    if (this.current === handle) this.current = null;

    switch (outcome.state) {
      case 'completed':
        logger.task('completed', handle.id);
        this.emit(() => this.listener.completed?.(handle));
        break;
      case 'cancelled':
        logger.task('cancelled', handle.id);
        this.emit(() => this.listener.cancelled?.(handle));
        break;
      case 'failed': {
        const error = outcome.error ?? new Error('Task failed');
        logger.error('Scheduler', `Task ${handle.id} failed`, error);
        this.emit(() => this.listener.failed?.(handle, error));
        break;
      }
    }
  }

  /** Listener errors must not corrupt scheduler state. */
  private emit(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logger.error('Scheduler', 'Lifecycle listener threw', error);
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}
