import type { Command } from '../core/types.js';
import type { CommandSource } from './source.js';

/**
 * In-memory queue of typed or dictated text, fed by the panel server.
 */
export class TypedSource implements CommandSource {
  readonly kind = 'typed';
  private queue: string[] = [];
  private waiters: Array<(command: Command | null) => void> = [];
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  get queued(): number {
    return this.queue.length;
  }

  /** Returns false once the source is closed. */
  push(text: string): boolean {
    if (this.isClosed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ text, source: this.kind });
    } else {
      this.queue.push(text);
    }
    return true;
  }

  produce(): Promise<Command | null> {
    const text = this.queue.shift();
    if (text !== undefined) return Promise.resolve({ text, source: this.kind });
    if (this.isClosed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    this.isClosed = true;
    this.queue = [];
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve(null));
  }
}
