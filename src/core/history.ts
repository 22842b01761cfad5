/**
 * Conversation History Store
 *
 * Ordered turn log. The stored sequence never ends in an assistant turn when a
 * new user turn is appended: an assistant turn left last by an interrupted
 * exchange may carry a tool_use with no matching tool_result, which the remote
 * protocol rejects.
 *
 * Writers are serialized by an epoch lease instead of locks. `appendUser` and
 * `reset` bump the epoch; a running task writes through `commit(epoch, ...)`
 * with the epoch it was submitted under, so output from a superseded or reset
 * task is dropped rather than merged.
 */

import { logger } from '../shared/logger.js';
import { textBlock, type ContentBlock, type Turn } from './types.js';

export class ConversationHistory {
  private turns: Turn[] = [];
  private epochValue = 0;

  get epoch(): number {
    return this.epochValue;
  }

  get length(): number {
    return this.turns.length;
  }

  last(): Turn | undefined {
    return this.turns[this.turns.length - 1];
  }

  /**
   * Append a user turn, pruning a trailing assistant turn first.
   * `note` (a fast-path note) is carried as an extra text block.
   */
  appendUser(content: string | readonly ContentBlock[], note?: string): Turn {
    const last = this.last();
    if (last?.role === 'assistant') {
      logger.debug('History', 'Pruning trailing assistant turn before user turn', {
        blocks: last.content.length,
        danglingToolUse: hasDanglingToolUse(this.turns),
      });
      this.turns.pop();
    }

    const blocks: ContentBlock[] = typeof content === 'string' ? [textBlock(content)] : [...content];
    if (note) {
      blocks.push(textBlock(`\n\n(${note})`));
    }

    const turn: Turn = Object.freeze({ role: 'user', content: Object.freeze(blocks) });
    this.turns.push(turn);
    this.epochValue++;
    return turn;
  }

  /**
   * Append a turn produced by a running task. Returns false (and leaves the
   * store untouched) when the writer's lease has expired.
   */
  commit(epoch: number, turn: Turn): boolean {
    if (epoch !== this.epochValue) {
      logger.debug('History', 'Discarding turn from stale task', { role: turn.role, epoch, current: this.epochValue });
      return false;
    }
    this.turns.push(Object.freeze({ role: turn.role, content: Object.freeze([...turn.content]) }));
    return true;
  }

  reset(): void {
    this.turns = [];
    this.epochValue++;
  }

  snapshot(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }
}

/**
 * True when the last turn is an assistant turn whose tool_use blocks have no
 * following tool results.
 */
export function hasDanglingToolUse(turns: readonly Turn[]): boolean {
  const last = turns[turns.length - 1];
  if (!last || last.role !== 'assistant') return false;
  return last.content.some(block => block.type === 'tool_use');
}
