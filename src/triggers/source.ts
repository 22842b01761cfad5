/**
 * Trigger sources share one shape: produce the next command (or nothing),
 * until closed. A single loop drives any of them.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { IntakeResult } from '../core/orchestrator.js';
import type { Command, CommandSourceKind } from '../core/types.js';
import { CaptureUnavailableError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface CommandSource {
  readonly kind: CommandSourceKind;
  readonly closed: boolean;
  /** Resolves with the next command, or null when this round produced none */
  produce(): Promise<Command | null>;
  close(): void;
}

export interface CommandTarget {
  handleCommand(command: Command): Promise<IntakeResult>;
}

export interface TriggerLoopOptions {
  /** Pause after a failed produce() before asking the source again */
  errorBackoffMs?: number;
}

const DEFAULT_ERROR_BACKOFF_MS = 500;

/**
 * Pull commands until the source closes. Intake resolves on dispatch, so the
 * loop never waits on a remote exchange. A capture device failure ends this
 * loop only; every other error is logged and the loop retries after a pause.
 */
export async function runTriggerLoop(
  source: CommandSource,
  target: CommandTarget,
  options: TriggerLoopOptions = {},
): Promise<void> {
  const backoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
  logger.trigger('loop started', source.kind);

  while (!source.closed) {
    let command: Command | null;
    try {
      command = await source.produce();
    } catch (error) {
      if (error instanceof CaptureUnavailableError) {
        logger.error('Trigger', `${source.kind} loop stopped: ${error.message}`);
        source.close();
        break;
      }
      logger.warn('Trigger', `${source.kind} source error`, error);
      await sleep(backoffMs);
      continue;
    }

    if (!command) continue;

    try {
      const result = await target.handleCommand(command);
      logger.debug('Trigger', `Command handled: ${result.kind}`, { source: source.kind });
    } catch (error) {
      logger.error('Trigger', 'Command intake failed', error);
    }
  }

  logger.trigger('loop stopped', source.kind);
}
