/**
 * Fast-Path Dispatcher
 * Runs trivial "open X" / "close X" commands locally, before any remote call.
 */

import type { OsActions } from '../os/actions.js';
import { logger } from '../shared/logger.js';
import type { FastPathIntent, FastPathOutcome } from './types.js';

export interface FastPathOptions {
  /** Reject app names with more space-separated tokens than this */
  maxAppTokens: number;
  /** Tokens that mark a compound instruction */
  conjunctions: readonly string[];
}

export const DEFAULT_FAST_PATH_OPTIONS: FastPathOptions = {
  maxAppTokens: 3,
  conjunctions: ['and', 'then'],
};

const OPEN_PATTERN = /^(?:open|launch|start)\s+(?:the\s+)?(.+)$/;
const CLOSE_PATTERN = /^(?:close|quit|exit|terminate|kill)\s+(?:the\s+)?(.+)$/;

export interface FastPathMatch {
  intent: FastPathIntent;
  app: string;
}

/**
 * Lowercase, trim and drop leading punctuation.
 */
export function normalizeCommandText(text: string): string {
  return text.toLowerCase().trim().replace(/^[.,!?\-\s]+/, '');
}

/**
 * Pure pattern match; no side effects. Returns null for a miss or when the
 * remainder looks like a compound instruction.
 */
export function matchFastPath(text: string, options: FastPathOptions = DEFAULT_FAST_PATH_OPTIONS): FastPathMatch | null {
  const normalized = normalizeCommandText(text);

  const candidates: Array<[FastPathIntent, RegExp]> = [
    ['open', OPEN_PATTERN],
    ['close', CLOSE_PATTERN],
  ];

  for (const [intent, pattern] of candidates) {
    const match = pattern.exec(normalized);
    if (!match) continue;

    const app = match[1]
      .replace(/[^\p{L}\p{N}_\s]/gu, '')
      .replace(/\s+/g, ' ')
      .trim();
    const tokens = app.split(' ').filter(Boolean);

    if (tokens.length === 0 || tokens.length > options.maxAppTokens) return null;
    if (tokens.some(token => options.conjunctions.includes(token))) return null;

    return { intent, app };
  }

  return null;
}

export function describeFastPathAction(intent: FastPathIntent, app: string): string {
  if (intent === 'open') {
    return `System Note: I have already opened the application '${app}' for you via a fast-path command. You do not need to open it again. Proceed with any subsequent steps.`;
  }
  return `System Note: I have already closed the application '${app}' for you via a fast-path command. You do not need to close it again.`;
}

export class FastPathDispatcher {
  constructor(
    private readonly os: OsActions,
    private readonly options: FastPathOptions = DEFAULT_FAST_PATH_OPTIONS,
  ) {}

  /**
   * Returns an outcome with a note when a local action ran, or null. Every
   * failure (pattern miss, OS call failure, exception) falls through to the
   * remote path as null.
   */
  async dispatch(text: string): Promise<FastPathOutcome | null> {
    const match = matchFastPath(text, this.options);
    if (!match) return null;

    try {
      const ok = match.intent === 'open'
        ? await this.os.launchApp(match.app)
        : await this.os.quitApp(match.app);
      if (!ok) return null;
    } catch (error) {
      logger.debug('FastPath', 'Local action threw; falling through', error);
      return null;
    }

    logger.info('FastPath', `${match.intent === 'open' ? 'Opened' : 'Closed'} '${match.app}'`);
    return { ...match, note: describeFastPathAction(match.intent, match.app) };
  }
}
