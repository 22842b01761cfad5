/**
 * Remote Exchange Loop
 * Request, commit, run tools, repeat until the agent stops asking for tools.
 */

import type { ContentBlock, ToolResultBlock, ToolUseBlock, Turn } from '../core/types.js';
import { errorMessage, isAbortError, RemoteExchangeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createMessageSender, type CreateMessage, type Credentials, type RemoteReply } from './client.js';
import { fromApiContent, retainRecentImages, toApiMessages, toToolResultBlock } from './messages.js';
import { generateSystemPrompt } from './prompt.js';
import type { ToolCollection } from './tools/index.js';
import type { ToolExecutionResult } from './tools/types.js';

export const COMPUTER_USE_BETA = 'computer-use-2025-01-24';
const MAX_TOKENS = 4096;

export interface ExchangeOptions {
  model: string;
  systemPromptSuffix: string;
  /** Snapshot taken when the task started; ends with the new user turn */
  history: readonly Turn[];
  onProgress: (block: ContentBlock) => void;
  onToolOutput: (result: ToolExecutionResult, toolUseId: string) => void;
  credentials: Credentials;
  imageRetentionLimit: number;
  signal: AbortSignal;
  /** Persists one produced turn; returns false once the writer lease is gone */
  commit: (turn: Turn) => boolean;
  tools: ToolCollection;
  /** Overrides the SDK-backed sender */
  send?: CreateMessage;
}

export type RemoteExchange = (options: ExchangeOptions) => Promise<readonly Turn[]>;

function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

/**
 * Runs one exchange and returns the full turn sequence it worked on. Aborts
 * surface as the signal's abort error; everything else that stops the loop is
 * a RemoteExchangeError.
 */
export const runExchange: RemoteExchange = async (options) => {
  const { model, signal, tools, commit, imageRetentionLimit } = options;
  const send = options.send ?? createMessageSender(options.credentials);
  const system = generateSystemPrompt({ suffix: options.systemPromptSuffix });
  const working: Turn[] = [...options.history];

  while (true) {
    signal.throwIfAborted();

    let reply: RemoteReply;
    try {
      reply = await send(
        {
          model,
          max_tokens: MAX_TOKENS,
          system,
          messages: toApiMessages(retainRecentImages(working, imageRetentionLimit)),
          tools: tools.toParams(),
          betas: [COMPUTER_USE_BETA],
        },
        signal,
      );
    } catch (error) {
      if (signal.aborted || isAbortError(error)) throw error;
      if (error instanceof RemoteExchangeError) throw error;
      throw new RemoteExchangeError(`Remote request failed: ${errorMessage(error)}`, error);
    }

    signal.throwIfAborted();

    const content = fromApiContent(reply.content);
    if (content.length === 0) {
      logger.debug('Agent', 'Empty reply', { stopReason: reply.stop_reason });
      return working;
    }

    const assistant: Turn = { role: 'assistant', content };
    working.push(assistant);
    if (!commit(assistant)) {
      // Lease lost: a newer user turn or a reset owns the history now.
      logger.debug('Agent', 'Stopping exchange after stale commit');
      return working;
    }

    content.forEach(block => options.onProgress(block));

    const toolUses = content.filter(isToolUse);
    if (toolUses.length === 0) {
      return working;
    }

    const results: ToolResultBlock[] = [];
    for (const use of toolUses) {
      signal.throwIfAborted();
      logger.debug('Agent', `Running tool ${use.name}`, { id: use.id });
      const result = await tools.run(use.name, use.input);
      options.onToolOutput(result, use.id);
      results.push(toToolResultBlock(result, use.id));
    }

    const toolTurn: Turn = { role: 'tool', content: results };
    working.push(toolTurn);
    if (!commit(toolTurn)) {
      return working;
    }
  }
};
