/**
 * Translation between stored turns and the remote message protocol.
 */

import type {
  BetaContentBlockParam,
  BetaImageBlockParam,
  BetaMessageParam,
  BetaTextBlockParam,
} from '@anthropic-ai/sdk/resources/beta/messages/messages';
import type { ContentBlock, ImageBlock, TextBlock, ToolResultBlock, Turn } from '../core/types.js';
import type { ToolExecutionResult } from './tools/types.js';

/** Minimal shape of a reply content block; SDK blocks satisfy it. */
export interface ReplyBlock {
  type: string;
}

function toResultPart(block: TextBlock | ImageBlock): BetaTextBlockParam | BetaImageBlockParam {
  if (block.type === 'text') return { type: 'text', text: block.text };
  return { type: 'image', source: { ...block.source } };
}

function toApiBlock(block: ContentBlock): BetaContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'image':
      return { type: 'image', source: { ...block.source } };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.tool_use_id,
        content: block.content.map(toResultPart),
        ...(block.is_error ? { is_error: true } : {}),
      };
  }
}

/**
 * Tool turns travel as user messages. Adjacent turns that land on the same
 * role are merged, which happens after an assistant turn was pruned.
 */
export function toApiMessages(turns: readonly Turn[]): BetaMessageParam[] {
  const messages: Array<{ role: 'user' | 'assistant'; content: BetaContentBlockParam[] }> = [];

  for (const turn of turns) {
    const role = turn.role === 'assistant' ? 'assistant' : 'user';
    const content = turn.content.map(toApiBlock);
    const previous = messages[messages.length - 1];
    if (previous && previous.role === role) {
      previous.content.push(...content);
    } else {
      messages.push({ role, content });
    }
  }

  return messages;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the text and tool_use blocks of a reply; thinking and server-side
 * blocks are not stored.
 */
export function fromApiContent(blocks: readonly ReplyBlock[]): ContentBlock[] {
  const content: ContentBlock[] = [];
  for (const block of blocks) {
    if (block.type === 'text' && 'text' in block && typeof block.text === 'string') {
      content.push({ type: 'text', text: block.text });
    } else if (
      block.type === 'tool_use' &&
      'id' in block && typeof block.id === 'string' &&
      'name' in block && typeof block.name === 'string'
    ) {
      const input = 'input' in block && isRecord(block.input) ? block.input : {};
      content.push({ type: 'tool_use', id: block.id, name: block.name, input });
    }
  }
  return content;
}

export function toToolResultBlock(result: ToolExecutionResult, toolUseId: string): ToolResultBlock {
  const content: Array<TextBlock | ImageBlock> = [];
  if (result.output) content.push({ type: 'text', text: result.output });
  if (result.error) content.push({ type: 'text', text: result.error });
  if (result.base64Image) {
    content.push({
      type: 'image',
      source: { type: 'base64', media_type: 'image/png', data: result.base64Image },
    });
  }
  return {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content,
    ...(result.error ? { is_error: true } : {}),
  };
}

/**
 * Drop all but the `limit` most recent screenshots from tool results. Works
 * on a copy; the stored turns keep every image.
 */
export function retainRecentImages(turns: readonly Turn[], limit: number): Turn[] {
  let remaining = Math.max(0, limit);
  const kept: Turn[] = [];

  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    const content = turn.content.map(block => {
      if (block.type !== 'tool_result') return block;
      const parts = [...block.content].reverse().filter(part => {
        if (part.type !== 'image') return true;
        if (remaining > 0) {
          remaining--;
          return true;
        }
        return false;
      });
      return { ...block, content: parts.reverse() };
    });
    kept.push({ role: turn.role, content });
  }

  return kept.reverse();
}
