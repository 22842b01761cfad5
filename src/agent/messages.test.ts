import { describe, expect, it } from 'vitest';
import type { Turn } from '../core/types.js';
import { fromApiContent, retainRecentImages, toApiMessages, toToolResultBlock } from './messages.js';

const image = (data: string) => ({
  type: 'image' as const,
  source: { type: 'base64' as const, media_type: 'image/png' as const, data },
});

function screenshotTurn(id: string, data: string): Turn {
  return {
    role: 'tool',
    content: [{ type: 'tool_result', tool_use_id: id, content: [{ type: 'text', text: 'done' }, image(data)] }],
  };
}

describe('toApiMessages', () => {
  it('sends tool turns as user messages', () => {
    const turns: Turn[] = [
      { role: 'user', content: [{ type: 'text', text: 'open mail' }] },
      { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'computer', input: { action: 'screenshot' } }] },
      {
        role: 'tool',
        content: [{ type: 'tool_result', tool_use_id: 't1', content: [{ type: 'text', text: 'ok' }], is_error: true }],
      },
    ];

    expect(toApiMessages(turns)).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'open mail' }] },
      { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'computer', input: { action: 'screenshot' } }] },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 't1', content: [{ type: 'text', text: 'ok' }], is_error: true }],
      },
    ]);
  });

  it('merges adjacent turns that share a role', () => {
    const turns: Turn[] = [
      { role: 'user', content: [{ type: 'text', text: 'first' }] },
      { role: 'user', content: [{ type: 'text', text: 'second' }] },
    ];

    expect(toApiMessages(turns)).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'first' }, { type: 'text', text: 'second' }] },
    ]);
  });
});

describe('fromApiContent', () => {
  it('keeps text and tool_use blocks only', () => {
    const blocks = [
      { type: 'thinking', thinking: 'hmm', signature: 'sig' },
      { type: 'text', text: 'Opening mail', citations: null },
      { type: 'tool_use', id: 't1', name: 'computer', input: { action: 'left_click', coordinate: [10, 20] } },
    ];

    expect(fromApiContent(blocks)).toEqual([
      { type: 'text', text: 'Opening mail' },
      { type: 'tool_use', id: 't1', name: 'computer', input: { action: 'left_click', coordinate: [10, 20] } },
    ]);
  });

  it('replaces a non-object tool input with an empty one', () => {
    const blocks = [{ type: 'tool_use', id: 't2', name: 'bash', input: 'ls' }];
    expect(fromApiContent(blocks)).toEqual([
      { type: 'tool_use', id: 't2', name: 'bash', input: {} },
    ]);
  });
});

describe('toToolResultBlock', () => {
  it('puts output before the screenshot', () => {
    expect(toToolResultBlock({ output: 'clicked', base64Image: 'AAAA' }, 't1')).toEqual({
      type: 'tool_result',
      tool_use_id: 't1',
      content: [{ type: 'text', text: 'clicked' }, image('AAAA')],
    });
  });

  it('flags errors', () => {
    expect(toToolResultBlock({ error: 'no such app' }, 't2')).toEqual({
      type: 'tool_result',
      tool_use_id: 't2',
      content: [{ type: 'text', text: 'no such app' }],
      is_error: true,
    });
  });
});

describe('retainRecentImages', () => {
  it('keeps only the newest screenshots', () => {
    const turns = [screenshotTurn('t1', 'one'), screenshotTurn('t2', 'two'), screenshotTurn('t3', 'three')];

    const kept = retainRecentImages(turns, 2);

    expect(kept[0].content).toEqual([
      { type: 'tool_result', tool_use_id: 't1', content: [{ type: 'text', text: 'done' }] },
    ]);
    expect(kept[1]).toEqual(turns[1]);
    expect(kept[2]).toEqual(turns[2]);
  });

  it('drops every image at a limit of zero and leaves the input alone', () => {
    const turns = [screenshotTurn('t1', 'one')];

    const kept = retainRecentImages(turns, 0);

    expect(kept[0].content).toEqual([
      { type: 'tool_result', tool_use_id: 't1', content: [{ type: 'text', text: 'done' }] },
    ]);
    expect(turns[0]).toEqual(screenshotTurn('t1', 'one'));
  });
});
