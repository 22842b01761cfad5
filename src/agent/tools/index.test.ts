import { describe, expect, it } from 'vitest';
import { ToolCollection, type AgentTool } from './index.js';

const broken: AgentTool = {
  name: 'bash',
  toParams: () => ({ type: 'bash_20250124', name: 'bash' }),
  run: async () => {
    throw new Error('tool exploded');
  },
};

describe('ToolCollection', () => {
  it('lists tool params', () => {
    expect(new ToolCollection([broken]).toParams()).toEqual([{ type: 'bash_20250124', name: 'bash' }]);
  });

  it('turns a throwing tool into an error result', async () => {
    expect(await new ToolCollection([broken]).run('bash', { command: 'ls' })).toEqual({ error: 'tool exploded' });
  });

  it('rejects unknown tools', async () => {
    expect(await new ToolCollection([]).run('editor', {})).toEqual({ error: 'Unknown tool: editor' });
  });
});
