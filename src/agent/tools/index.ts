import type { BetaToolUnion } from '@anthropic-ai/sdk/resources/beta/messages/messages';
import { logger } from '../../shared/logger.js';
import { errorMessage } from '../../shared/errors.js';
import type { AgentTool, ToolExecutionResult } from './types.js';

export { BashTool, truncateOutput } from './bash.js';
export { ComputerTool, scaleCoordinates, toKeyCommands, SCALE_TARGET } from './computer.js';
export type { AgentTool, ToolExecutionResult } from './types.js';

/**
 * Tools offered to the remote agent, dispatched by name.
 */
export class ToolCollection {
  private readonly tools = new Map<string, AgentTool>();

  constructor(tools: readonly AgentTool[]) {
    for (const tool of tools) this.tools.set(tool.name, tool);
  }

  toParams(): BetaToolUnion[] {
    return [...this.tools.values()].map(tool => tool.toParams());
  }

  /** Tool failures become error results; they never fail the exchange. */
  async run(name: string, input: Record<string, unknown>): Promise<ToolExecutionResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { error: `Unknown tool: ${name}` };
    }
    try {
      return await tool.run(input);
    } catch (error) {
      logger.warn('Agent', `Tool ${name} threw`, error);
      return { error: errorMessage(error) };
    }
  }
}
