/**
 * Bash Tool Implementation
 * Runs one command per call through the shared process runner.
 */

import type { BetaToolBash20250124 } from '@anthropic-ai/sdk/resources/beta/messages/messages';
import { runProcess, type ProcessRunner } from '../../os/process.js';
import { readString, type AgentTool, type ToolExecutionResult } from './types.js';

const BASH_TIMEOUT = 30000;

export const bashToolDefinition: BetaToolBash20250124 = {
  type: 'bash_20250124',
  name: 'bash',
};

export class BashTool implements AgentTool {
  readonly name = 'bash';

  constructor(
    private readonly runner: ProcessRunner = runProcess,
    private readonly cwd: string = process.cwd(),
  ) {}

  toParams(): BetaToolBash20250124 {
    return bashToolDefinition;
  }

  async run(input: Record<string, unknown>): Promise<ToolExecutionResult> {
    if (input['restart'] === true) {
      return { output: 'Bash session restarted' };
    }

    const command = readString(input, 'command');
    if (!command) {
      return { error: 'No command provided' };
    }

    const result = await this.runner({
      command: 'bash',
      args: ['-c', command],
      cwd: this.cwd,
      timeout: BASH_TIMEOUT,
    });

    if (!result.ok) {
      return { error: result.error.message };
    }

    const { stdout, stderr, exitCode } = result.value;
    let output = stdout;
    if (stderr) {
      output += `\n${stderr}`;
    }

    if (!output.trim()) {
      return { output: `Command completed with exit code ${exitCode}` };
    }

    return exitCode === 0 ? { output: truncateOutput(output) } : { error: truncateOutput(output) };
  }
}

/**
 * Truncate output to stay within token limits
 */
export function truncateOutput(output: string): string {
  const maxChars = 50000; // ~12.5k tokens
  const maxLines = 1000;

  if (output.length <= maxChars) {
    return output;
  }

  const lines = output.split('\n');

  if (lines.length > maxLines) {
    const truncated = lines.slice(0, maxLines).join('\n');
    const body = truncated.length > maxChars ? truncated.substring(0, maxChars) : truncated;
    return `${body}\n\n... Output truncated (${lines.length} total lines) ...`;
  }

  return `${output.substring(0, maxChars)}\n\n... Output truncated (${output.length} total characters) ...`;
}
