import type { BetaToolUnion } from '@anthropic-ai/sdk/resources/beta/messages/messages';

export interface ToolExecutionResult {
  output?: string;
  error?: string;
  /** PNG screenshot, base64 encoded */
  base64Image?: string;
}

export interface AgentTool {
  readonly name: string;
  toParams(): BetaToolUnion;
  run(input: Record<string, unknown>): Promise<ToolExecutionResult>;
}

export class ToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolError';
  }
}

export function readString(input: Record<string, unknown>, key: string): string | undefined {
  const value = input[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(input: Record<string, unknown>, key: string): number | undefined {
  const value = input[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readCoordinate(input: Record<string, unknown>, key: string = 'coordinate'): [number, number] | undefined {
  const value = input[key];
  if (!Array.isArray(value) || value.length !== 2) return undefined;
  const [x, y] = value;
  if (typeof x !== 'number' || typeof y !== 'number') return undefined;
  return [x, y];
}
