/**
 * Core conversation and command types
 * Content blocks mirror the remote agent protocol closely enough to be
 * translated one-to-one, but carry no SDK types.
 */

// ============================================
// Commands
// ============================================

export type CommandSourceKind = 'gesture' | 'wake-word' | 'typed';

export interface Command {
  readonly text: string;
  readonly source: CommandSourceKind;
}

// ============================================
// Content Blocks
// ============================================

export type ContentBlock =
  | TextBlock
  | ToolUseBlock
  | ToolResultBlock
  | ImageBlock;

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: Array<TextBlock | ImageBlock>;
  is_error?: boolean;
}

export interface ImageBlock {
  type: 'image';
  source: {
    type: 'base64';
    media_type: 'image/png' | 'image/jpeg';
    data: string;
  };
}

// ============================================
// Turns
// ============================================

export type TurnRole = 'user' | 'assistant' | 'tool';

export interface Turn {
  readonly role: TurnRole;
  readonly content: readonly ContentBlock[];
}

// ============================================
// Fast path
// ============================================

export type FastPathIntent = 'open' | 'close';

export interface FastPathOutcome {
  intent: FastPathIntent;
  app: string;
  /** Present when the local action ran; tells the remote agent not to repeat it */
  note?: string;
}

// ============================================
// Tasks
// ============================================

export type TaskState = 'pending' | 'running' | 'completed' | 'cancelled' | 'failed';

export type TerminalTaskState = Extract<TaskState, 'completed' | 'cancelled' | 'failed'>;

export interface TaskOutcome {
  state: TerminalTaskState;
  error?: Error;
}

export function isTerminal(state: TaskState): state is TerminalTaskState {
  return state === 'completed' || state === 'cancelled' || state === 'failed';
}

export function textBlock(text: string): TextBlock {
  return { type: 'text', text };
}
