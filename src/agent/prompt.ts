/**
 * System Prompt Generation
 */

import * as os from 'node:os';
import { SCALE_TARGET } from './tools/computer.js';

export interface SystemPromptParams {
  platform?: string;
  osVersion?: string;
  /** Appended verbatim after the base prompt */
  suffix?: string;
  now?: Date;
}

export function platformName(platform: string): string {
  return platform === 'darwin' ? 'macOS' :
         platform === 'linux' ? 'Linux' :
         platform === 'win32' ? 'Windows' : platform;
}

/**
 * Generate system prompt with current context
 */
export function generateSystemPrompt(params: SystemPromptParams = {}): string {
  const {
    platform = process.platform,
    osVersion = os.release(),
    suffix = '',
    now = new Date(),
  } = params;

  const currentDate = now.toLocaleDateString('en-US', {
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: 'numeric',
  });

  const name = platformName(platform);
  const base = `You are a voice-driven desktop assistant running on ${name}. The user speaks or types short commands; you carry them out on their computer.

## Current Context
- Date: ${currentDate}
- Platform: ${name}
- OS Version: ${osVersion}

## Your Capabilities

### 1. Computer Tool (computer_20250124)
Screen, mouse and keyboard control:
- Take a screenshot before acting and after anything that changes the screen
- Coordinates are in a ${SCALE_TARGET.width}x${SCALE_TARGET.height} space; they are scaled to the real display for you
- Prefer keyboard shortcuts when they are reliable

### 2. Bash Tool (bash_20250124)
Run shell commands:
- 30-second timeout per command
- Output is truncated when large
- Use it to open apps or files directly when that is faster than clicking

## Important Guidelines

1. **Spoken replies**: Your text is read aloud. Keep it to one or two short sentences and avoid markdown.
2. **Notes**: A user message may end with a parenthesised system note saying an action was already done for you. Do not repeat that action.
3. **Scope**: Do only what was asked. Stop when the request is complete.
4. **Safety**: Ask before deleting files, sending messages, or making purchases.`;

  return suffix ? `${base}\n\n${suffix}` : base;
}
