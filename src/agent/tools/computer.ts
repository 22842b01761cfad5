/**
 * Computer Tool Implementation
 * Screen, mouse and keyboard control for the remote agent.
 *
 * The agent works in a fixed coordinate space (FWXGA); coordinates are scaled
 * to the real display on the way in and back on the way out.
 */

import { randomUUID } from 'node:crypto';
import { readFile, rm } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import type { BetaToolComputerUse20250124 } from '@anthropic-ai/sdk/resources/beta/messages/messages';
import { runProcess, succeeded, type ProcessRunner } from '../../os/process.js';
import { ensureDirPath, resolveDataPath } from '../../shared/paths.js';
import {
  readCoordinate,
  readNumber,
  readString,
  ToolError,
  type AgentTool,
  type ToolExecutionResult,
} from './types.js';

export const SCALE_TARGET = { width: 1366, height: 768 } as const;

const TYPING_GROUP_SIZE = 50;
const MAX_WAIT_SECONDS = 30;

export type ComputerAction =
  | 'key'
  | 'type'
  | 'mouse_move'
  | 'left_click'
  | 'left_click_drag'
  | 'right_click'
  | 'middle_click'
  | 'double_click'
  | 'triple_click'
  | 'screenshot'
  | 'cursor_position'
  | 'scroll'
  | 'wait';

const ACTIONS: readonly ComputerAction[] = [
  'key',
  'type',
  'mouse_move',
  'left_click',
  'left_click_drag',
  'right_click',
  'middle_click',
  'double_click',
  'triple_click',
  'screenshot',
  'cursor_position',
  'scroll',
  'wait',
];

function isComputerAction(value: string): value is ComputerAction {
  return ACTIONS.some(action => action === value);
}

const CLICK_COMMANDS: Partial<Record<ComputerAction, string>> = {
  left_click: 'c',
  right_click: 'rc',
  double_click: 'dc',
  triple_click: 'tc',
};

const SCROLL_KEYS: Record<string, string> = {
  up: 'arrow-up',
  down: 'arrow-down',
  left: 'arrow-left',
  right: 'arrow-right',
};

const KEY_ALIASES: Record<string, string> = {
  return: 'return',
  enter: 'return',
  tab: 'tab',
  escape: 'esc',
  esc: 'esc',
  space: 'space',
  backspace: 'delete',
  delete: 'fwd-delete',
  up: 'arrow-up',
  down: 'arrow-down',
  left: 'arrow-left',
  right: 'arrow-right',
  home: 'home',
  end: 'end',
  page_up: 'page-up',
  page_down: 'page-down',
};

const MODIFIER_ALIASES: Record<string, string> = {
  cmd: 'cmd',
  command: 'cmd',
  super: 'cmd',
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  shift: 'shift',
  fn: 'fn',
};

export interface DisplaySize {
  width: number;
  height: number;
}

export interface ComputerToolOptions {
  display: DisplaySize;
  dataDir: string;
  run?: ProcessRunner;
  /** Settle time before a screenshot follows an action */
  screenshotDelayMs?: number;
}

export type ScaleDirection = 'api' | 'screen';

/**
 * Map a point between the agent's coordinate space and the real display.
 * 'screen' converts agent coordinates to the display; 'api' goes the other way.
 */
export function scaleCoordinates(direction: ScaleDirection, x: number, y: number, display: DisplaySize): [number, number] {
  const xFactor = SCALE_TARGET.width / display.width;
  const yFactor = SCALE_TARGET.height / display.height;
  if (direction === 'screen') {
    return [Math.round(x / xFactor), Math.round(y / yFactor)];
  }
  return [Math.round(x * xFactor), Math.round(y * yFactor)];
}

/**
 * Translate an xdotool-style key spec ("ctrl+shift+t", "Return") to cliclick
 * commands.
 */
export function toKeyCommands(spec: string): string[] {
  const parts = spec.split('+').map(part => part.trim().toLowerCase()).filter(Boolean);
  if (parts.length === 0) throw new ToolError('Empty key specification');

  const modifiers: string[] = [];
  const keys: string[] = [];
  for (const part of parts) {
    const modifier = MODIFIER_ALIASES[part];
    if (modifier && parts.length > 1) modifiers.push(modifier);
    else keys.push(part);
  }

  const presses = keys.map(key => {
    const named = KEY_ALIASES[key];
    if (named) return `kp:${named}`;
    if (key.length === 1) return `t:${key}`;
    throw new ToolError(`Unsupported key: ${key}`);
  });

  if (modifiers.length === 0) return presses;
  const held = modifiers.join(',');
  return [`kd:${held}`, ...presses, `ku:${held}`];
}

export class ComputerTool implements AgentTool {
  readonly name = 'computer';
  private readonly runner: ProcessRunner;
  private readonly screenshotDelayMs: number;

  constructor(private readonly options: ComputerToolOptions) {
    this.runner = options.run ?? runProcess;
    this.screenshotDelayMs = options.screenshotDelayMs ?? 1000;
  }

  toParams(): BetaToolComputerUse20250124 {
    return {
      type: 'computer_20250124',
      name: 'computer',
      display_width_px: SCALE_TARGET.width,
      display_height_px: SCALE_TARGET.height,
    };
  }

  async run(input: Record<string, unknown>): Promise<ToolExecutionResult> {
    const action = readString(input, 'action');
    if (!action || !isComputerAction(action)) {
      return { error: `Invalid action: ${action ?? '(missing)'}` };
    }

    try {
      return await this.perform(action, input);
    } catch (error) {
      if (error instanceof ToolError) return { error: error.message };
      throw error;
    }
  }

  private async perform(action: ComputerAction, input: Record<string, unknown>): Promise<ToolExecutionResult> {
    const coordinate = readCoordinate(input);
    const text = readString(input, 'text');

    switch (action) {
      case 'screenshot':
        return this.screenshot();

      case 'wait': {
        const seconds = Math.min(readNumber(input, 'duration') ?? 1, MAX_WAIT_SECONDS);
        await sleep(Math.max(0, seconds) * 1000);
        return this.screenshot();
      }

      case 'cursor_position': {
        const output = await this.cliclick(['p']);
        const match = /(-?\d+)\s*,\s*(-?\d+)/.exec(output);
        if (!match) throw new ToolError(`Unexpected cursor position output: ${output}`);
        const [x, y] = scaleCoordinates('api', Number(match[1]), Number(match[2]), this.options.display);
        return { output: `X=${x},Y=${y}` };
      }

      case 'mouse_move': {
        if (!coordinate) throw new ToolError('coordinate is required for mouse_move');
        await this.cliclick([`m:${this.toScreen(coordinate)}`]);
        return this.afterAction(`Moved mouse to ${coordinate.join(',')}`);
      }

      case 'left_click_drag': {
        if (!coordinate) throw new ToolError('coordinate is required for left_click_drag');
        await this.cliclick(['dd:.', `du:${this.toScreen(coordinate)}`]);
        return this.afterAction(`Dragged to ${coordinate.join(',')}`);
      }

      case 'left_click':
      case 'right_click':
      case 'double_click':
      case 'triple_click': {
        const command = CLICK_COMMANDS[action];
        if (!command) throw new ToolError(`Unsupported click: ${action}`);
        const target = coordinate ? this.toScreen(coordinate) : '.';
        await this.cliclick([`${command}:${target}`]);
        return this.afterAction(`Performed ${action}`);
      }

      case 'middle_click':
        throw new ToolError('middle_click is not supported on this platform');

      case 'key': {
        if (!text) throw new ToolError('text is required for key');
        await this.cliclick(toKeyCommands(text));
        return this.afterAction(`Pressed ${text}`);
      }

      case 'type': {
        if (!text) throw new ToolError('text is required for type');
        for (let i = 0; i < text.length; i += TYPING_GROUP_SIZE) {
          await this.cliclick(['-w', '2', `t:${text.slice(i, i + TYPING_GROUP_SIZE)}`]);
        }
        return this.afterAction(`Typed ${text.length} characters`);
      }

      case 'scroll': {
        const direction = readString(input, 'scroll_direction') ?? 'down';
        const key = SCROLL_KEYS[direction];
        if (!key) throw new ToolError(`Invalid scroll direction: ${direction}`);
        const amount = Math.max(1, Math.min(readNumber(input, 'scroll_amount') ?? 3, 50));
        const commands = coordinate ? [`m:${this.toScreen(coordinate)}`] : [];
        for (let i = 0; i < amount; i++) commands.push(`kp:${key}`);
        await this.cliclick(commands);
        return this.afterAction(`Scrolled ${direction} by ${amount}`);
      }
    }
  }

  private toScreen([x, y]: [number, number]): string {
    if (x < 0 || y < 0) throw new ToolError(`Coordinates must be non-negative: ${x},${y}`);
    const [sx, sy] = scaleCoordinates('screen', x, y, this.options.display);
    return `${sx},${sy}`;
  }

  private async cliclick(args: string[]): Promise<string> {
    const result = await this.runner({ command: 'cliclick', args, timeout: 15000 });
    if (!result.ok) throw new ToolError(`cliclick unavailable: ${result.error.message}`);
    if (result.value.exitCode !== 0) {
      throw new ToolError(result.value.stderr.trim() || `cliclick exited with code ${result.value.exitCode}`);
    }
    return result.value.stdout;
  }

  private async afterAction(output: string): Promise<ToolExecutionResult> {
    if (this.screenshotDelayMs > 0) await sleep(this.screenshotDelayMs);
    const shot = await this.screenshot();
    return { ...shot, output };
  }

  private async screenshot(): Promise<ToolExecutionResult> {
    const dir = resolveDataPath(this.options.dataDir, 'screenshots');
    ensureDirPath(dir);
    const path = resolveDataPath(dir, `screenshot_${randomUUID()}.png`);

    const capture = await this.runner({ command: 'screencapture', args: ['-x', path], timeout: 15000 });
    if (!succeeded(capture)) throw new ToolError('Screenshot capture failed');

    const resize = await this.runner({
      command: 'sips',
      args: ['-z', String(SCALE_TARGET.height), String(SCALE_TARGET.width), path],
      timeout: 15000,
    });
    if (!succeeded(resize)) throw new ToolError('Screenshot resize failed');

    try {
      const data = await readFile(path);
      return { base64Image: data.toString('base64') };
    } finally {
      await rm(path, { force: true });
    }
  }
}
