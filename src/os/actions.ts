/**
 * OS Action boundary
 * Launch or gracefully quit an application by name.
 */

import { logger } from '../shared/logger.js';
import { runProcess, succeeded, type ProcessCommand, type ProcessRunner } from './process.js';

export interface OsActions {
  launchApp(name: string): Promise<boolean>;
  quitApp(name: string): Promise<boolean>;
}

function launchCommand(platform: NodeJS.Platform, name: string): ProcessCommand | null {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: ['-a', name] };
    case 'linux':
      return { command: 'gtk-launch', args: [name] };
    default:
      return null;
  }
}

function quitCommand(platform: NodeJS.Platform, name: string): ProcessCommand | null {
  switch (platform) {
    case 'darwin':
      return { command: 'osascript', args: ['-e', `quit app "${name.replace(/"/g, '')}"`] };
    case 'linux':
      return { command: 'pkill', args: ['-x', name] };
    default:
      return null;
  }
}

/**
 * Success is exit status 0 only; whether the app actually reached a running
 * or stopped state is not checked.
 */
export function createOsActions(
  run: ProcessRunner = runProcess,
  platform: NodeJS.Platform = process.platform,
): OsActions {
  const execute = async (cmd: ProcessCommand | null, action: string, name: string): Promise<boolean> => {
    if (!cmd) {
      logger.debug('FastPath', `${action} unsupported on ${platform}`, { name });
      return false;
    }
    const result = await run({ ...cmd, timeout: 10000 });
    if (!result.ok) {
      logger.debug('FastPath', `${action} failed to spawn`, { name, error: result.error.message });
      return false;
    }
    if (!succeeded(result)) {
      logger.debug('FastPath', `${action} exited non-zero`, { name, exitCode: result.value.exitCode });
      return false;
    }
    return true;
  };

  return {
    launchApp: (name) => execute(launchCommand(platform, name), 'launch', name),
    quitApp: (name) => execute(quitCommand(platform, name), 'quit', name),
  };
}
