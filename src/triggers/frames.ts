/**
 * Landmark frame input: NDJSON lines from a sidecar process or stdin.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { logger } from '../shared/logger.js';

export interface FrameStream {
  lines: AsyncIterable<string>;
  close(): void;
}

/**
 * With a command, run it through the shell and read its stdout; otherwise
 * read this process's stdin.
 */
export function openFrameStream(command?: string): FrameStream {
  if (!command) {
    const rl = createInterface({ input: process.stdin, crlfDelay: Infinity });
    return { lines: rl, close: () => rl.close() };
  }

  const child = spawn(command, { shell: true, stdio: ['ignore', 'pipe', 'inherit'] });
  child.on('error', (error) => {
    logger.error('Trigger', `Landmark process failed to start: ${command}`, error);
  });
  child.on('exit', (code) => {
    logger.info('Trigger', `Landmark process exited`, { code });
  });

  const rl = createInterface({ input: child.stdout, crlfDelay: Infinity });
  return {
    lines: rl,
    close: () => {
      rl.close();
      if (child.exitCode === null) child.kill('SIGTERM');
    },
  };
}
