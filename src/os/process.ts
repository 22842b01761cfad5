/**
 * Process Runner
 * Spawns one external program per call and joins it through a promise.
 */

import { spawn } from 'node:child_process';
import type { ProcessOutput, Result } from '../shared/types/api.js';

const DEFAULT_TIMEOUT = 30000; // 30 seconds
const MAX_OUTPUT_SIZE = 100000; // ~100KB

export interface ProcessCommand {
  command: string;
  args?: string[];
  cwd?: string;
  timeout?: number;
  /** Captured stdout is returned as base64 instead of utf8 */
  binary?: boolean;
}

export type ProcessRunner = (cmd: ProcessCommand) => Promise<Result<ProcessOutput>>;

/**
 * Run a program to completion. Never throws: spawn failures (missing binary,
 * permissions) come back as `{ ok: false }`, non-zero exits as `ok: true` with
 * the exit code so callers decide what success means.
 */
export const runProcess: ProcessRunner = (cmd) => {
  const { command, args = [], cwd, timeout = DEFAULT_TIMEOUT, binary = false } = cmd;

  if (!command.trim()) {
    return Promise.resolve({ ok: false, error: new Error('Command cannot be empty') });
  }

  return new Promise((resolve) => {
    const startTime = Date.now();
    const stdoutChunks: Buffer[] = [];
    let stdoutSize = 0;
    let stderr = '';

    const proc = spawn(command, args, { cwd, env: process.env });

    proc.stdout.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_OUTPUT_SIZE || binary) {
        stdoutChunks.push(data);
        stdoutSize += data.length;
      }
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > 20000) {
        stderr = stderr.substring(0, 20000) + '\n\n[Error output truncated]';
      }
    });

    const timer = setTimeout(() => {
      proc.kill('SIGTERM');
      setTimeout(() => {
        if (proc.exitCode === null) {
          proc.kill('SIGKILL');
        }
      }, 1000);
    }, timeout);

    proc.on('close', (code) => {
      clearTimeout(timer);
      const raw = Buffer.concat(stdoutChunks);
      let stdout = binary ? raw.toString('base64') : raw.toString('utf8');
      if (!binary && stdout.length > MAX_OUTPUT_SIZE) {
        stdout = stdout.substring(0, MAX_OUTPUT_SIZE) + '\n\n[Output truncated - exceeded 100KB]';
      }
      resolve({
        ok: true,
        value: {
          stdout,
          stderr,
          exitCode: code,
          duration: Date.now() - startTime,
        },
      });
    });

    proc.on('error', (error) => {
      clearTimeout(timer);
      resolve({ ok: false, error });
    });
  });
};

/** Exit status 0 is the only definition of success. */
export function succeeded(result: Result<ProcessOutput>): boolean {
  return result.ok && result.value.exitCode === 0;
}
