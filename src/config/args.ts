import type { Flags } from './index.js';

export interface ParsedArgs {
  cmd: string;
  positional: string[];
  flags: Flags;
}

/**
 * Split argv into a command, positional words and flags.
 * Supports --key=value, --key value, bare --flag, -h and -p.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const out: Flags = {};
  const positional: string[] = [];
  const first = argv[0];
  const cmd = first && !first.startsWith('-') ? first : 'help';
  const rest = first === cmd ? argv.slice(1) : argv.slice(0);

  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    if (a === '--') {
      positional.push(...rest.slice(i + 1));
      break;
    }
    if (a.startsWith('--')) {
      const [rawK, ...rawV] = a.slice(2).split('=');
      const k = rawK.trim();
      if (rawV.length > 0) {
        out[k] = rawV.join('=');
      } else {
        // generic support space-separated values: --key value
        const next = rest[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          out[k] = next;
          i++;
        } else {
          out[k] = true;
        }
      }
      continue;
    }
    if (a.startsWith('-')) {
      if (a === '-h') {
        out.help = true;
        continue;
      }
      if (a.startsWith('-p=')) {
        out.port = a.split('=')[1];
        continue;
      }
      if (a === '-p') {
        const next = rest[i + 1];
        if (next && !next.startsWith('-')) {
          out.port = next;
          i++;
        }
      }
      continue;
    }
    positional.push(a);
  }
  return { cmd, positional, flags: out };
}
