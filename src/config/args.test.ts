import { describe, expect, it } from 'vitest';
import { parseArgs } from './args.js';

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({ cmd: 'help', positional: [], flags: {} });
    expect(parseArgs(['--help'])).toEqual({ cmd: 'help', positional: [], flags: { help: true } });
  });

  it('reads the port shorthand', () => {
    expect(parseArgs(['panel', '-p', '3010'])).toEqual({ cmd: 'panel', positional: [], flags: { port: '3010' } });
    expect(parseArgs(['panel', '-p=3011']).flags).toEqual({ port: '3011' });
  });

  it('supports both flag value styles', () => {
    expect(parseArgs(['gesture', '--cooldown=1500', '--fast-path', 'annotate']).flags).toEqual({
      cooldown: '1500',
      'fast-path': 'annotate',
    });
  });

  it('collects positional words around flags', () => {
    expect(parseArgs(['send', '--log-level', 'DEBUG', 'open', 'safari'])).toEqual({
      cmd: 'send',
      positional: ['open', 'safari'],
      flags: { 'log-level': 'DEBUG' },
    });
  });

  it('treats everything after -- as positional', () => {
    expect(parseArgs(['send', '--', '--not-a-flag', 'now']).positional).toEqual(['--not-a-flag', 'now']);
  });
});
