import { describe, expect, it } from 'vitest';
import { generateSystemPrompt, platformName } from './prompt.js';

describe('generateSystemPrompt', () => {
  const now = new Date(2025, 0, 15);

  it('describes the platform and the scaled coordinate space', () => {
    const prompt = generateSystemPrompt({ platform: 'darwin', osVersion: '24.1.0', now });

    expect(prompt).toContain('running on macOS');
    expect(prompt).toContain('- OS Version: 24.1.0');
    expect(prompt).toContain('- Date: Wednesday, January 15, 2025');
    expect(prompt).toContain('1366x768 space');
  });

  it('appends the suffix after a blank line', () => {
    const prompt = generateSystemPrompt({ platform: 'linux', osVersion: '6.1', now, suffix: 'Be brief.' });

    expect(prompt.endsWith('\n\nBe brief.')).toBe(true);
  });
});

describe('platformName', () => {
  it('maps node platform ids', () => {
    expect(platformName('win32')).toBe('Windows');
    expect(platformName('freebsd')).toBe('freebsd');
  });
});
