import { describe, it, expect, afterEach, vi } from 'vitest';
import { getHelpText, showHelp } from '../help.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('help text', () => {
  it('shows the overview without a command', () => {
    const text = getHelpText();
    expect(text).toContain('catalog-keeper - Library catalog manager for the terminal');
    expect(text).toContain('set-status <id> <status>');
  });

  it('shows command help', () => {
    expect(getHelpText('search')).toContain('catalog-keeper search <title|author|year> <query> [--json]');
  });

  it('flags unknown commands and falls back to the overview', () => {
    const text = getHelpText('checkout');
    expect(text.startsWith('Unknown command: checkout\n')).toBe(true);
    expect(text).toContain('COMMANDS:');
  });

  it('prints to stdout', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    showHelp('list');
    expect(spy).toHaveBeenCalledWith(getHelpText('list'));
  });
});
