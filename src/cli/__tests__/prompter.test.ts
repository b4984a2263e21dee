import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { createLinePrompter } from '../prompter.js';

describe('createLinePrompter', () => {
  it('writes each prompt and returns one line per call', async () => {
    const written: string[] = [];
    const prompter = createLinePrompter(Readable.from(['1\nDune\r\n', 'Frank Herbert\n']), (text) => {
      written.push(text);
    });

    expect(await prompter.ask('Choose an action: ')).toBe('1');
    expect(await prompter.ask('Title: ')).toBe('Dune');
    expect(await prompter.ask('Author: ')).toBe('Frank Herbert');
    expect(written).toEqual(['Choose an action: ', 'Title: ', 'Author: ']);
    prompter.close();
  });

  it('returns null once input ends', async () => {
    const prompter = createLinePrompter(Readable.from(['only\n']), () => {});

    expect(await prompter.ask('> ')).toBe('only');
    expect(await prompter.ask('> ')).toBeNull();
    expect(await prompter.ask('> ')).toBeNull();
    prompter.close();
  });

  it('returns null after close', async () => {
    const written: string[] = [];
    const prompter = createLinePrompter(Readable.from(['ignored\n']), (text) => {
      written.push(text);
    });

    prompter.close();

    expect(await prompter.ask('> ')).toBeNull();
    expect(written).toEqual([]);
  });
});
