import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createReadlinePrompter } from '../../../cli/prompter.js';

describe('createReadlinePrompter', () => {
  it('answers questions line by line, then null at end of input', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createReadlinePrompter(input, output);

    input.end('first\nsecond\n');

    expect(await prompter.ask('A? ')).toBe('first');
    expect(await prompter.ask('B? ')).toBe('second');
    expect(await prompter.ask('C? ')).toBeNull();
    expect(String(output.read())).toBe('A? B? C? ');

    prompter.close();
  });
});
