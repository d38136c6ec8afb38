import { describe, expect, it } from 'vitest';
import { createPrompter, NonInteractivePrompter, TerminalPrompter } from '../src/prompt.js';

describe('prompters', () => {
  it('answers with defaults when prompting is off', async () => {
    const prompter = new NonInteractivePrompter();
    expect(await prompter.ask('Series name', 'Dark (2017)')).toBe('Dark (2017)');
    expect(await prompter.confirm('Proceed?', true)).toBe(true);
    expect(await prompter.confirm('Overwrite?', false)).toBe(false);
  });

  it('picks the implementation from the no-prompt flag', () => {
    expect(createPrompter(true)).toBeInstanceOf(NonInteractivePrompter);
    expect(createPrompter(false)).toBeInstanceOf(TerminalPrompter);
  });
});
