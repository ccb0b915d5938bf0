import { describe, it, expect } from 'vitest';
import { AutoPrompter, ScriptedPrompter } from './prompter.js';

const choices = [
  { value: 'later' as const, label: 'Later' },
  { value: 'sync' as const, label: 'Sync Now' },
];

describe('AutoPrompter', () => {
  it('answers with defaults', async () => {
    const prompter = new AutoPrompter();
    expect(
      await prompter.choose({ title: 'Sync', choices, defaultValue: 'sync' }),
    ).toBe('sync');
    expect(await prompter.confirm('Delete', 'Sure?', false)).toBe(false);
  });
});

describe('ScriptedPrompter', () => {
  it('replays answers and records titles', async () => {
    const prompter = new ScriptedPrompter(['later', 'unknown', 'yes']);
    expect(
      await prompter.choose({ title: 'A', choices, defaultValue: 'sync' }),
    ).toBe('later');
    expect(
      await prompter.choose({ title: 'B', choices, defaultValue: 'sync' }),
    ).toBe('sync');
    expect(await prompter.confirm('C', '', false)).toBe(true);
    expect(await prompter.confirm('D', '', false)).toBe(false);
    expect(prompter.asked).toEqual(['A', 'B', 'C', 'D']);
  });
});
