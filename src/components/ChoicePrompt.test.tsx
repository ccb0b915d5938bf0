import { describe, it, expect, vi } from 'vitest';
import { render } from 'ink-testing-library';
import { ChoicePrompt } from './ChoicePrompt.js';

describe('ChoicePrompt', () => {
  it('renders the title, message and every choice', () => {
    const { lastFrame } = render(
      <ChoicePrompt
        title="Sync Changes"
        message="3 changes pending"
        choices={[
          { value: 'later', label: 'Later' },
          { value: 'sync', label: 'Sync Now' },
          { value: 'delete', label: 'Delete Queue' },
        ]}
        cancelValue="later"
        onSelect={vi.fn()}
      />,
    );
    const frame = lastFrame();
    expect(frame).toContain('Sync Changes');
    expect(frame).toContain('3 changes pending');
    expect(frame).toContain('Later');
    expect(frame).toContain('Sync Now');
    expect(frame).toContain('Delete Queue');
  });

  it('omits the message line when none is given', () => {
    const { lastFrame } = render(
      <ChoicePrompt
        title="Cancel download?"
        choices={[{ value: 'continue', label: 'Continue' }]}
        cancelValue="continue"
        onSelect={vi.fn()}
      />,
    );
    expect(lastFrame()).toContain('Cancel download?');
    expect(lastFrame()).toContain('Continue');
  });
});
